import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  parseProjectConfig,
  projectConfigPath,
  readProjectConfig,
  writeProjectConfig
} from "../src/core/project-config.js";

const tempDirs: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "stackwright-config-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("project config marker", () => {
  it("parses key=value lines, skipping comments and blank lines", () => {
    expect(parseProjectConfig("# chosen at create time\n\n  package_manager = bun  \n")).toEqual({
      packageManager: "bun"
    });
  });

  it("splits on the first equals sign only", () => {
    expect(parseProjectConfig("package_manager=npm=extra\n")).toEqual({});
  });

  it("ignores unknown keys and unrecognised managers", () => {
    expect(parseProjectConfig("editor=vim\npackage_manager=cargo\n")).toEqual({});
  });

  it("returns an empty config when the marker is missing", async () => {
    const dir = await makeTempDir();
    await expect(readProjectConfig(dir)).resolves.toEqual({});
  });

  it("writes the marker under the project dotfolder and reads it back", async () => {
    const dir = await makeTempDir();
    const path = await writeProjectConfig(dir, { packageManager: "yarn" });

    expect(path).toBe(projectConfigPath(dir));
    expect(path).toBe(join(dir, ".stackwright", "config"));
    await expect(readFile(path, "utf8")).resolves.toBe("package_manager=yarn\n");
    await expect(readProjectConfig(dir)).resolves.toEqual({ packageManager: "yarn" });
  });
});
