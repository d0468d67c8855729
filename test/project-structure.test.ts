import { mkdtemp, mkdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { StructureNotDetectedError } from "../src/core/errors.js";
import {
  detectProjectStructure,
  isAppRouter,
  projectPath,
  projectPaths
} from "../src/core/project-structure.js";

const tempDirs: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "stackwright-structure-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("project structure detection", () => {
  it("prefers app/ when both app/ and src/ exist", async () => {
    const dir = await makeTempDir();
    await mkdir(join(dir, "app"));
    await mkdir(join(dir, "src"));
    await expect(detectProjectStructure(dir)).resolves.toBe("app-dir");
  });

  it("detects src-only projects", async () => {
    const dir = await makeTempDir();
    await mkdir(join(dir, "src"));
    await expect(detectProjectStructure(dir)).resolves.toBe("src-dir");
  });

  it("does not treat a file named app as a directory", async () => {
    const dir = await makeTempDir();
    await writeFile(join(dir, "app"), "", "utf8");
    await mkdir(join(dir, "src"));
    await expect(detectProjectStructure(dir)).resolves.toBe("src-dir");
  });

  it("fails when neither directory exists", async () => {
    const dir = await makeTempDir();
    const failure = detectProjectStructure(dir);
    await expect(failure).rejects.toBeInstanceOf(StructureNotDetectedError);
    await expect(failure).rejects.toThrow(
      "Could not detect project structure. Neither 'app' nor 'src' directory found."
    );
  });
});

describe("project paths", () => {
  it("maps app-dir paths", () => {
    expect(projectPaths("app-dir")).toEqual({
      globalsCss: "app/globals.css",
      lib: "lib",
      db: "db",
      apiRoute: "app/api/users/route.ts",
      components: "components",
      sourceRoot: "."
    });
    expect(isAppRouter("app-dir")).toBe(true);
  });

  it("maps src-dir paths", () => {
    expect(projectPaths("src-dir")).toEqual({
      globalsCss: "src/app/globals.css",
      lib: "src/lib",
      db: "src/db",
      apiRoute: "src/pages/api/users.ts",
      components: "src/components",
      sourceRoot: "src"
    });
    expect(isAppRouter("src-dir")).toBe(false);
  });

  it("joins paths without a leading dot segment", () => {
    expect(projectPath(".", "example-usage.ts")).toBe("example-usage.ts");
    expect(projectPath("src", "db", "schema.ts")).toBe("src/db/schema.ts");
  });
});
