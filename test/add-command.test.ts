import { mkdtemp, mkdir, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { StructureNotDetectedError, UnknownFeatureError, UserInputError } from "../src/core/errors.js";
import { buildFeatureContext, runAdd } from "../src/commands/add.js";
import type { CommandRuntime } from "../src/commands/runtime.js";
import { fakeProbe, fakeRunner } from "./support/fakes.js";

const clack = await vi.hoisted(async () => {
  const { createClackMock } = await import("./support/clack-mock.js");
  return createClackMock();
});

vi.mock("@clack/prompts", () => clack.module);

const tempDirs: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "stackwright-add-"));
  tempDirs.push(dir);
  return dir;
}

function runtimeFor(cwd: string, installed: readonly string[] = ["npm"]) {
  const runner = fakeRunner();
  const probe = fakeProbe(installed);
  const runtime: CommandRuntime = { cwd, runner: runner.runner, probe: probe.probe, env: {} };
  return { runtime, calls: runner.calls, probed: probe.probed };
}

beforeEach(() => {
  clack.answers.length = 0;
  vi.clearAllMocks();
});

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("add command", () => {
  it("fails an unknown feature with exit code 2 before touching the project", async () => {
    const dir = await makeTempDir();
    await mkdir(join(dir, "app"));
    const { runtime, calls, probed } = runtimeFor(dir);

    const failure = runAdd({ feature: "doesnotexist" }, runtime);

    await expect(failure).rejects.toBeInstanceOf(UnknownFeatureError);
    await expect(failure).rejects.toMatchObject({ exitCode: 2 });
    expect(calls).toEqual([]);
    expect(probed).toEqual([]);
    expect(await readdir(dir)).toEqual(["app"]);
    expect(await readdir(join(dir, "app"))).toEqual([]);
  });

  it("rejects --provider for features other than drizzle before touching the project", async () => {
    const dir = await makeTempDir();
    await mkdir(join(dir, "app"));
    const { runtime, calls, probed } = runtimeFor(dir);

    const failure = runAdd({ feature: "shadcn", provider: "neon" }, runtime);

    await expect(failure).rejects.toBeInstanceOf(UserInputError);
    await expect(failure).rejects.toMatchObject({ message: "The shadcn feature does not take --provider.", exitCode: 2 });
    expect(calls).toEqual([]);
    expect(probed).toEqual([]);
    expect(clack.module.intro).not.toHaveBeenCalled();
  });

  it("matches feature names case-sensitively", async () => {
    const dir = await makeTempDir();
    const { runtime } = runtimeFor(dir);

    await expect(runAdd({ feature: "Drizzle" }, runtime)).rejects.toThrow(
      'Unknown feature "Drizzle". Available features: shadcn, magicui, drizzle.'
    );
  });

  it("installs with the recorded package manager", async () => {
    const dir = await makeTempDir();
    await mkdir(join(dir, "app"));
    await mkdir(join(dir, ".stackwright"));
    await writeFile(join(dir, ".stackwright", "config"), "package_manager=pnpm\n", "utf8");
    const { runtime, calls, probed } = runtimeFor(dir, ["bun"]);

    await runAdd({ feature: "magicui" }, runtime);

    expect(probed).toEqual([]);
    expect(calls.map((call) => [call.command, ...call.args])).toEqual([
      ["pnpm", "add", "motion", "clsx", "tailwind-merge"]
    ]);
  });

  it("prompts for the feature with the first entry preselected", async () => {
    const dir = await makeTempDir();
    await mkdir(join(dir, "src"));
    const { runtime, calls } = runtimeFor(dir, ["yarn"]);
    clack.answers.push("shadcn");

    await runAdd({}, runtime);

    expect(clack.module.select).toHaveBeenCalledWith(
      expect.objectContaining({ message: "Which feature would you like to add?", initialValue: "shadcn" })
    );
    expect(calls[0]?.command).toBe("yarn");
    expect(calls[0]?.options).toEqual({ cwd: dir });
  });

  it("stops when the project structure cannot be detected", async () => {
    const dir = await makeTempDir();
    const { runtime, calls } = runtimeFor(dir);

    await expect(runAdd({ feature: "shadcn" }, runtime)).rejects.toBeInstanceOf(StructureNotDetectedError);
    expect(calls).toEqual([]);
  });

  it("builds the feature context once from the runtime", async () => {
    const dir = await makeTempDir();
    await mkdir(join(dir, "src"));
    const { runtime } = runtimeFor(dir, ["pnpm", "npm"]);

    const context = await buildFeatureContext(runtime);

    expect(context.packageManager).toBe("pnpm");
    expect(context.structure).toBe("src-dir");
    expect(context.paths.db).toBe("src/db");
    expect(context.runner).toBe(runtime.runner);
  });
});
