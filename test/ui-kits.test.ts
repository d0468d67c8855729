import { mkdtemp, mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { SubprocessFailedError } from "../src/core/errors.js";
import type { CommandRunner } from "../src/core/process.js";
import { projectPaths } from "../src/core/project-structure.js";
import { resolveTemplatesDir } from "../src/core/templates.js";
import type { ProjectStructure } from "../src/core/types.js";
import { MAGICUI_KEYFRAMES_MARKER, addMagicUi } from "../src/features/magicui.js";
import { SHADCN_THEME_MARKER, addShadcn } from "../src/features/shadcn.js";
import type { FeatureContext } from "../src/features/types.js";
import { fakeRunner } from "./support/fakes.js";

const clack = await vi.hoisted(async () => {
  const { createClackMock } = await import("./support/clack-mock.js");
  return createClackMock();
});

vi.mock("@clack/prompts", () => clack.module);

const tempDirs: string[] = [];

async function makeProject(structure: ProjectStructure): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), "stackwright-ui-"));
  tempDirs.push(dir);
  await mkdir(join(dir, structure === "app-dir" ? "app" : "src"));
  return dir;
}

function contextFor(cwd: string, structure: ProjectStructure, runner: CommandRunner): FeatureContext {
  return {
    cwd,
    packageManager: "npm",
    structure,
    paths: projectPaths(structure),
    runner,
    templatesDir: resolveTemplatesDir({})
  };
}

function countOf(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

beforeEach(() => {
  vi.clearAllMocks();
});

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("shadcn feature", () => {
  it("installs its dependencies and writes config, helper and theme", async () => {
    const dir = await makeProject("app-dir");
    await writeFile(join(dir, "app/globals.css"), "@tailwind base;\n", "utf8");
    const { runner, calls } = fakeRunner();

    const result = await addShadcn(contextFor(dir, "app-dir", runner));

    expect(calls.map((call) => [call.command, ...call.args])).toEqual([
      ["npm", "install", "class-variance-authority", "clsx", "tailwind-merge", "lucide-react", "tailwindcss-animate"]
    ]);
    expect(result).toEqual({ written: ["components.json", "lib/utils.ts"], kept: [], stylesheet: "appended" });

    const components: { tailwind: { css: string } } = JSON.parse(await readFile(join(dir, "components.json"), "utf8"));
    expect(components.tailwind.css).toBe("app/globals.css");
    expect(await readFile(join(dir, "lib/utils.ts"), "utf8")).toContain("export function cn(...inputs: ClassValue[]) {");

    const css = await readFile(join(dir, "app/globals.css"), "utf8");
    expect(css.startsWith(`@tailwind base;\n\n${SHADCN_THEME_MARKER}\n`)).toBe(true);
  });

  it("points components.json at the src/ stylesheet and creates it when missing", async () => {
    const dir = await makeProject("src-dir");
    const { runner } = fakeRunner();

    const result = await addShadcn(contextFor(dir, "src-dir", runner));

    expect(result.stylesheet).toBe("created");
    const components: { tailwind: { css: string } } = JSON.parse(await readFile(join(dir, "components.json"), "utf8"));
    expect(components.tailwind.css).toBe("src/app/globals.css");
    expect(await readFile(join(dir, "src/lib/utils.ts"), "utf8")).toContain("twMerge(clsx(inputs))");
  });

  it("appends the theme block only once", async () => {
    const dir = await makeProject("app-dir");
    const { runner } = fakeRunner();

    await addShadcn(contextFor(dir, "app-dir", runner));
    const second = await addShadcn(contextFor(dir, "app-dir", runner));

    expect(second.stylesheet).toBe("present");
    expect(countOf(await readFile(join(dir, "app/globals.css"), "utf8"), SHADCN_THEME_MARKER)).toBe(1);
  });

  it("fails without writing when the install fails", async () => {
    const dir = await makeProject("app-dir");
    const { runner } = fakeRunner(() => ({ ok: false, stdout: "", stderr: "", reason: "exit code 1" }));

    const failure = addShadcn(contextFor(dir, "app-dir", runner));
    await expect(failure).rejects.toBeInstanceOf(SubprocessFailedError);
    await expect(failure).rejects.toThrow("Failed to install shadcn/ui dependencies (exit code 1).");
    await expect(readFile(join(dir, "components.json"), "utf8")).rejects.toThrow();
  });
});

describe("magicui feature", () => {
  it("writes its components and keeps an existing utils helper", async () => {
    const dir = await makeProject("src-dir");
    await mkdir(join(dir, "src/lib"), { recursive: true });
    await writeFile(join(dir, "src/lib/utils.ts"), "// mine\n", "utf8");
    const { runner, calls } = fakeRunner();

    const result = await addMagicUi(contextFor(dir, "src-dir", runner));

    expect(calls.map((call) => [call.command, ...call.args])).toEqual([
      ["npm", "install", "motion", "clsx", "tailwind-merge"]
    ]);
    expect(result).toEqual({
      written: ["src/components/magicui/shimmer-button.tsx", "src/components/magicui/marquee.tsx"],
      kept: ["src/lib/utils.ts"],
      stylesheet: "created"
    });
    expect(await readFile(join(dir, "src/lib/utils.ts"), "utf8")).toBe("// mine\n");
    expect(await readFile(join(dir, "src/components/magicui/marquee.tsx"), "utf8")).toContain("export function Marquee({");
    expect(await readFile(join(dir, "src/app/globals.css"), "utf8")).toContain("@keyframes shimmer-slide {");
  });

  it("adds its keyframes beside an existing shadcn theme once", async () => {
    const dir = await makeProject("app-dir");
    const { runner } = fakeRunner();

    await addShadcn(contextFor(dir, "app-dir", runner));
    await addMagicUi(contextFor(dir, "app-dir", runner));
    await addMagicUi(contextFor(dir, "app-dir", runner));

    const css = await readFile(join(dir, "app/globals.css"), "utf8");
    expect(countOf(css, SHADCN_THEME_MARKER)).toBe(1);
    expect(countOf(css, MAGICUI_KEYFRAMES_MARKER)).toBe(1);
  });
});
