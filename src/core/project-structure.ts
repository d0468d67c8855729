import { stat } from "node:fs/promises";
import { join } from "node:path";

import { StructureNotDetectedError } from "./errors.js";
import type { ProjectStructure } from "./types.js";

export interface ProjectPaths {
  globalsCss: string;
  lib: string;
  db: string;
  apiRoute: string;
  components: string;
  /** Directory holding `db/`; example scripts and generated clients sit beside it. */
  sourceRoot: string;
}

const PROJECT_PATHS: Record<ProjectStructure, ProjectPaths> = {
  "app-dir": {
    globalsCss: "app/globals.css",
    lib: "lib",
    db: "db",
    apiRoute: "app/api/users/route.ts",
    components: "components",
    sourceRoot: "."
  },
  "src-dir": {
    globalsCss: "src/app/globals.css",
    lib: "src/lib",
    db: "src/db",
    apiRoute: "src/pages/api/users.ts",
    components: "src/components",
    sourceRoot: "src"
  }
};

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function detectProjectStructure(cwd: string): Promise<ProjectStructure> {
  if (await isDirectory(join(cwd, "app"))) return "app-dir";
  if (await isDirectory(join(cwd, "src"))) return "src-dir";
  throw new StructureNotDetectedError(cwd);
}

export function projectPaths(structure: ProjectStructure): ProjectPaths {
  return { ...PROJECT_PATHS[structure] };
}

export function isAppRouter(structure: ProjectStructure): boolean {
  return structure === "app-dir";
}

/** Joins project-relative segments, dropping the `.` source root. */
export function projectPath(...segments: string[]): string {
  return segments.filter((segment) => segment !== "." && segment !== "").join("/");
}
