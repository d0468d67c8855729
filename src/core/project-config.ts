import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { z } from "zod";

import { IoError } from "./errors.js";
import { PACKAGE_MANAGERS, type PackageManager } from "./types.js";

export const CONFIG_DIR_NAME = ".stackwright";
export const CONFIG_FILE_NAME = "config";

const PACKAGE_MANAGER_KEY = "package_manager";

const packageManagerSchema = z.enum(PACKAGE_MANAGERS);

export interface ProjectConfig {
  packageManager?: PackageManager;
}

export function projectConfigPath(projectDir: string): string {
  return join(projectDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function parseProjectConfig(raw: string): ProjectConfig {
  const entries = new Map<string, string>();
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const separator = trimmed.indexOf("=");
    if (separator <= 0) continue;
    entries.set(trimmed.slice(0, separator).trim(), trimmed.slice(separator + 1).trim());
  }

  const packageManager = packageManagerSchema.safeParse(entries.get(PACKAGE_MANAGER_KEY));
  return packageManager.success ? { packageManager: packageManager.data } : {};
}

export function serializeProjectConfig(config: Required<ProjectConfig>): string {
  return `${PACKAGE_MANAGER_KEY}=${config.packageManager}\n`;
}

export async function readProjectConfig(projectDir: string): Promise<ProjectConfig> {
  const path = projectConfigPath(projectDir);
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) return {};
    throw new IoError("read", path, error);
  }
  return parseProjectConfig(raw);
}

export async function writeProjectConfig(projectDir: string, config: Required<ProjectConfig>): Promise<string> {
  const path = projectConfigPath(projectDir);
  try {
    await mkdir(join(projectDir, CONFIG_DIR_NAME), { recursive: true });
    await writeFile(path, serializeProjectConfig(config), "utf8");
  } catch (error) {
    throw new IoError("write", path, error);
  }
  return path;
}
