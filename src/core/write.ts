import { access, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { IoError } from "./errors.js";
import type { FileArtifact } from "./types.js";

function normalize(path: string): string {
  return path.replaceAll("\\", "/");
}

export interface ArtifactWriteProgress {
  current: number;
  total: number;
  path: string;
}

export interface WriteArtifactsOptions {
  onProgress?: (event: ArtifactWriteProgress) => void;
}

export type AppendOutcome = "created" | "appended" | "present";

async function guardIo<T>(operation: string, path: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof IoError) throw error;
    throw new IoError(operation, path, error);
  }
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function ensureProjectDirectory(projectDir: string, relativePath: string): Promise<void> {
  await guardIo("create directory", normalize(relativePath), async () => {
    await mkdir(join(projectDir, relativePath), { recursive: true });
  });
}

/** Writes (or overwrites) a project file, creating parent directories first. */
export async function writeProjectFile(projectDir: string, relativePath: string, content: string): Promise<void> {
  const parent = dirname(relativePath);
  if (parent !== ".") {
    await ensureProjectDirectory(projectDir, parent);
  }
  await guardIo("write", normalize(relativePath), async () => {
    await writeFile(join(projectDir, relativePath), content, "utf8");
  });
}

/** File contents, or `null` when the file does not exist. */
export async function readProjectFile(projectDir: string, relativePath: string): Promise<string | null> {
  const absolutePath = join(projectDir, relativePath);
  if (!(await pathExists(absolutePath))) return null;
  return guardIo("read", normalize(relativePath), () => readFile(absolutePath, "utf8"));
}

export async function writeProjectFileIfMissing(
  projectDir: string,
  relativePath: string,
  content: string
): Promise<boolean> {
  if (await pathExists(join(projectDir, relativePath))) return false;
  await writeProjectFile(projectDir, relativePath, content);
  return true;
}

export interface AppendBlockOptions {
  /** Fixed text placed between existing content and the block; by default one blank line. */
  separator?: string;
}

/**
 * Appends `block` unless the file already contains `marker`.
 * A missing file is created holding only the block.
 */
export async function appendBlockIfMissing(
  projectDir: string,
  relativePath: string,
  block: string,
  marker: string,
  options: AppendBlockOptions = {}
): Promise<AppendOutcome> {
  const existing = await readProjectFile(projectDir, relativePath);
  if (existing === null) {
    await writeProjectFile(projectDir, relativePath, block);
    return "created";
  }
  if (existing.includes(marker)) return "present";

  const separator =
    existing.length === 0 ? "" : (options.separator ?? (existing.endsWith("\n") ? "\n" : "\n\n"));
  await writeProjectFile(projectDir, relativePath, `${existing}${separator}${block}`);
  return "appended";
}

export async function writeArtifacts(
  projectDir: string,
  files: FileArtifact[],
  options: WriteArtifactsOptions = {}
): Promise<void> {
  let written = 0;
  for (const file of files) {
    await writeProjectFile(projectDir, file.path, file.content);
    written += 1;
    options.onProgress?.({
      current: written,
      total: files.length,
      path: normalize(file.path)
    });
  }
}
