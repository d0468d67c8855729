import { readProjectFile, writeProjectFile } from "./write.js";

export const MANIFEST_FILE = "package.json";

/**
 * `missing`: no package.json. `invalid`: not a JSON object, left untouched.
 * `present`: the marker script already exists, nothing written.
 */
export type ManifestPatchOutcome = "patched" | "present" | "missing" | "invalid";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseManifest(raw: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Inserts `scripts` at the head of the manifest's `scripts` section unless `markerScript`
 * is already defined there. Scripts the manifest already defines keep their values.
 */
export async function insertScriptsOnce(
  projectDir: string,
  scripts: Record<string, string>,
  markerScript: string
): Promise<ManifestPatchOutcome> {
  const raw = await readProjectFile(projectDir, MANIFEST_FILE);
  if (raw === null) return "missing";

  const manifest = parseManifest(raw);
  if (!manifest) return "invalid";

  const currentScripts = isRecord(manifest.scripts) ? manifest.scripts : {};
  if (markerScript in currentScripts) return "present";

  manifest.scripts = { ...scripts, ...currentScripts };
  await writeProjectFile(projectDir, MANIFEST_FILE, `${JSON.stringify(manifest, null, 2)}\n`);
  return "patched";
}
