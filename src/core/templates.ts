import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { ConfigError, IoError } from "./errors.js";

export const TEMPLATES_DIR_ENV = "STACKWRIGHT_TEMPLATES_DIR";

/** Present in every complete template root; used to recognise it while walking up. */
const TEMPLATES_SENTINEL = join("drizzle", "providers.json");

export type TemplateVariables = Record<string, string>;

/**
 * Template root: `$STACKWRIGHT_TEMPLATES_DIR` when set, else the `templates/` directory
 * shipped with the package. The module sits at `src/core/` in development and is
 * bundled into `dist/` for release, so the root is found by walking upward.
 */
export function resolveTemplatesDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[TEMPLATES_DIR_ENV]?.trim();
  if (override) {
    const overrideDir = resolve(override);
    if (!existsSync(join(overrideDir, TEMPLATES_SENTINEL))) {
      throw new ConfigError(`${TEMPLATES_DIR_ENV} points at ${overrideDir}, which has no ${TEMPLATES_SENTINEL}.`);
    }
    return overrideDir;
  }

  const moduleDir = dirname(fileURLToPath(import.meta.url));
  let dir = moduleDir;
  for (let depth = 0; depth < 6; depth += 1) {
    const candidate = join(dir, "templates");
    if (existsSync(join(candidate, TEMPLATES_SENTINEL))) return candidate;
    dir = dirname(dir);
  }

  throw new ConfigError(`Could not locate templates/. Searched upwards from: ${moduleDir}`);
}

export async function loadTemplate(templatesDir: string, relativePath: string): Promise<string> {
  const path = join(templatesDir, relativePath);
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    throw new IoError("read template", path, error);
  }
}

/** Replaces `{{name}}` for every supplied variable; other text is left as is. */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  let result = template;
  for (const [name, value] of Object.entries(variables)) {
    result = result.replaceAll(`{{${name}}}`, value);
  }
  return result;
}

export async function loadAndRender(
  templatesDir: string,
  relativePath: string,
  variables: TemplateVariables = {}
): Promise<string> {
  return renderTemplate(await loadTemplate(templatesDir, relativePath), variables);
}
