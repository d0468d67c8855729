import { log, spinner } from "@clack/prompts";

import type { ProjectPaths } from "../core/project-structure.js";
import { loadAndRender, loadTemplate } from "../core/templates.js";
import { appendBlockIfMissing, writeProjectFile, writeProjectFileIfMissing, type AppendOutcome } from "../core/write.js";
import { installPackages } from "./install.js";
import type { FeatureContext } from "./types.js";

export interface UiKitFile {
  /** Relative to the template root. */
  template: string;
  target: (paths: ProjectPaths) => string;
  /** Leave an existing file alone instead of overwriting it. */
  keepExisting?: boolean;
}

export interface UiKitRecipe {
  label: string;
  dependencies: readonly string[];
  files: readonly UiKitFile[];
  stylesheet: {
    template: string;
    /** First line of the block; its presence in the stylesheet means the block is already there. */
    marker: string;
  };
}

export interface UiKitResult {
  written: string[];
  kept: string[];
  stylesheet: AppendOutcome;
}

export async function applyUiKit(context: FeatureContext, recipe: UiKitRecipe): Promise<UiKitResult> {
  const installSpinner = spinner();
  installSpinner.start(`Installing ${recipe.label} dependencies with ${context.packageManager}...`);
  try {
    await installPackages(context, recipe.dependencies, {
      failureMessage: `Failed to install ${recipe.label} dependencies`,
      details: { feature: recipe.label }
    });
  } catch (error) {
    installSpinner.stop(`Installing ${recipe.label} dependencies failed.`, 2);
    throw error;
  }
  installSpinner.stop(`Installed ${recipe.dependencies.join(", ")}.`);

  const variables = { globalsCss: context.paths.globalsCss };
  const written: string[] = [];
  const kept: string[] = [];
  for (const file of recipe.files) {
    const target = file.target(context.paths);
    const content = await loadAndRender(context.templatesDir, file.template, variables);
    if (file.keepExisting) {
      const created = await writeProjectFileIfMissing(context.cwd, target, content);
      (created ? written : kept).push(target);
    } else {
      await writeProjectFile(context.cwd, target, content);
      written.push(target);
    }
  }

  const block = await loadTemplate(context.templatesDir, recipe.stylesheet.template);
  const stylesheet = await appendBlockIfMissing(context.cwd, context.paths.globalsCss, block, recipe.stylesheet.marker);

  for (const path of written) log.success(`Created ${path}`);
  for (const path of kept) log.info(`Kept existing ${path}`);
  if (stylesheet === "present") {
    log.info(`${context.paths.globalsCss} already has the ${recipe.label} styles.`);
  } else {
    log.success(`Added ${recipe.label} styles to ${context.paths.globalsCss}`);
  }

  return { written, kept, stylesheet };
}
