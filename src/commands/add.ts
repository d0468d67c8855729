import { intro, outro, select } from "@clack/prompts";

import { UserInputError } from "../core/errors.js";
import { resolvePackageManager } from "../core/package-manager.js";
import { unwrapPrompt } from "../core/prompts/interaction.js";
import { detectProjectStructure, projectPaths } from "../core/project-structure.js";
import { resolveTemplatesDir } from "../core/templates.js";
import type { AddCommandOptions } from "../core/types.js";
import { FEATURES, requireFeature } from "../features/registry.js";
import type { FeatureContext, FeatureDefinition } from "../features/types.js";
import { defaultRuntime, type CommandRuntime } from "./runtime.js";

async function chooseFeature(requested: string | undefined): Promise<FeatureDefinition> {
  if (requested !== undefined) return requireFeature(requested.trim());

  const first = FEATURES[0];
  const name = unwrapPrompt(
    await select({
      message: "Which feature would you like to add?",
      options: FEATURES.map((feature) => ({ value: feature.name, label: feature.name, hint: feature.description })),
      ...(first ? { initialValue: first.name } : {})
    })
  );
  return requireFeature(name);
}

export async function buildFeatureContext(runtime: CommandRuntime): Promise<FeatureContext> {
  const templatesDir = resolveTemplatesDir(runtime.env);
  const packageManager = await resolvePackageManager(runtime.cwd, { probe: runtime.probe });
  const structure = await detectProjectStructure(runtime.cwd);
  return {
    cwd: runtime.cwd,
    packageManager,
    structure,
    paths: projectPaths(structure),
    runner: runtime.runner,
    templatesDir
  };
}

export async function runAdd(options: AddCommandOptions, runtime: CommandRuntime = defaultRuntime()): Promise<void> {
  // Validated before any detection so an unknown name touches nothing.
  const feature = await chooseFeature(options.feature);
  if (options.provider !== undefined && feature.acceptsProvider !== true) {
    throw new UserInputError(`The ${feature.name} feature does not take --provider.`);
  }

  intro(`Adding ${feature.name}`);
  const context = await buildFeatureContext(runtime);
  await feature.run(context, options.provider !== undefined ? { provider: options.provider } : {});
  outro(`${feature.name} added.`);
}
