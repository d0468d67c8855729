import { log, note, select, spinner } from "@clack/prompts";

import { insertScriptsOnce, MANIFEST_FILE, type ManifestPatchOutcome } from "../core/manifest.js";
import { unwrapPrompt } from "../core/prompts/interaction.js";
import { bulletList } from "../core/text.js";
import { appendBlockIfMissing, ensureProjectDirectory, writeArtifacts, type AppendOutcome } from "../core/write.js";
import type { FileArtifact } from "../core/types.js";
import {
  DRIZZLE_MARKER_SCRIPT,
  DRIZZLE_SCRIPTS,
  ENV_FILE,
  MIGRATIONS_DIR,
  drizzleNextSteps,
  exampleFiles,
  renderDrizzleArtifacts,
  setupFiles
} from "./drizzle/artifacts.js";
import { findProvider, loadProviderRegistry, type DatabaseProvider } from "./drizzle/providers.js";
import { installPackages, type DependencySet } from "./install.js";
import type { FeatureContext, FeatureOptions } from "./types.js";

export interface DrizzleSetupResult {
  provider: DatabaseProvider;
  files: string[];
  manifest: ManifestPatchOutcome;
  env: AppendOutcome;
  nextSteps: string[];
}

async function chooseProvider(providers: DatabaseProvider[], requested: string | undefined): Promise<DatabaseProvider> {
  if (requested !== undefined) return findProvider(providers, requested.trim());

  const first = providers[0];
  const choice = unwrapPrompt(
    await select({
      message: "Which database provider?",
      options: providers.map((provider) => ({
        value: provider.id,
        label: `${provider.label} - ${provider.description}`
      })),
      ...(first ? { initialValue: first.id } : {})
    })
  );
  return findProvider(providers, choice);
}

async function installProviderDependencies(context: FeatureContext, provider: DatabaseProvider): Promise<void> {
  const sets: Array<{ set: DependencySet; packages: string[] }> = [
    { set: "runtime", packages: provider.dependencies },
    { set: "dev", packages: provider.devDependencies }
  ];

  for (const { set, packages } of sets) {
    const installSpinner = spinner();
    installSpinner.start(`Installing ${provider.label} ${set} dependencies with ${context.packageManager}...`);
    try {
      await installPackages(context, packages, {
        dev: set === "dev",
        failureMessage: `Failed to install ${set} dependencies for ${provider.label}`,
        details: { provider: provider.id, dependencySet: set }
      });
    } catch (error) {
      installSpinner.stop(`Installing ${set} dependencies failed.`, 2);
      throw error;
    }
    installSpinner.stop(`Installed ${packages.join(", ")}.`);
  }
}

function reportManifest(outcome: ManifestPatchOutcome): void {
  switch (outcome) {
    case "patched":
      log.success(`Added ${Object.keys(DRIZZLE_SCRIPTS).join(", ")} scripts to ${MANIFEST_FILE}.`);
      return;
    case "present":
      log.info(`${MANIFEST_FILE} already has Drizzle scripts; left unchanged.`);
      return;
    case "missing":
      log.warn(`No ${MANIFEST_FILE} found; skipped adding Drizzle scripts.`);
      return;
    case "invalid":
      log.warn(`${MANIFEST_FILE} is not valid JSON; skipped adding Drizzle scripts.`);
  }
}

function reportEnv(outcome: AppendOutcome, envVar: string): void {
  if (outcome === "created") log.success(`Created ${ENV_FILE} with ${envVar}.`);
  else if (outcome === "appended") log.success(`Added ${envVar} to ${ENV_FILE}.`);
  else log.info(`${ENV_FILE} already mentions ${envVar}; left unchanged.`);
}

type Spinner = ReturnType<typeof spinner>;

async function writeStep(message: string, action: (progress: Spinner) => Promise<void>): Promise<void> {
  const writeSpinner = spinner();
  writeSpinner.start(message);
  try {
    await action(writeSpinner);
  } catch (error) {
    writeSpinner.stop("Writing Drizzle files failed.", 2);
    throw error;
  }
  writeSpinner.stop(message.replace(/^Writing/, "Wrote").replace(/\.\.\.$/, "."));
}

function writeFiles(context: FeatureContext, files: FileArtifact[], progress: Spinner): Promise<void> {
  return writeArtifacts(context.cwd, files, {
    onProgress(event) {
      progress.message(`Writing files ${event.current}/${event.total}: ${event.path}`);
    }
  });
}

export async function addDrizzle(context: FeatureContext, options: FeatureOptions = {}): Promise<DrizzleSetupResult> {
  const providers = await loadProviderRegistry(context.templatesDir);
  const provider = await chooseProvider(providers, options.provider);

  await installProviderDependencies(context, provider);

  const artifacts = await renderDrizzleArtifacts(context, provider);
  const setup = setupFiles(artifacts);
  const examples = exampleFiles(artifacts);

  await writeStep("Writing Drizzle config, schema and connection...", async (progress) => {
    await ensureProjectDirectory(context.cwd, context.paths.db);
    await writeFiles(context, setup, progress);
    await ensureProjectDirectory(context.cwd, MIGRATIONS_DIR);
  });

  const manifest = await insertScriptsOnce(context.cwd, { ...DRIZZLE_SCRIPTS }, DRIZZLE_MARKER_SCRIPT);
  reportManifest(manifest);

  // The env block is always set off by a blank line, even after a trailing newline.
  const env = await appendBlockIfMissing(context.cwd, ENV_FILE, artifacts.env, provider.envVar, { separator: "\n\n" });
  reportEnv(env, provider.envVar);

  await writeStep("Writing Drizzle examples...", (progress) => writeFiles(context, examples, progress));

  const files = [...setup, ...examples];
  const nextSteps = drizzleNextSteps(provider, artifacts, context.packageManager);
  const filePaths = files.map((file) => file.path);

  note(bulletList(filePaths), "Files created");
  note(bulletList(nextSteps.map((step, index) => `${index + 1}. ${step}`), " "), "Next steps");
  note(`Database: ${provider.label}\nDriver: ${provider.driver}`, "Provider details");
  if (provider.generatedClient) {
    log.warn(`${provider.generatedClient.description}: ${artifacts.generatedClient?.path ?? provider.generatedClient.fileName}`);
  }

  return { provider, files: filePaths, manifest, env, nextSteps };
}
