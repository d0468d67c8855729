import { join } from "node:path";

import { formatCommand, runScriptCommand } from "../../core/package-manager.js";
import { isAppRouter, projectPath } from "../../core/project-structure.js";
import { loadAndRender, type TemplateVariables } from "../../core/templates.js";
import type { FileArtifact, PackageManager } from "../../core/types.js";
import type { FeatureContext } from "../types.js";
import type { DatabaseProvider } from "./providers.js";

export const DRIZZLE_CONFIG_FILE = "drizzle.config.ts";
export const MIGRATIONS_DIR = "drizzle";
export const ENV_FILE = ".env";
export const EXAMPLE_FILE = "example-usage.ts";

/** Inserted at the head of `scripts`; `db:generate` doubles as the already-installed marker. */
export const DRIZZLE_SCRIPTS: Readonly<Record<string, string>> = {
  "db:generate": "drizzle-kit generate",
  "db:migrate": "drizzle-kit migrate",
  "db:studio": "drizzle-kit studio",
  "db:push": "drizzle-kit push"
};
export const DRIZZLE_MARKER_SCRIPT = "db:generate";

export interface DrizzleArtifacts {
  config: FileArtifact;
  schema: FileArtifact;
  connection: FileArtifact;
  apiRoute: FileArtifact;
  example: FileArtifact;
  generatedClient?: FileArtifact;
  /** Rendered env block, written to or appended onto `.env`. */
  env: string;
}

export function templateVariables(context: FeatureContext, provider: DatabaseProvider): TemplateVariables {
  return {
    envVar: provider.envVar,
    envExample: provider.envExample,
    schemaPath: `./${projectPath(context.paths.db, "schema.ts")}`
  };
}

export async function renderDrizzleArtifacts(
  context: FeatureContext,
  provider: DatabaseProvider
): Promise<DrizzleArtifacts> {
  const dir = join(context.templatesDir, "drizzle");
  const variables = templateVariables(context, provider);
  const { paths } = context;
  const { templates } = provider;
  const render = (template: string) => loadAndRender(dir, template, variables);

  const apiTemplate = isAppRouter(context.structure) ? templates.apiRoute.appRouter : templates.apiRoute.pagesRouter;

  const artifacts: DrizzleArtifacts = {
    config: { path: DRIZZLE_CONFIG_FILE, content: await render(templates.config) },
    schema: { path: projectPath(paths.db, "schema.ts"), content: await render(templates.schema) },
    connection: { path: projectPath(paths.db, "index.ts"), content: await render(templates.connection) },
    apiRoute: { path: paths.apiRoute, content: await render(apiTemplate) },
    example: { path: projectPath(paths.sourceRoot, EXAMPLE_FILE), content: await render(templates.example) },
    env: await render(templates.env)
  };

  if (provider.generatedClient) {
    artifacts.generatedClient = {
      path: projectPath(paths.sourceRoot, provider.generatedClient.fileName),
      content: await render(provider.generatedClient.template)
    };
  }
  return artifacts;
}

/** Config, schema and connection: written before the migrations folder, scripts and `.env`. */
export function setupFiles(artifacts: DrizzleArtifacts): FileArtifact[] {
  return [artifacts.config, artifacts.schema, artifacts.connection];
}

/** API route, example script and generated client: written last. */
export function exampleFiles(artifacts: DrizzleArtifacts): FileArtifact[] {
  return [artifacts.apiRoute, artifacts.example, ...(artifacts.generatedClient ? [artifacts.generatedClient] : [])];
}

function exampleCommand(provider: DatabaseProvider, examplePath: string): string {
  if (provider.exampleRunner === "bun") return `bun ${examplePath}`;
  return formatCommand({ command: "npx", args: ["tsx", examplePath] });
}

export function drizzleNextSteps(
  provider: DatabaseProvider,
  artifacts: DrizzleArtifacts,
  packageManager: PackageManager
): string[] {
  const clientPath = artifacts.generatedClient?.path ?? "";
  return [
    `Set ${provider.envVar} in ${ENV_FILE} to your database connection string`,
    ...provider.nextSteps.map((step) => step.replaceAll("{{clientPath}}", clientPath)),
    `Generate migrations: ${runScriptCommand(packageManager, "db:generate")}`,
    `Apply migrations: ${runScriptCommand(packageManager, "db:migrate")}`,
    `Try the example: ${exampleCommand(provider, artifacts.example.path)}`,
    `Browse your data: ${runScriptCommand(packageManager, "db:studio")}`
  ];
}
