import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { z } from "zod";

import { ConfigError, UserInputError } from "../../core/errors.js";
import { pathExists } from "../../core/write.js";

export const PROVIDERS_FILE = join("drizzle", "providers.json");

const nonEmpty = z.string().trim().min(1);

const providerSchema = z.object({
  id: z.string().regex(/^[a-z0-9-]+$/, "must be lowercase kebab-case"),
  label: nonEmpty,
  description: nonEmpty,
  envVar: z.string().regex(/^[A-Z][A-Z0-9_]*$/, "must be an upper-case environment variable name"),
  envExample: nonEmpty,
  driver: nonEmpty,
  dependencies: z.array(nonEmpty).min(1),
  devDependencies: z.array(nonEmpty).min(1),
  templates: z.object({
    config: nonEmpty,
    schema: nonEmpty,
    connection: nonEmpty,
    env: nonEmpty,
    example: nonEmpty,
    apiRoute: z.object({
      appRouter: nonEmpty,
      pagesRouter: nonEmpty
    })
  }),
  generatedClient: z
    .object({
      template: nonEmpty,
      fileName: nonEmpty,
      description: nonEmpty
    })
    .optional(),
  nextSteps: z.array(nonEmpty).default([]),
  exampleRunner: z.enum(["tsx", "bun"]).default("tsx")
});

const registrySchema = z.object({
  version: z.literal(1),
  providers: z.array(providerSchema).min(1)
});

export type DatabaseProvider = z.infer<typeof providerSchema>;

function templatePaths(provider: DatabaseProvider): string[] {
  const { templates } = provider;
  return [
    templates.config,
    templates.schema,
    templates.connection,
    templates.env,
    templates.example,
    templates.apiRoute.appRouter,
    templates.apiRoute.pagesRouter,
    ...(provider.generatedClient ? [provider.generatedClient.template] : [])
  ];
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseProviderRegistry(raw: unknown): DatabaseProvider[] {
  const parsed = registrySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${PROVIDERS_FILE}: ${formatIssues(parsed.error)}`);
  }

  const seen = new Set<string>();
  for (const provider of parsed.data.providers) {
    if (seen.has(provider.id)) {
      throw new ConfigError(`Invalid ${PROVIDERS_FILE}: duplicate provider id "${provider.id}".`);
    }
    seen.add(provider.id);
  }
  return parsed.data.providers;
}

/**
 * Reads and validates the provider registry, then checks that every template it
 * references exists under `templatesDir`.
 */
export async function loadProviderRegistry(templatesDir: string): Promise<DatabaseProvider[]> {
  const path = join(templatesDir, PROVIDERS_FILE);
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    throw new ConfigError(`Could not read provider registry at ${path}.`, { cause: error });
  }

  const providers = parseProviderRegistry(raw);
  for (const provider of providers) {
    for (const template of templatePaths(provider)) {
      if (!(await pathExists(join(templatesDir, "drizzle", template)))) {
        throw new ConfigError(`Provider "${provider.id}" references missing template drizzle/${template}.`, {
          details: { provider: provider.id, template }
        });
      }
    }
  }
  return providers;
}

export function findProvider(providers: readonly DatabaseProvider[], id: string): DatabaseProvider {
  const match = providers.find((provider) => provider.id === id);
  if (match) return match;
  throw new UserInputError(
    `Unknown database provider "${id}". Available providers: ${providers.map((provider) => provider.id).join(", ")}.`,
    { details: { provider: id } }
  );
}
