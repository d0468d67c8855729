import { normalizeOutputFormat } from "../core/errors.js";
import type { ListCommandOptions } from "../core/types.js";
import { FEATURES } from "../features/registry.js";

export interface FeatureListing {
  name: string;
  description: string;
  usage: string;
}

export function listFeatures(): FeatureListing[] {
  return FEATURES.map(({ name, description, usage }) => ({ name, description, usage }));
}

export function renderFeatureList(features: readonly FeatureListing[]): string {
  const width = Math.max(...features.map((feature) => feature.name.length));
  const lines = ["Available features:", ""];
  for (const feature of features) {
    lines.push(`  ${feature.name.padEnd(width)}  ${feature.description}`);
    lines.push(`  ${" ".repeat(width)}  usage: ${feature.usage}`);
  }
  return lines.join("\n");
}

export function runList(options: ListCommandOptions, write: (line: string) => void = console.log): void {
  const format = normalizeOutputFormat(options.format);
  const features = listFeatures();
  if (format === "json") {
    write(JSON.stringify({ features }, null, 2));
    return;
  }
  write(renderFeatureList(features));
}
