import { UnknownFeatureError } from "../core/errors.js";
import { addDrizzle } from "./drizzle.js";
import { addMagicUi } from "./magicui.js";
import { addShadcn } from "./shadcn.js";
import type { FeatureDefinition } from "./types.js";

export const FEATURES: readonly FeatureDefinition[] = [
  {
    name: "shadcn",
    description: "shadcn/ui component setup: cn helper, components.json and theme variables",
    usage: "stackwright add --feature shadcn",
    run: async (context) => {
      await addShadcn(context);
    }
  },
  {
    name: "magicui",
    description: "Magic UI animated components (shimmer button, marquee)",
    usage: "stackwright add --feature magicui",
    run: async (context) => {
      await addMagicUi(context);
    }
  },
  {
    name: "drizzle",
    description: "Drizzle ORM with a choice of PostgreSQL providers",
    usage: "stackwright add --feature drizzle [--provider <id>]",
    acceptsProvider: true,
    run: async (context, options) => {
      await addDrizzle(context, options);
    }
  }
];

export function featureNames(): string[] {
  return FEATURES.map((feature) => feature.name);
}

/** Case-sensitive lookup. */
export function findFeature(name: string): FeatureDefinition | undefined {
  return FEATURES.find((feature) => feature.name === name);
}

export function requireFeature(name: string): FeatureDefinition {
  const feature = findFeature(name);
  if (!feature) throw new UnknownFeatureError(name, featureNames());
  return feature;
}
