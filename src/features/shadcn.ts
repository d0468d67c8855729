import { projectPath } from "../core/project-structure.js";
import type { FeatureContext } from "./types.js";
import { applyUiKit, type UiKitRecipe, type UiKitResult } from "./ui-kit.js";

export const SHADCN_THEME_MARKER = "/* stackwright:shadcn theme */";

export const SHADCN_RECIPE: UiKitRecipe = {
  label: "shadcn/ui",
  dependencies: ["class-variance-authority", "clsx", "tailwind-merge", "lucide-react", "tailwindcss-animate"],
  files: [
    { template: "shadcn/components.json.tpl", target: () => "components.json" },
    { template: "shared/cn-utils.ts.tpl", target: (paths) => projectPath(paths.lib, "utils.ts") }
  ],
  stylesheet: { template: "shadcn/globals.css.tpl", marker: SHADCN_THEME_MARKER }
};

export function addShadcn(context: FeatureContext): Promise<UiKitResult> {
  return applyUiKit(context, SHADCN_RECIPE);
}
