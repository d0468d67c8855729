import { projectPath } from "../core/project-structure.js";
import type { FeatureContext } from "./types.js";
import { applyUiKit, type UiKitRecipe, type UiKitResult } from "./ui-kit.js";

export const MAGICUI_KEYFRAMES_MARKER = "/* stackwright:magicui keyframes */";

export const MAGICUI_RECIPE: UiKitRecipe = {
  label: "Magic UI",
  dependencies: ["motion", "clsx", "tailwind-merge"],
  files: [
    // Shared with shadcn/ui, which may have written it already.
    { template: "shared/cn-utils.ts.tpl", target: (paths) => projectPath(paths.lib, "utils.ts"), keepExisting: true },
    {
      template: "magicui/shimmer-button.tsx.tpl",
      target: (paths) => projectPath(paths.components, "magicui", "shimmer-button.tsx")
    },
    { template: "magicui/marquee.tsx.tpl", target: (paths) => projectPath(paths.components, "magicui", "marquee.tsx") }
  ],
  stylesheet: { template: "magicui/globals.css.tpl", marker: MAGICUI_KEYFRAMES_MARKER }
};

export function addMagicUi(context: FeatureContext): Promise<UiKitResult> {
  return applyUiKit(context, MAGICUI_RECIPE);
}
