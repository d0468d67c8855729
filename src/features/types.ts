import type { CommandRunner } from "../core/process.js";
import type { ProjectPaths } from "../core/project-structure.js";
import type { PackageManager, ProjectStructure } from "../core/types.js";

/** Everything a feature handler knows about the target project, resolved once per `add`. */
export interface FeatureContext {
  cwd: string;
  packageManager: PackageManager;
  structure: ProjectStructure;
  paths: ProjectPaths;
  runner: CommandRunner;
  templatesDir: string;
}

export interface FeatureOptions {
  provider?: string;
}

export interface FeatureDefinition {
  name: string;
  description: string;
  usage: string;
  /** Whether `--provider` means anything to this feature. */
  acceptsProvider?: boolean;
  run: (context: FeatureContext, options: FeatureOptions) => Promise<void>;
}
