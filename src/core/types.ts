export { PACKAGE_MANAGERS } from "./types/common.js";
export type { CommandSpec, FileArtifact, PackageManager, ProjectStructure } from "./types/common.js";
export type { AddCommandOptions, CreateCommandOptions, ListCommandOptions } from "./types/commands.js";
