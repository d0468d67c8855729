export const PACKAGE_MANAGERS = ["npm", "yarn", "pnpm", "bun"] as const;

export type PackageManager = (typeof PACKAGE_MANAGERS)[number];
export type ProjectStructure = "app-dir" | "src-dir";

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface FileArtifact {
  path: string;
  content: string;
}
