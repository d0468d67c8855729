import { NoPackageManagerFoundError, UserInputError } from "./errors.js";
import { runCommand } from "./process.js";
import { readProjectConfig } from "./project-config.js";
import { PACKAGE_MANAGERS, type CommandSpec, type PackageManager } from "./types.js";

export type BinaryProbe = (binary: string) => Promise<boolean>;

/** Preference order when nothing is recorded for the project. */
export const PROBE_ORDER: readonly PackageManager[] = ["bun", "pnpm", "yarn", "npm"];

const PROBE_TIMEOUT_MS = 10_000;

const INSTALL_COMMANDS: Record<PackageManager, CommandSpec> = {
  npm: { command: "npm", args: ["install"] },
  yarn: { command: "yarn", args: ["add"] },
  pnpm: { command: "pnpm", args: ["add"] },
  bun: { command: "bun", args: ["add"] }
};

const INSTALL_DEV_COMMANDS: Record<PackageManager, CommandSpec> = {
  npm: { command: "npm", args: ["install", "-D"] },
  yarn: { command: "yarn", args: ["add", "-D"] },
  pnpm: { command: "pnpm", args: ["add", "-D"] },
  bun: { command: "bun", args: ["add", "-D"] }
};

const SCAFFOLD_COMMANDS: Record<PackageManager, CommandSpec> = {
  npm: { command: "npx", args: ["create-next-app@latest"] },
  yarn: { command: "yarn", args: ["create", "next-app"] },
  pnpm: { command: "pnpm", args: ["create", "next-app"] },
  bun: { command: "bunx", args: ["create-next-app@latest"] }
};

function copySpec(spec: CommandSpec): CommandSpec {
  return { command: spec.command, args: [...spec.args] };
}

export function installCommand(packageManager: PackageManager): CommandSpec {
  return copySpec(INSTALL_COMMANDS[packageManager]);
}

export function installDevCommand(packageManager: PackageManager): CommandSpec {
  return copySpec(INSTALL_DEV_COMMANDS[packageManager]);
}

export function scaffoldCommand(packageManager: PackageManager, projectName: string): CommandSpec {
  const base = SCAFFOLD_COMMANDS[packageManager];
  return { command: base.command, args: [...base.args, projectName, `--use-${packageManager}`] };
}

/** How the user runs a package.json script with this manager, for printed next steps. */
export function runScriptCommand(packageManager: PackageManager, script: string): string {
  switch (packageManager) {
    case "npm":
      return `npm run ${script}`;
    case "bun":
      return `bun run ${script}`;
    case "yarn":
    case "pnpm":
      return `${packageManager} ${script}`;
  }
}

export function withPackages(spec: CommandSpec, packages: readonly string[]): CommandSpec {
  return { command: spec.command, args: [...spec.args, ...packages] };
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(" ");
}

export function isPackageManager(value: string): value is PackageManager {
  return PACKAGE_MANAGERS.some((candidate) => candidate === value);
}

export function normalizePackageManager(value: string | undefined): PackageManager | undefined {
  const normalized = value?.trim().toLowerCase();
  if (!normalized) return undefined;
  if (isPackageManager(normalized)) return normalized;
  throw new UserInputError(
    `Invalid --package-manager value "${value}". Expected one of: ${PACKAGE_MANAGERS.join(", ")}.`
  );
}

export const probeBinary: BinaryProbe = async (binary) => {
  const result = await runCommand(binary, ["--version"], { cwd: process.cwd(), timeoutMs: PROBE_TIMEOUT_MS });
  return result.ok;
};

export async function detectPackageManager(probe: BinaryProbe = probeBinary): Promise<PackageManager> {
  for (const candidate of PROBE_ORDER) {
    if (await probe(candidate)) return candidate;
  }
  throw new NoPackageManagerFoundError(PROBE_ORDER);
}

/**
 * The package manager recorded in the project's marker file, or the first installed one.
 * Never writes the marker; `create` owns that.
 */
export async function resolvePackageManager(
  projectDir: string,
  options: { probe?: BinaryProbe } = {}
): Promise<PackageManager> {
  const config = await readProjectConfig(projectDir);
  if (config.packageManager) return config.packageManager;
  return detectPackageManager(options.probe);
}
