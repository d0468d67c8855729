import { SubprocessFailedError } from "../core/errors.js";
import { formatCommand, installCommand, installDevCommand, withPackages } from "../core/package-manager.js";
import { clipCommandOutput } from "../core/process.js";
import type { FeatureContext } from "./types.js";

export type DependencySet = "runtime" | "dev";

export interface InstallPackagesOptions {
  dev?: boolean;
  /** Merged into the error details when the install fails. */
  details?: Record<string, unknown>;
  failureMessage?: string;
}

/** Runs one package-manager install in the project; no timeout. */
export async function installPackages(
  context: FeatureContext,
  packages: readonly string[],
  options: InstallPackagesOptions = {}
): Promise<void> {
  if (packages.length === 0) return;

  const base = options.dev ? installDevCommand(context.packageManager) : installCommand(context.packageManager);
  const spec = withPackages(base, packages);
  const result = await context.runner(spec.command, spec.args, { cwd: context.cwd });
  if (result.ok) return;

  const reason = result.reason ?? "unknown failure";
  const output = clipCommandOutput(result);
  const headline = options.failureMessage ?? `\`${formatCommand(spec)}\` failed`;
  throw new SubprocessFailedError(`${headline} (${reason})${output ? `: ${output}` : "."}`, {
    details: {
      command: spec.command,
      args: spec.args,
      reason,
      ...options.details
    }
  });
}
