import { join } from "node:path";

import { intro, log, note, outro, select, text } from "@clack/prompts";

import { NoPackageManagerFoundError, SubprocessFailedError, UserInputError } from "../core/errors.js";
import {
  detectPackageManager,
  formatCommand,
  normalizePackageManager,
  runScriptCommand,
  scaffoldCommand
} from "../core/package-manager.js";
import { writeProjectConfig } from "../core/project-config.js";
import { unwrapPrompt } from "../core/prompts/interaction.js";
import { bulletList, validateProjectName } from "../core/text.js";
import { PACKAGE_MANAGERS, type CreateCommandOptions, type PackageManager } from "../core/types.js";
import { defaultRuntime, type CommandRuntime } from "./runtime.js";

async function resolveProjectName(requested: string | undefined): Promise<string> {
  if (requested !== undefined) {
    const problem = validateProjectName(requested);
    if (problem) throw new UserInputError(`Invalid --name value "${requested}": ${problem}`);
    return requested.trim();
  }

  const name = unwrapPrompt(
    await text({
      message: "What is your project named?",
      placeholder: "my-app",
      validate: validateProjectName
    })
  );
  return name.trim();
}

async function detectDefaultManager(runtime: CommandRuntime): Promise<PackageManager> {
  try {
    return await detectPackageManager(runtime.probe);
  } catch (error) {
    if (error instanceof NoPackageManagerFoundError) return "npm";
    throw error;
  }
}

async function resolveManagerChoice(requested: string | undefined, runtime: CommandRuntime): Promise<PackageManager> {
  const flagged = normalizePackageManager(requested);
  if (flagged) return flagged;

  const detected = await detectDefaultManager(runtime);
  return unwrapPrompt(
    await select({
      message: "Which package manager would you like to use?",
      options: PACKAGE_MANAGERS.map((pm) => ({
        value: pm,
        label: pm,
        ...(pm === detected ? { hint: "detected" } : {})
      })),
      initialValue: detected
    })
  );
}

export async function runCreate(
  options: CreateCommandOptions,
  runtime: CommandRuntime = defaultRuntime()
): Promise<string> {
  intro("Create a Next.js project");
  const name = await resolveProjectName(options.name);
  const packageManager = await resolveManagerChoice(options.packageManager, runtime);

  const spec = scaffoldCommand(packageManager, name);
  log.step(`Running ${formatCommand(spec)}`);
  const result = await runtime.runner(spec.command, spec.args, { cwd: runtime.cwd, stdio: "inherit" });
  if (!result.ok) {
    const reason = result.reason ?? "unknown failure";
    throw new SubprocessFailedError(`Project generator failed (${reason}).`, {
      details: { command: spec.command, args: spec.args, reason }
    });
  }

  const projectDir = join(runtime.cwd, name);
  await writeProjectConfig(projectDir, { packageManager });
  log.success(`Recorded ${packageManager} as the package manager for ${name}.`);

  note(
    bulletList([`cd ${name}`, "stackwright add", runScriptCommand(packageManager, "dev")]),
    "Next steps"
  );
  outro(`Created ${name}.`);
  return projectDir;
}
