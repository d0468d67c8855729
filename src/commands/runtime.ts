import { probeBinary, type BinaryProbe } from "../core/package-manager.js";
import { runCommand, type CommandRunner } from "../core/process.js";

/** Process-level collaborators a command needs; tests swap in fakes. */
export interface CommandRuntime {
  cwd: string;
  runner: CommandRunner;
  probe: BinaryProbe;
  env: NodeJS.ProcessEnv;
}

export function defaultRuntime(overrides: Partial<CommandRuntime> = {}): CommandRuntime {
  return {
    cwd: process.cwd(),
    runner: runCommand,
    probe: probeBinary,
    env: process.env,
    ...overrides
  };
}
