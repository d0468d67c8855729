export type CliOutputFormat = "text" | "json";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;

interface StackwrightErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class StackwrightError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: StackwrightErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends StackwrightError {
  constructor(message: string, options: StackwrightErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class UnknownFeatureError extends StackwrightError {
  constructor(feature: string, available: readonly string[]) {
    super(
      `Unknown feature "${feature}". Available features: ${available.join(", ")}.`,
      "UNKNOWN_FEATURE",
      EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE,
      { details: { feature, available: [...available] } }
    );
  }
}

export class ConfigError extends StackwrightError {
  constructor(message: string, options: StackwrightErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class NoPackageManagerFoundError extends StackwrightError {
  constructor(probed: readonly string[]) {
    super(
      "No package manager found. Please install npm, yarn, pnpm, or bun.",
      "NO_PACKAGE_MANAGER",
      EXIT_CODE_OPERATIONAL_FAILURE,
      { details: { probed: [...probed] } }
    );
  }
}

export class StructureNotDetectedError extends StackwrightError {
  constructor(cwd: string) {
    super(
      "Could not detect project structure. Neither 'app' nor 'src' directory found.",
      "STRUCTURE_NOT_DETECTED",
      EXIT_CODE_OPERATIONAL_FAILURE,
      { details: { cwd } }
    );
  }
}

export class SubprocessFailedError extends StackwrightError {
  constructor(message: string, options: StackwrightErrorOptions = {}) {
    super(message, "SUBPROCESS_FAILED", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class IoError extends StackwrightError {
  readonly path: string;
  readonly operation: string;

  constructor(operation: string, path: string, cause: unknown) {
    super(`Failed to ${operation} ${path}`, "IO", EXIT_CODE_OPERATIONAL_FAILURE, {
      cause,
      details: { path, operation }
    });
    this.path = path;
    this.operation = operation;
  }
}

export class ExecutionError extends StackwrightError {
  constructor(message: string, options: StackwrightErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

function isCommanderErrorLike(error: unknown): error is { code: string; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

export function normalizeError(error: unknown): StackwrightError {
  if (error instanceof StackwrightError) return error;
  if (isCommanderErrorLike(error) && error.code.startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: error.code
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

/** Messages of the error and every `cause` below it, outermost first. */
export function describeErrorChain(error: unknown): string[] {
  const messages: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      current = undefined;
    }
  }
  return messages;
}

export function normalizeOutputFormat(value: string | undefined): CliOutputFormat {
  const normalized = value?.trim().toLowerCase() ?? "text";
  if (normalized === "text" || normalized === "json") {
    return normalized;
  }
  throw new UserInputError(`Invalid --format value "${String(value)}". Expected "text" or "json".`);
}

export function resolveOutputFormatFromArgv(argv: string[]): CliOutputFormat {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) continue;
    if (token === "--format") {
      return argv[index + 1]?.trim().toLowerCase() === "json" ? "json" : "text";
    }
    if (!token.startsWith("--format=")) continue;
    return token.slice("--format=".length).trim().toLowerCase() === "json" ? "json" : "text";
  }
  return "text";
}

export function toJsonErrorPayload(error: StackwrightError): Record<string, unknown> {
  return {
    error: {
      code: error.code,
      type: error.name,
      message: error.message,
      exitCode: error.exitCode,
      ...(error.details ? { details: error.details } : {})
    }
  };
}
