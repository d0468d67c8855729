import { spawn } from "node:child_process";

export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  reason?: string;
}

export interface RunCommandOptions {
  cwd: string;
  /** `inherit` hands the terminal to the child; nothing is captured. */
  stdio?: "pipe" | "inherit";
  timeoutMs?: number;
  maxBufferBytes?: number;
}

export type CommandRunner = (command: string, args: string[], options: RunCommandOptions) => Promise<CommandResult>;

const DEFAULT_MAX_BUFFER_BYTES = 8 * 1024 * 1024;

function trimToTailWithinBytes(value: string, maxBufferBytes: number): string {
  if (Buffer.byteLength(value, "utf8") <= maxBufferBytes) return value;
  let low = 0;
  let high = value.length;
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const sliced = value.slice(mid);
    if (Buffer.byteLength(sliced, "utf8") > maxBufferBytes) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return value.slice(low);
}

export function runCommand(command: string, args: string[], options: RunCommandOptions): Promise<CommandResult> {
  const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
  const inherit = options.stdio === "inherit";

  return new Promise((resolveResult) => {
    let stdout = "";
    let stderr = "";
    let completed = false;
    let timedOut = false;
    let stdoutTruncated = false;
    let stderrTruncated = false;
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

    const resolveOnce = (result: CommandResult): void => {
      if (completed) return;
      completed = true;
      if (timeoutHandle) clearTimeout(timeoutHandle);
      resolveResult(result);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: inherit ? "inherit" : ["ignore", "pipe", "pipe"]
    });

    const appendChunk = (buffer: string, chunk: string): { next: string; truncated: boolean } => {
      const rawNext = buffer + chunk;
      return {
        next: trimToTailWithinBytes(rawNext, maxBufferBytes),
        truncated: Buffer.byteLength(rawNext, "utf8") > maxBufferBytes
      };
    };

    const withOutputTailNotice = (reason: string): string => {
      if (!stdoutTruncated && !stderrTruncated) return reason;
      return `${reason}; output truncated to last ${maxBufferBytes} bytes per stream`;
    };

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      const appended = appendChunk(stdout, chunk);
      stdout = appended.next;
      stdoutTruncated = stdoutTruncated || appended.truncated;
    });

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      const appended = appendChunk(stderr, chunk);
      stderr = appended.next;
      stderrTruncated = stderrTruncated || appended.truncated;
    });

    child.on("error", (error) => {
      resolveOnce({
        ok: false,
        stdout,
        stderr,
        reason: withOutputTailNotice(error.message)
      });
    });

    child.on("close", (code) => {
      if (timedOut) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          reason: withOutputTailNotice(`timeout after ${(options.timeoutMs ?? 0) / 1000}s`)
        });
        return;
      }
      if (code !== 0) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          reason: withOutputTailNotice(`exit code ${code ?? "unknown"}`)
        });
        return;
      }
      resolveOnce({
        ok: true,
        stdout,
        stderr
      });
    });

    if (options.timeoutMs !== undefined) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, options.timeoutMs);
    }
  });
}

/** Whitespace-collapsed tail of the captured output, for error messages. */
export function clipCommandOutput(result: CommandResult, maxChars = 320): string {
  const snippet = `${result.stderr}\n${result.stdout}`.replace(/\s+/g, " ").trim();
  return snippet.length > maxChars ? `...${snippet.slice(snippet.length - maxChars)}` : snippet;
}
