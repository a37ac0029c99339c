import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export const DEFAULT_STEP_TIMEOUT_MS = 600_000;
export const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export interface CommandResult {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  output: string;
  timedOut: boolean;
}

export async function runCommand(
  command: string,
  args: readonly string[],
  cwd: string,
  timeout = DEFAULT_STEP_TIMEOUT_MS,
  maxBuffer = MAX_OUTPUT_BYTES
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      cwd,
      timeout,
      maxBuffer
    });
    return {
      success: true,
      exitCode: 0,
      stdout,
      stderr,
      output: `${stdout}\n${stderr}`.trim(),
      timedOut: false
    };
  } catch (error) {
    const err = error as Error & {
      code?: number | string;
      killed?: boolean;
      signal?: NodeJS.Signals | null;
      stdout?: string;
      stderr?: string;
    };
    // Overflowing maxBuffer also kills the child with SIGTERM.
    const overflowed = err.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";
    const timedOut = !overflowed && Boolean(err.killed) && err.signal === "SIGTERM";
    const stdout = String(err.stdout ?? "");
    const stderr = String(err.stderr ?? "");
    const detail = timedOut ? `timed out after ${timeout}ms` : err.message;
    return {
      success: false,
      exitCode: typeof err.code === "number" ? err.code : 1,
      stdout,
      stderr,
      output: `${stdout}\n${stderr}\n${detail}`.trim(),
      timedOut
    };
  }
}

export async function commandExists(command: string): Promise<boolean> {
  const probe =
    process.platform === "win32"
      ? await runCommand("where", [command], process.cwd(), 30_000)
      : await runCommand("sh", ["-c", `command -v ${command}`], process.cwd(), 30_000);
  return probe.success;
}
