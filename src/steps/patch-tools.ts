import { runCommand, type CommandResult } from "../core/exec.js";
import type { Logger } from "../core/logger.js";
import type { StepOutcome } from "../core/types.js";

export interface PatchTool {
  name: string;
  apply(patchPath: string, cwd: string, timeoutMs: number): Promise<CommandResult>;
}

/** Atomic, whitespace-tolerant application through `git apply`. */
export const gitApplyTool: PatchTool = {
  name: "git apply",
  apply(patchPath, cwd, timeoutMs) {
    return runCommand("git", ["apply", "--ignore-whitespace", "--ignore-space-change", patchPath], cwd, timeoutMs);
  }
};

/** GNU patch; applies what it can and leaves `.rej` files for the rest. */
export const gnuPatchTool: PatchTool = {
  name: "patch",
  apply(patchPath, cwd, timeoutMs) {
    return runCommand("patch", ["-p1", "--batch", "--forward", "--ignore-whitespace", "-i", patchPath], cwd, timeoutMs);
  }
};

const REJECTION_MARKERS = [/\bFAILED\b/, /saving rejects/i, /hunks? ignored/i];

export function reportsRejectedHunks(output: string): boolean {
  return REJECTION_MARKERS.some((marker) => marker.test(output));
}

/** True when the tool output shows some, but not all, hunks of a file were rejected. */
export function reportsPartialApplication(output: string): boolean {
  const summaries = [...output.matchAll(/(\d+) out of (\d+) hunks? FAILED/g)];
  if (summaries.length === 0) return false;
  return summaries.some((match) => Number(match[1]) < Number(match[2]));
}

function diagnostic(tool: PatchTool, result: CommandResult): string {
  const detail = result.output.split("\n").filter(Boolean).slice(-5).join(" | ");
  return `${tool.name} exited ${result.exitCode}${detail ? `: ${detail}` : ""}`;
}

export interface FallbackOptions {
  cwd: string;
  timeoutMs: number;
  logger: Logger;
}

export async function applyWithFallback(
  patchPath: string,
  primary: PatchTool,
  fallback: PatchTool,
  options: FallbackOptions
): Promise<StepOutcome> {
  const first = await primary.apply(patchPath, options.cwd, options.timeoutMs);
  if (first.success) {
    return { status: "success" };
  }

  const primaryDiagnostic = diagnostic(primary, first);
  options.logger.debug(`${primaryDiagnostic}; trying ${fallback.name}`);

  const second = await fallback.apply(patchPath, options.cwd, options.timeoutMs);
  if (second.success) {
    return reportsRejectedHunks(second.output)
      ? { status: "partial", message: `${fallback.name} rejected some hunks` }
      : { status: "success", message: `applied with ${fallback.name}` };
  }

  if (!second.timedOut && reportsPartialApplication(second.output)) {
    return { status: "partial", message: `${fallback.name} rejected some hunks` };
  }

  return {
    status: "failure",
    message: `primary: ${primaryDiagnostic}; fallback: ${diagnostic(fallback, second)}`
  };
}
