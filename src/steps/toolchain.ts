import path from "node:path";
import type { CommandResult } from "../core/exec.js";
import { pathExists } from "../core/paths.js";
import type { StepOutcome, ToolchainStep } from "../core/types.js";

export interface ToolchainRuntime {
  run(command: string, args: readonly string[], cwd: string, timeoutMs: number): Promise<CommandResult>;
  hasBinary(binary: string): Promise<boolean>;
}

export async function setupToolchain(
  step: ToolchainStep,
  cwd: string,
  timeoutMs: number,
  runtime: ToolchainRuntime
): Promise<StepOutcome> {
  if (!(await pathExists(step.script))) {
    return { status: "success", message: `${path.basename(step.script)} not found, using default toolchain` };
  }

  const args = [step.script, ...step.args];
  if (step.whenAvailable && (await runtime.hasBinary(step.whenAvailable.binary))) {
    args.push(...step.whenAvailable.args);
  }

  const result = await runtime.run(step.interpreter, args, cwd, timeoutMs);
  if (result.success) {
    return { status: "success", message: "toolchain updated" };
  }

  const reason = result.timedOut ? `timed out after ${timeoutMs}ms` : `exited ${result.exitCode}`;
  return { status: "partial", message: `toolchain setup ${reason}, continuing` };
}
