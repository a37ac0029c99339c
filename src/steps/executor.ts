import { commandExists, DEFAULT_STEP_TIMEOUT_MS, runCommand } from "../core/exec.js";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { pathExists, resolveInsideTree } from "../core/paths.js";
import type { PatchStep, PruneStep, StepApplier, StepOutcome, TransformationStep } from "../core/types.js";
import { injectFlags } from "./inject.js";
import { applyWithFallback, gitApplyTool, gnuPatchTool, type PatchTool } from "./patch-tools.js";
import { prunePath } from "./prune.js";
import { substituteFile } from "./substitute.js";
import { setupToolchain, type ToolchainRuntime } from "./toolchain.js";

export interface BuiltinStepApplierOptions {
  /** Root of the tree being transformed; external tools run here. */
  root: string;
  logger: Logger;
  timeoutMs?: number;
  primaryPatchTool?: PatchTool;
  fallbackPatchTool?: PatchTool;
  toolchainRuntime?: ToolchainRuntime;
}

const defaultToolchainRuntime: ToolchainRuntime = {
  run: runCommand,
  hasBinary: commandExists
};

export class BuiltinStepApplier implements StepApplier {
  private readonly root: string;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly primary: PatchTool;
  private readonly fallback: PatchTool;
  private readonly toolchainRuntime: ToolchainRuntime;

  constructor(options: BuiltinStepApplierOptions) {
    this.root = options.root;
    this.logger = options.logger;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_STEP_TIMEOUT_MS;
    this.primary = options.primaryPatchTool ?? gitApplyTool;
    this.fallback = options.fallbackPatchTool ?? gnuPatchTool;
    this.toolchainRuntime = options.toolchainRuntime ?? defaultToolchainRuntime;
  }

  async apply(step: TransformationStep): Promise<StepOutcome> {
    try {
      return await this.dispatch(step);
    } catch (error) {
      return { status: "failure", message: errorMessage(error) };
    }
  }

  private async dispatch(step: TransformationStep): Promise<StepOutcome> {
    switch (step.kind) {
      case "patch":
        return this.applyPatch(step);
      case "substitute":
        return substituteFile(step);
      case "prune":
        return this.prune(step);
      case "inject":
        return injectFlags(step);
      case "toolchain":
        return setupToolchain(step, this.root, this.timeoutMs, this.toolchainRuntime);
    }
  }

  private async applyPatch(step: PatchStep): Promise<StepOutcome> {
    if (!(await pathExists(step.patchPath))) {
      return { status: "failure", message: `patch file not found: ${step.patchPath}` };
    }
    this.logger.debug(`Applying patch: ${step.id}`);
    return applyWithFallback(step.patchPath, this.primary, this.fallback, {
      cwd: this.root,
      timeoutMs: this.timeoutMs,
      logger: this.logger
    });
  }

  private async prune(step: PruneStep): Promise<StepOutcome> {
    if (resolveInsideTree(this.root, step.targetPath) === null) {
      return { status: "failure", message: `refusing to prune outside the tree: ${step.targetPath}` };
    }
    return prunePath(step);
  }
}
