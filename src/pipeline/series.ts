import type { Logger } from "../core/logger.js";
import {
  isSucceeded,
  type Criticality,
  type SeriesEntry,
  type SeriesResult,
  type StepApplier,
  type StepOutcome,
  type TransformationStep
} from "../core/types.js";

export interface RunContext {
  applier: StepApplier;
  logger: Logger;
  /** Keys of steps already executed in this run. */
  executed: Set<string>;
}

export function createRunContext(applier: StepApplier, logger: Logger): RunContext {
  return { applier, logger, executed: new Set<string>() };
}

export function stepKey(step: TransformationStep): string {
  switch (step.kind) {
    case "patch":
      return `patch:${step.patchPath}`;
    case "substitute":
    case "prune":
      return `${step.kind}:${step.targetPath}`;
    case "inject":
      return `inject:${step.destination}:${step.header}`;
    case "toolchain":
      return `toolchain:${step.script}`;
  }
}

export function seriesPassed(criticality: Criticality, succeededCount: number, totalCount: number): boolean {
  switch (criticality) {
    case "all-or-nothing":
    case "tolerant":
      return succeededCount === totalCount;
    case "best-effort":
      return succeededCount > 0;
  }
}

function partialNote(step: TransformationStep): string {
  return step.kind === "patch" ? "partially applied, inspect reject files" : "completed with warnings";
}

function logOutcome(logger: Logger, series: string, step: TransformationStep, outcome: StepOutcome): void {
  const suffix = outcome.message ? ` (${outcome.message})` : "";
  if (outcome.status === "success") {
    logger.debug(`[${series}] ${step.id}: applied${suffix}`);
  } else if (outcome.status === "partial") {
    logger.warn(`[${series}] ${step.id}: ${partialNote(step)}${suffix}`);
  } else {
    logger.error(`[${series}] ${step.id}: failed${suffix}`);
  }
}

async function executeOnce(step: TransformationStep, context: RunContext): Promise<StepOutcome> {
  const key = stepKey(step);
  if (context.executed.has(key)) {
    return { status: "failure", message: "step already executed in this run" };
  }
  context.executed.add(key);
  return context.applier.apply(step);
}

export async function runSeries(
  name: string,
  steps: readonly TransformationStep[],
  criticality: Criticality,
  context: RunContext
): Promise<SeriesResult> {
  const entries: SeriesEntry[] = [];
  let succeededCount = 0;

  context.logger.info(`Found ${steps.length} steps in ${name}`);

  for (const step of steps) {
    const outcome = await executeOnce(step, context);
    entries.push({ step, outcome });
    logOutcome(context.logger, name, step, outcome);

    if (isSucceeded(outcome)) {
      succeededCount += 1;
    } else if (criticality === "all-or-nothing") {
      context.logger.error(`Aborting ${name}: ${steps.length - entries.length} remaining steps not attempted`);
      break;
    }
  }

  const passed = seriesPassed(criticality, succeededCount, steps.length);
  context.logger.info(`Applied ${succeededCount}/${steps.length} steps from ${name}`);

  return {
    name,
    criticality,
    entries,
    succeededCount,
    totalCount: steps.length,
    attemptedCount: entries.length,
    passed
  };
}
