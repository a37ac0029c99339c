import type {
  PhaseDefinition,
  PhaseResult,
  PipelineDefinition,
  PipelineVerdict
} from "../core/types.js";
import { runVerificationProbe } from "./probe.js";
import { runSeries, type RunContext } from "./series.js";

export function computeVerdict(pipeline: string, phases: PhaseResult[], threshold: number): PipelineVerdict {
  const passedPhases = phases.filter((phase) => phase.passed).map((phase) => phase.name);
  return {
    pipeline,
    phases,
    passedPhases,
    threshold,
    passed: passedPhases.length >= threshold
  };
}

async function runPhase(phase: PhaseDefinition, root: string, context: RunContext): Promise<PhaseResult> {
  if (phase.type === "probe") {
    const probe = await runVerificationProbe(root, phase.markers, context.logger);
    return { name: phase.name, passed: probe.passed, probe };
  }

  if (phase.skipped) {
    context.logger.warn(`Skipping ${phase.name}: ${phase.skipped}`);
    return { name: phase.name, passed: false, skipped: phase.skipped };
  }

  const series = await runSeries(phase.name, phase.steps, phase.criticality, context);
  return { name: phase.name, passed: series.passed, series };
}

/**
 * Runs every phase in order. Phases never gate each other: each one works on whatever tree the
 * previous phases left behind.
 */
export async function runPipeline(definition: PipelineDefinition, context: RunContext): Promise<PipelineVerdict> {
  context.logger.info(`Starting ${definition.name} pipeline (${definition.phases.length} phases)`);

  const results: PhaseResult[] = [];
  for (const phase of definition.phases) {
    context.logger.info(`Phase ${results.length + 1}/${definition.phases.length}: ${phase.name}`);
    results.push(await runPhase(phase, definition.root, context));
  }

  const verdict = computeVerdict(definition.name, results, definition.threshold);
  const tally = `${verdict.passedPhases.length}/${results.length}, threshold ${verdict.threshold}`;
  context.logger.info(`Completed phases: ${verdict.passedPhases.join(", ") || "none"}`);
  if (verdict.passed) {
    context.logger.info(`${definition.name} pipeline passed (${tally})`);
  } else {
    context.logger.error(`${definition.name} pipeline failed: too few phases completed (${tally})`);
  }
  return verdict;
}
