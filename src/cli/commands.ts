import type { PipelineConfig } from "../core/config.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { PipelineDefinition, StepApplier } from "../core/types.js";
import { runPipeline } from "../pipeline/orchestrator.js";
import { createRunContext } from "../pipeline/series.js";
import { BuiltinStepApplier } from "../steps/executor.js";

export type ApplierFactory = (root: string, config: PipelineConfig, logger: Logger) => StepApplier;

export const builtinApplierFactory: ApplierFactory = (root, config, logger) =>
  new BuiltinStepApplier({ root, logger, timeoutMs: config.stepTimeoutMs });

/**
 * Builds and runs one pipeline and maps the result to a process exit code: 0 when the verdict
 * passes, 1 when it fails or the inputs are unusable.
 */
export async function runPipelineCommand(
  build: () => Promise<PipelineDefinition>,
  config: PipelineConfig,
  logger: Logger,
  createApplier: ApplierFactory = builtinApplierFactory
): Promise<number> {
  let definition: PipelineDefinition;
  try {
    definition = await build();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  const context = createRunContext(createApplier(definition.root, config, logger), logger);
  try {
    const verdict = await runPipeline(definition, context);
    return verdict.passed ? 0 : 1;
  } catch (error) {
    logger.error(`${definition.name} pipeline aborted: ${errorMessage(error)}`);
    return 1;
  }
}
