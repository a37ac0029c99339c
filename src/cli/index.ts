#!/usr/bin/env node
import { Command, Option } from "commander";
import { loadConfig } from "../core/config.js";
import { ConfigurationError } from "../core/errors.js";
import { configureLogging, getLogger } from "../core/logger.js";
import { TARGET_ARCHES, type TargetArch } from "../core/types.js";
import { buildOptimizePipeline } from "../pipelines/optimize.js";
import { buildPrivacyPipeline } from "../pipelines/privacy.js";
import { runPipelineCommand } from "./commands.js";

const program = new Command();
program
  .name("treeprep")
  .description("treeprep v0.1.0 - patch, substitute, prune and configure a Chromium source tree before building")
  .version("0.1.0");

program.hook("preAction", (_program, actionCommand) => {
  configureLogging({ verbose: Boolean(actionCommand.opts().verbose) });
});

async function loadConfigOrExit(configPath: string | undefined) {
  try {
    return await loadConfig(configPath);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      getLogger().error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

program
  .command("privacy")
  .description("Apply privacy patch series, domain substitution, pruning and build flags")
  .requiredOption("--spec-dir <path>", "patchset directory (patches/, *.list, flags.gn)")
  .requiredOption("--tree <path>", "source tree to transform")
  .option("--config <path>", "YAML pipeline configuration")
  .option("--verbose", "enable debug logging", false)
  .action(async (opts: { specDir: string; tree: string; config?: string; verbose: boolean }) => {
    const logger = getLogger();
    const config = await loadConfigOrExit(opts.config);
    process.exitCode = await runPipelineCommand(
      () => buildPrivacyPipeline({ specDir: opts.specDir, tree: opts.tree, config, logger }),
      config,
      logger
    );
  });

program
  .command("optimize")
  .description("Apply compiler optimization patches, build configuration and toolchain setup")
  .requiredOption("--patch-dir <path>", "optimization patch directory (V8/, Windows/, Linux/)")
  .requiredOption("--tree <path>", "source tree to transform")
  .addOption(new Option("--target-arch <arch>", "target architecture").choices(TARGET_ARCHES).default("avx512"))
  .option("--config <path>", "YAML pipeline configuration")
  .option("--verbose", "enable debug logging", false)
  .action(
    async (opts: { patchDir: string; tree: string; targetArch: TargetArch; config?: string; verbose: boolean }) => {
      const logger = getLogger();
      const config = await loadConfigOrExit(opts.config);
      process.exitCode = await runPipelineCommand(
        () =>
          buildOptimizePipeline({
            patchDir: opts.patchDir,
            tree: opts.tree,
            targetArch: opts.targetArch,
            config,
            logger
          }),
        config,
        logger
      );
    }
  );

program.parseAsync(process.argv).catch((error) => {
  console.error(error);
  process.exit(1);
});
