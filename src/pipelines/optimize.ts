import path from "node:path";
import type { PipelineConfig } from "../core/config.js";
import type { Logger } from "../core/logger.js";
import { getArgsFilePath, isDirectory, requireDirectory } from "../core/paths.js";
import type { PhaseDefinition, PipelineDefinition, ProbeMarker, SeriesPhase, TargetArch, ToolchainStep } from "../core/types.js";
import { listSeriesPatches, toPatchSteps } from "../loaders/lists.js";
import { optimizationFlagBlocks, renderFlagBlocks } from "./optimization-flags.js";

export const OPTIMIZE_PIPELINE = "optimize";
export const OPTIMIZE_THRESHOLD = 4;
export const OPTIMIZE_FLAGS_HEADER = "# Clang optimizations";

/** Linux patch names containing these tokens depend on desktop stacks absent from other targets. */
export const LINUX_ONLY_TOKENS = ["alsa", "gtk", "x11", "wayland"] as const;

export const TOOLCHAIN_SCRIPT = path.join("tools", "clang", "scripts", "update.py");
export const TOOLCHAIN_ARGS = [
  "--bootstrap",
  "--without-android",
  "--without-fuchsia",
  "--disable-asserts",
  "--thinlto",
  "--pgo"
] as const;

export interface OptimizePipelineOptions {
  patchDir: string;
  tree: string;
  targetArch: TargetArch;
  config: PipelineConfig;
  logger: Logger;
}

/** Architecture-specific platform patches first, then the general ones. */
export function selectPlatformPatches(names: string[], arch: TargetArch): string[] {
  const lowered = (name: string) => name.toLowerCase();
  const specific = arch === "avx" ? [] : names.filter((name) => lowered(name).includes(arch));
  const general = names.filter((name) => !lowered(name).includes("avx"));
  return [...specific, ...general];
}

export function selectCrossPlatformPatches(names: string[]): string[] {
  return names.filter((name) => !LINUX_ONLY_TOKENS.some((token) => name.toLowerCase().includes(token)));
}

export function optimizeMarkers(arch: TargetArch, buildDir: string): ProbeMarker[] {
  return [
    { path: "build/config/compiler/BUILD.gn", expect: ["o3"], caseInsensitive: true },
    { path: "build/config/compiler/BUILD.gn", expect: ["lto"], caseInsensitive: true },
    { path: "BUILD.gn", expect: [arch.toUpperCase()], caseInsensitive: true },
    { path: path.join(buildDir, "args.gn"), expect: ["thin_lto", "polly"], caseInsensitive: true }
  ];
}

async function patchPhase(
  patchDir: string,
  name: string,
  subdir: string,
  select: (names: string[]) => string[],
  logger: Logger
): Promise<SeriesPhase> {
  const dir = path.join(patchDir, subdir);
  if (!(await isDirectory(dir))) {
    return { type: "series", name, criticality: "best-effort", steps: [], skipped: `patch directory not found: ${dir}` };
  }
  const names = select(await listSeriesPatches(dir, logger));
  return { type: "series", name, criticality: "best-effort", steps: toPatchSteps(dir, names) };
}

export async function buildOptimizePipeline(options: OptimizePipelineOptions): Promise<PipelineDefinition> {
  const { config, logger, targetArch } = options;
  const tree = await requireDirectory(options.tree, "Source tree");
  const patchDir = await requireDirectory(options.patchDir, "Optimization patch directory");

  const phases: PhaseDefinition[] = [
    await patchPhase(patchDir, "engine-patches", "V8", (names) => names, logger),
    await patchPhase(patchDir, "platform-patches", "Windows", (names) => selectPlatformPatches(names, targetArch), logger),
    await patchPhase(patchDir, "cross-platform-patches", "Linux", selectCrossPlatformPatches, logger)
  ];

  phases.push({
    type: "series",
    name: "build-configuration",
    criticality: "best-effort",
    steps: [
      {
        id: "optimization-flags",
        kind: "inject",
        destination: getArgsFilePath(tree, config.buildDir),
        header: OPTIMIZE_FLAGS_HEADER,
        text: renderFlagBlocks(optimizationFlagBlocks(targetArch))
      }
    ]
  });

  const toolchain: ToolchainStep = {
    id: "clang-update",
    kind: "toolchain",
    interpreter: "python3",
    script: path.join(tree, TOOLCHAIN_SCRIPT),
    args: TOOLCHAIN_ARGS,
    whenAvailable: { binary: "llvm-bolt", args: ["--bolt"] }
  };
  phases.push({ type: "series", name: "toolchain-setup", criticality: "best-effort", steps: [toolchain] });

  phases.push({
    type: "probe",
    name: "verification",
    markers: config.markers ?? optimizeMarkers(targetArch, config.buildDir)
  });

  return { name: OPTIMIZE_PIPELINE, root: tree, threshold: OPTIMIZE_THRESHOLD, phases };
}
