import fs from "node:fs/promises";
import path from "node:path";
import type { PipelineConfig } from "../core/config.js";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import { getArgsFilePath, isDirectory, pathExists, requireDirectory, requireFile, resolveInsideTree } from "../core/paths.js";
import type {
  InjectStep,
  PhaseDefinition,
  PipelineDefinition,
  ProbeMarker,
  PruneStep,
  SeriesPhase,
  SubstituteStep,
  SubstitutionRule
} from "../core/types.js";
import { loadPatchSeries, loadPathList, loadSubstitutionRules } from "../loaders/lists.js";

export const PRIVACY_PIPELINE = "privacy";
export const PRIVACY_THRESHOLD = 5;

export const PRIVACY_INPUTS = {
  patches: "patches",
  substitutionTargets: "domain_substitution.list",
  substitutionRules: "domain_regex.list",
  pruning: "pruning.list",
  flags: "flags.gn"
} as const;

export const PRIVACY_PATCH_GROUPS = [
  { phase: "core-patches", dir: "core" },
  { phase: "extra-patches", dir: "extra" },
  { phase: "inox-patches", dir: "inox-patchset" }
] as const;

export const PRIVACY_FLAGS_HEADER = "# Ungoogled-Chromium build flags";
export const PRIVACY_APPEND_HEADER = "# Ungoogled-Chromium specific flags";

export const PRIVACY_MARKERS: ProbeMarker[] = [
  { path: "chrome/browser/chrome_browser_main.cc", expect: ["ungoogled-chromium"] },
  { path: "chrome/browser/about_flags.cc", expect: ["ungoogled-chromium"] },
  { path: "google_apis/BUILD.gn", expect: "present" }
];

export interface PrivacyPipelineOptions {
  specDir: string;
  tree: string;
  config: PipelineConfig;
  logger: Logger;
}

async function patchGroupPhase(patchesDir: string, phase: string, dir: string, logger: Logger): Promise<SeriesPhase> {
  const groupDir = path.join(patchesDir, dir);
  if (!(await isDirectory(groupDir))) {
    return { type: "series", name: phase, criticality: "all-or-nothing", steps: [], skipped: `patch directory not found: ${groupDir}` };
  }
  return { type: "series", name: phase, criticality: "all-or-nothing", steps: await loadPatchSeries(groupDir, logger) };
}

async function substitutionSteps(
  tree: string,
  targets: string[],
  rules: SubstitutionRule[],
  logger: Logger
): Promise<SubstituteStep[]> {
  const steps: SubstituteStep[] = [];
  for (const target of targets) {
    const targetPath = resolveInsideTree(tree, target);
    if (!targetPath) {
      logger.warn(`Ignoring substitution target outside the tree: ${target}`);
      continue;
    }
    if (!(await pathExists(targetPath))) {
      logger.debug(`Substitution target not in tree: ${target}`);
      continue;
    }
    steps.push({ id: target, kind: "substitute", targetPath, rules });
  }
  return steps;
}

export async function buildPrivacyPipeline(options: PrivacyPipelineOptions): Promise<PipelineDefinition> {
  const { config, logger } = options;
  const tree = await requireDirectory(options.tree, "Source tree");
  const specDir = await requireDirectory(options.specDir, "Patchset directory");
  const patchesDir = await requireDirectory(path.join(specDir, PRIVACY_INPUTS.patches), "Patches directory");
  const targetsFile = await requireFile(path.join(specDir, PRIVACY_INPUTS.substitutionTargets), "Substitution target list");
  const rulesFile = await requireFile(path.join(specDir, PRIVACY_INPUTS.substitutionRules), "Substitution rule list");
  const pruningFile = await requireFile(path.join(specDir, PRIVACY_INPUTS.pruning), "Pruning list");
  const flagsFile = await requireFile(path.join(specDir, PRIVACY_INPUTS.flags), "Build flags file");

  const phases: PhaseDefinition[] = [];
  for (const group of PRIVACY_PATCH_GROUPS) {
    phases.push(await patchGroupPhase(patchesDir, group.phase, group.dir, logger));
  }

  const rules = await loadSubstitutionRules(rulesFile, logger);
  const targets = await loadPathList(targetsFile, logger);
  phases.push({
    type: "series",
    name: "domain-substitution",
    criticality: "tolerant",
    steps: await substitutionSteps(tree, targets, rules, logger)
  });

  const pruneSteps: PruneStep[] = (await loadPathList(pruningFile, logger)).map((entry) => ({
    id: entry,
    kind: "prune",
    targetPath: path.resolve(tree, entry)
  }));
  phases.push({ type: "series", name: "pruning", criticality: "tolerant", steps: pruneSteps });

  const flags = await fs.readFile(flagsFile, "utf8").catch((error: unknown) => {
    throw new ConfigurationError("missing-file", `Build flags file unreadable: ${flagsFile} (${errorMessage(error)})`);
  });
  const inject: InjectStep = {
    id: PRIVACY_INPUTS.flags,
    kind: "inject",
    destination: getArgsFilePath(tree, config.buildDir),
    header: PRIVACY_FLAGS_HEADER,
    appendHeader: PRIVACY_APPEND_HEADER,
    text: flags
  };
  phases.push({ type: "series", name: "build-flags", criticality: "best-effort", steps: [inject] });

  phases.push({ type: "probe", name: "verification", markers: config.markers ?? PRIVACY_MARKERS });

  return { name: PRIVACY_PIPELINE, root: tree, threshold: PRIVACY_THRESHOLD, phases };
}
