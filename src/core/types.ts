export type StepKind = "patch" | "substitute" | "prune" | "inject" | "toolchain";
export type StepStatus = "success" | "partial" | "failure";
/**
 * all-or-nothing: stop at the first failure, pass when every step succeeded.
 * best-effort: run every step, pass when at least one succeeded.
 * tolerant: run every step, pass when none failed (an empty series passes).
 */
export type Criticality = "all-or-nothing" | "best-effort" | "tolerant";
export type TargetArch = "avx" | "avx2" | "avx512";

export const TARGET_ARCHES: readonly TargetArch[] = ["avx", "avx2", "avx512"];

export interface SubstitutionRule {
  readonly source: string;
  readonly pattern: RegExp;
  readonly replacement: string;
}

interface StepBase {
  readonly id: string;
}

export interface PatchStep extends StepBase {
  readonly kind: "patch";
  readonly patchPath: string;
}

export interface SubstituteStep extends StepBase {
  readonly kind: "substitute";
  readonly targetPath: string;
  readonly rules: readonly SubstitutionRule[];
}

export interface PruneStep extends StepBase {
  readonly kind: "prune";
  readonly targetPath: string;
}

export interface InjectStep extends StepBase {
  readonly kind: "inject";
  readonly destination: string;
  readonly header: string;
  /** Header used instead of `header` when the destination already exists. */
  readonly appendHeader?: string;
  readonly text: string;
}

export interface ToolchainStep extends StepBase {
  readonly kind: "toolchain";
  readonly interpreter: string;
  readonly script: string;
  readonly args: readonly string[];
  /** Extra arguments appended only when the named binary is on PATH. */
  readonly whenAvailable?: { readonly binary: string; readonly args: readonly string[] };
}

export type TransformationStep = PatchStep | SubstituteStep | PruneStep | InjectStep | ToolchainStep;

export interface StepOutcome {
  status: StepStatus;
  message?: string;
}

export interface SeriesEntry {
  step: TransformationStep;
  outcome: StepOutcome;
}

export interface SeriesResult {
  name: string;
  criticality: Criticality;
  entries: SeriesEntry[];
  succeededCount: number;
  totalCount: number;
  attemptedCount: number;
  passed: boolean;
}

export interface ProbeMarker {
  path: string;
  expect: string[] | "present";
  caseInsensitive?: boolean;
}

export interface ProbeReport {
  confidence: number;
  total: number;
  matched: string[];
  passed: boolean;
}

export interface SeriesPhase {
  type: "series";
  name: string;
  criticality: Criticality;
  steps: TransformationStep[];
  /** Set when the phase's input is missing; the phase is reported as not passed. */
  skipped?: string;
}

export interface ProbePhase {
  type: "probe";
  name: string;
  markers: ProbeMarker[];
}

export type PhaseDefinition = SeriesPhase | ProbePhase;

export interface PipelineDefinition {
  name: string;
  root: string;
  threshold: number;
  phases: PhaseDefinition[];
}

export interface PhaseResult {
  name: string;
  passed: boolean;
  series?: SeriesResult;
  probe?: ProbeReport;
  skipped?: string;
}

export interface PipelineVerdict {
  pipeline: string;
  phases: PhaseResult[];
  passedPhases: string[];
  threshold: number;
  passed: boolean;
}

export interface StepApplier {
  apply(step: TransformationStep): Promise<StepOutcome>;
}

export function isSucceeded(outcome: StepOutcome): boolean {
  return outcome.status !== "failure";
}
