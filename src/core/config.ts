import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import { DEFAULT_STEP_TIMEOUT_MS } from "./exec.js";
import { DEFAULT_BUILD_DIR } from "./paths.js";
import type { ProbeMarker } from "./types.js";

const MarkerSchema = z.object({
  path: z.string().min(1),
  expect: z.union([z.array(z.string().min(1)).min(1), z.literal("present")]),
  caseInsensitive: z.boolean().optional()
});

export const PipelineConfigSchema = z
  .object({
    stepTimeoutMs: z.number().int().positive().optional(),
    buildDir: z.string().min(1).optional(),
    markers: z.array(MarkerSchema).min(1).optional()
  })
  .strict();

export interface PipelineConfig {
  stepTimeoutMs: number;
  buildDir: string;
  /** Overrides the pipeline's default verification markers when set. */
  markers?: ProbeMarker[];
}

export function defaultConfig(): PipelineConfig {
  return {
    stepTimeoutMs: DEFAULT_STEP_TIMEOUT_MS,
    buildDir: DEFAULT_BUILD_DIR
  };
}

export function parseConfig(value: unknown, source = "config"): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(value ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigurationError("invalid-config", `Invalid ${source}: ${issues.join("; ")}`);
  }

  const defaults = defaultConfig();
  return {
    stepTimeoutMs: result.data.stepTimeoutMs ?? defaults.stepTimeoutMs,
    buildDir: result.data.buildDir ?? defaults.buildDir,
    ...(result.data.markers ? { markers: result.data.markers } : {})
  };
}

export async function loadConfig(filePath?: string): Promise<PipelineConfig> {
  if (!filePath) return defaultConfig();

  const resolved = path.resolve(filePath);
  const raw = await fs.readFile(resolved, "utf8").catch((error: unknown) => {
    throw new ConfigurationError("missing-file", `Config file unreadable: ${resolved} (${errorMessage(error)})`);
  });

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (error) {
    throw new ConfigurationError("invalid-config", `Config file is not valid YAML: ${resolved} (${errorMessage(error)})`);
  }
  return parseConfig(parsed, resolved);
}
