import fs from "node:fs/promises";
import type { Stats } from "node:fs";
import type { PruneStep, StepOutcome } from "../core/types.js";

const ABSENT_CODES = new Set(["ENOENT", "ENOTDIR"]);

async function statIfPresent(target: string): Promise<Stats | null> {
  try {
    return await fs.lstat(target);
  } catch (error) {
    if (error instanceof Error && "code" in error && typeof error.code === "string" && ABSENT_CODES.has(error.code)) {
      return null;
    }
    throw error;
  }
}

export async function prunePath(step: PruneStep): Promise<StepOutcome> {
  const stat = await statIfPresent(step.targetPath);
  if (!stat) {
    return { status: "success", message: "already absent" };
  }

  await fs.rm(step.targetPath, { recursive: true, force: true });
  return { status: "success", message: stat.isDirectory() ? "removed directory" : "removed file" };
}
