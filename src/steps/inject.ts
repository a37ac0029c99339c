import fs from "node:fs/promises";
import path from "node:path";
import type { InjectStep, StepOutcome } from "../core/types.js";
import { pathExists } from "../core/paths.js";

export async function injectFlags(step: InjectStep): Promise<StepOutcome> {
  await fs.mkdir(path.dirname(step.destination), { recursive: true });

  if (await pathExists(step.destination)) {
    await fs.appendFile(step.destination, `\n\n${step.appendHeader ?? step.header}\n${step.text}`, "utf8");
    return { status: "success", message: "appended" };
  }

  await fs.writeFile(step.destination, `${step.header}\n${step.text}`, "utf8");
  return { status: "success", message: "created" };
}
