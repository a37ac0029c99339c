import fs from "node:fs/promises";
import type { StepOutcome, SubstituteStep, SubstitutionRule } from "../core/types.js";

type TextEncoding = "utf8" | "latin1";

const strictUtf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Decodes UTF-8 when valid; otherwise latin1, which maps every byte and re-encodes losslessly. */
export function decodeTolerant(bytes: Buffer): { text: string; encoding: TextEncoding } {
  try {
    return { text: strictUtf8.decode(bytes), encoding: "utf8" };
  } catch {
    return { text: bytes.toString("latin1"), encoding: "latin1" };
  }
}

export function applyRules(content: string, rules: readonly SubstitutionRule[]): string {
  return rules.reduce((text, rule) => text.replace(rule.pattern, rule.replacement), content);
}

export async function substituteFile(step: SubstituteStep): Promise<StepOutcome> {
  const bytes = await fs.readFile(step.targetPath);
  const { text, encoding } = decodeTolerant(bytes);
  const updated = applyRules(text, step.rules);
  if (updated === text) {
    return { status: "success", message: "unchanged" };
  }

  await fs.writeFile(step.targetPath, Buffer.from(updated, encoding));
  return { status: "success", message: "updated" };
}
