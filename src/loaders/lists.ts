import fs from "node:fs/promises";
import path from "node:path";
import { ConfigurationError, errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";
import type { PatchStep, SubstitutionRule } from "../core/types.js";

export const SERIES_MANIFEST = "series";
const PATCH_EXTENSION = ".patch";

/** Entries of a list file: trimmed, blank and `#` lines dropped. */
export function parseListText(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

export async function readListFile(filePath: string): Promise<string[]> {
  const raw = await fs.readFile(filePath, "utf8").catch((error: unknown) => {
    throw new ConfigurationError("missing-file", `List file unreadable: ${filePath} (${errorMessage(error)})`);
  });
  return parseListText(raw);
}

function dedupe(entries: string[], label: string, logger?: Logger): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const entry of entries) {
    if (seen.has(entry)) {
      logger?.warn(`Duplicate entry ignored in ${label}: ${entry}`);
      continue;
    }
    seen.add(entry);
    out.push(entry);
  }
  return out;
}

/**
 * Patch file names of a series directory in application order: the `series` manifest order when
 * present, otherwise every `*.patch` file sorted by name.
 */
export async function listSeriesPatches(dir: string, logger?: Logger): Promise<string[]> {
  const manifest = path.join(dir, SERIES_MANIFEST);
  const hasManifest = await fs
    .stat(manifest)
    .then((stat) => stat.isFile())
    .catch(() => false);

  if (hasManifest) {
    return dedupe(await readListFile(manifest), manifest, logger);
  }

  const files = await fs.readdir(dir, { withFileTypes: true });
  return files
    .filter((entry) => entry.isFile() && entry.name.endsWith(PATCH_EXTENSION))
    .map((entry) => entry.name)
    .sort();
}

export function toPatchSteps(dir: string, names: string[]): PatchStep[] {
  return names.map((name) => ({
    id: name,
    kind: "patch",
    patchPath: path.join(dir, name)
  }));
}

export async function loadPatchSeries(dir: string, logger?: Logger): Promise<PatchStep[]> {
  return toPatchSteps(dir, await listSeriesPatches(dir, logger));
}

export interface TranslatedPattern {
  source: string;
  flags: string;
}

const INLINE_FLAGS = /^\(\?([ims]+)\)/;
const NAMED_GROUP = /^\(\?P<([A-Za-z_][A-Za-z0-9_]*)>/;
const NAMED_BACKREF = /^\(\?P=([A-Za-z_][A-Za-z0-9_]*)\)/;

/**
 * Rewrites Python `re` syntax into its JavaScript form: leading inline flags become RegExp flags,
 * `(?P<name>` and `(?P=name)` become named groups and references, and the `\A` / `\Z` anchors
 * become lookarounds on the whole input.
 */
export function translatePattern(pattern: string): TranslatedPattern {
  let flags = "g";
  let rest = pattern;
  const inline = INLINE_FLAGS.exec(rest);
  if (inline) {
    for (const flag of inline[1] ?? "") {
      if (!flags.includes(flag)) flags += flag;
    }
    rest = rest.slice(inline[0].length);
  }

  let source = "";
  for (let i = 0; i < rest.length; i += 1) {
    const char = rest[i];
    const tail = rest.slice(i);
    if (char === "\\") {
      const next = rest[i + 1] ?? "";
      source += next === "A" ? "(?<![\\s\\S])" : next === "Z" ? "(?![\\s\\S])" : `\\${next}`;
      i += 1;
      continue;
    }
    const group = NAMED_GROUP.exec(tail);
    if (group) {
      source += `(?<${group[1] ?? ""}>`;
      i += group[0].length - 1;
      continue;
    }
    const backref = NAMED_BACKREF.exec(tail);
    if (backref) {
      source += `\\k<${backref[1] ?? ""}>`;
      i += backref[0].length - 1;
      continue;
    }
    source += char;
  }
  return { source, flags };
}

const ESCAPES: Record<string, string> = { "\\": "\\", n: "\n", r: "\r", t: "\t" };

function groupReference(group: string): string {
  if (/^\d+$/.test(group)) {
    return Number(group) === 0 ? "$&" : `$${group}`;
  }
  return `$<${group}>`;
}

export function translateReplacement(replacement: string): string {
  let out = "";
  for (let i = 0; i < replacement.length; i += 1) {
    const char = replacement[i];
    if (char === "$") {
      out += "$$";
      continue;
    }
    if (char !== "\\" || i + 1 >= replacement.length) {
      out += char;
      continue;
    }

    const rest = replacement.slice(i + 1);
    const named = /^g<([A-Za-z0-9_]+)>/.exec(rest);
    if (named) {
      out += groupReference(named[1] ?? "");
      i += named[0].length;
      continue;
    }
    // A leading zero is an octal character escape, not a group reference.
    const octal = /^0[0-7]{0,2}/.exec(rest);
    if (octal) {
      out += String.fromCharCode(parseInt(octal[0], 8));
      i += octal[0].length;
      continue;
    }
    const numbered = /^\d{1,2}/.exec(rest);
    if (numbered) {
      out += `$${numbered[0]}`;
      i += numbered[0].length;
      continue;
    }

    const next = rest[0] ?? "";
    out += ESCAPES[next] ?? `\\${next}`;
    i += 1;
  }
  return out;
}

export function parseSubstitutionRule(line: string): SubstitutionRule | null {
  const parts = line.split("@");
  if (parts.length !== 2) return null;
  const [pattern, replacement] = parts;
  if (pattern === undefined || replacement === undefined || pattern.length === 0) return null;

  const translated = translatePattern(pattern);
  let compiled: RegExp;
  try {
    compiled = new RegExp(translated.source, translated.flags);
  } catch (error) {
    throw new ConfigurationError("invalid-regex", `Invalid substitution pattern "${pattern}": ${errorMessage(error)}`);
  }

  return {
    source: line,
    pattern: compiled,
    replacement: translateReplacement(replacement)
  };
}

/** Rules in file order. Malformed lines and patterns that do not compile are skipped with a warning. */
export async function loadSubstitutionRules(filePath: string, logger?: Logger): Promise<SubstitutionRule[]> {
  const rules: SubstitutionRule[] = [];
  for (const line of await readListFile(filePath)) {
    let rule: SubstitutionRule | null;
    try {
      rule = parseSubstitutionRule(line);
    } catch (error) {
      if (!(error instanceof ConfigurationError)) throw error;
      logger?.warn(`Skipping substitution rule: ${error.message}`);
      continue;
    }
    if (!rule) {
      logger?.warn(`Skipping malformed substitution rule: ${line}`);
      continue;
    }
    rules.push(rule);
  }
  return rules;
}

export async function loadPathList(filePath: string, logger?: Logger): Promise<string[]> {
  return dedupe(await readListFile(filePath), filePath, logger);
}
