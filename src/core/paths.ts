import fs from "node:fs/promises";
import path from "node:path";
import { ConfigurationError } from "./errors.js";

export const DEFAULT_BUILD_DIR = path.join("out", "Ultimate");
export const ARGS_FILE_NAME = "args.gn";

export function getArgsFilePath(root: string, buildDir = DEFAULT_BUILD_DIR): string {
  return path.join(root, buildDir, ARGS_FILE_NAME);
}

/** Resolves `relative` against `root`; returns null when the result would leave the tree. */
export function resolveInsideTree(root: string, relative: string): string | null {
  const base = path.resolve(root);
  const resolved = path.resolve(base, relative);
  const rel = path.relative(base, resolved);
  if (rel === "" || rel.startsWith("..") || path.isAbsolute(rel)) {
    return null;
  }
  return resolved;
}

export async function pathExists(target: string): Promise<boolean> {
  return fs
    .access(target)
    .then(() => true)
    .catch(() => false);
}

export async function isDirectory(target: string): Promise<boolean> {
  const stat = await fs.stat(target).catch(() => null);
  return stat?.isDirectory() ?? false;
}

export async function requireDirectory(target: string, label: string): Promise<string> {
  const resolved = path.resolve(target);
  if (!(await isDirectory(resolved))) {
    throw new ConfigurationError("missing-directory", `${label} not found: ${resolved}`);
  }
  return resolved;
}

export async function requireFile(target: string, label: string): Promise<string> {
  const resolved = path.resolve(target);
  const stat = await fs.stat(resolved).catch(() => null);
  if (!stat?.isFile()) {
    throw new ConfigurationError("missing-file", `${label} missing: ${resolved}`);
  }
  return resolved;
}
