import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { InjectStep, PatchStep, PruneStep, SubstituteStep } from "../src/core/types.js";
import { parseSubstitutionRule } from "../src/loaders/lists.js";
import { BuiltinStepApplier } from "../src/steps/executor.js";
import { decodeTolerant } from "../src/steps/substitute.js";
import { commandResult, createRecordingLogger, fakePatchTool, makeTempDir, touch } from "./helpers/recording.js";

function substituteStep(targetPath: string, ...lines: string[]): SubstituteStep {
  const rules = lines.map((line) => {
    const rule = parseSubstitutionRule(line);
    if (!rule) throw new Error(`bad rule in test: ${line}`);
    return rule;
  });
  return { id: path.basename(targetPath), kind: "substitute", targetPath, rules };
}

describe("domain substitution step", () => {
  it("rewrites matches and is a no-op on the second run", async () => {
    const root = await makeTempDir("substitute");
    const target = path.join(root, "net", "urls.cc");
    await touch(target, 'const char kUrl[] = "https://example.com/x";\n');
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });
    const step = substituteStep(target, "example\\.com@example.invalid");

    const first = await applier.apply(step);
    const afterFirst = await fs.readFile(target, "utf8");
    const second = await applier.apply(step);
    const afterSecond = await fs.readFile(target, "utf8");

    expect(first).toEqual({ status: "success", message: "updated" });
    expect(afterFirst).toBe('const char kUrl[] = "https://example.invalid/x";\n');
    expect(second).toEqual({ status: "success", message: "unchanged" });
    expect(afterSecond).toBe(afterFirst);
  });

  it("applies rules in file order", async () => {
    const root = await makeTempDir("substitute-order");
    const target = path.join(root, "a.txt");
    await touch(target, "alpha alpha");
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    await applier.apply(substituteStep(target, "alpha@beta", "beta@gamma"));
    expect(await fs.readFile(target, "utf8")).toBe("gamma gamma");
  });

  it("leaves undecodable bytes untouched", async () => {
    const root = await makeTempDir("substitute-binary");
    const target = path.join(root, "blob.bin");
    const bytes = Buffer.concat([Buffer.from("host=example.com;"), Buffer.from([0xff, 0xfe, 0x00, 0x80])]);
    await fs.writeFile(target, bytes);
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    const outcome = await applier.apply(substituteStep(target, "example\\.com@example.invalid"));
    const written = await fs.readFile(target);

    expect(outcome.status).toBe("success");
    expect(written.equals(Buffer.concat([Buffer.from("host=example.invalid;"), Buffer.from([0xff, 0xfe, 0x00, 0x80])]))).toBe(
      true
    );
  });

  it("reports failure when the target cannot be read", async () => {
    const root = await makeTempDir("substitute-missing");
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    const outcome = await applier.apply(substituteStep(path.join(root, "gone.cc"), "a@b"));
    expect(outcome.status).toBe("failure");
    expect(outcome.message).toContain("ENOENT");
  });

  it("keeps a byte order mark in place", async () => {
    const root = await makeTempDir("substitute-bom");
    const target = path.join(root, "bom.txt");
    await fs.writeFile(target, Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("example.com")]));
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    expect(await applier.apply(substituteStep(target, "example\\.com@example.invalid"))).toEqual({
      status: "success",
      message: "updated"
    });
    const written = await fs.readFile(target);
    expect(written.equals(Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from("example.invalid")]))).toBe(true);
  });

  it("decodes valid utf-8 as utf-8", () => {
    expect(decodeTolerant(Buffer.from("héllo", "utf8"))).toEqual({ text: "héllo", encoding: "utf8" });
    expect(decodeTolerant(Buffer.from([0x68, 0xe9])).encoding).toBe("latin1");
  });
});

describe("prune step", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("removes a directory and succeeds again once it is gone", async () => {
    const root = await makeTempDir("prune");
    await touch(path.join(root, "third_party", "blob", "data.bin"));
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });
    const step: PruneStep = { id: "third_party/blob", kind: "prune", targetPath: path.join(root, "third_party", "blob") };

    const first = await applier.apply(step);
    const second = await applier.apply(step);

    expect(first).toEqual({ status: "success", message: "removed directory" });
    expect(second).toEqual({ status: "success", message: "already absent" });
    expect(await fs.readdir(path.join(root, "third_party"))).toEqual([]);
  });

  it("removes a single file", async () => {
    const root = await makeTempDir("prune-file");
    await touch(path.join(root, "tools", "blob.exe"));
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    const outcome = await applier.apply({ id: "tools/blob.exe", kind: "prune", targetPath: path.join(root, "tools", "blob.exe") });
    expect(outcome).toEqual({ status: "success", message: "removed file" });
  });

  it("treats a path under a file as already absent", async () => {
    const root = await makeTempDir("prune-notdir");
    await touch(path.join(root, "tools", "blob"));
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    const outcome = await applier.apply({ id: "tools/blob/inner", kind: "prune", targetPath: path.join(root, "tools", "blob", "inner") });
    expect(outcome).toEqual({ status: "success", message: "already absent" });
  });

  it("fails when the target cannot be inspected", async () => {
    const root = await makeTempDir("prune-denied");
    const target = path.join(root, "third_party", "blob");
    await touch(target);
    const denied = Object.assign(new Error("EACCES: permission denied, lstat"), { code: "EACCES" });
    vi.spyOn(fs, "lstat").mockRejectedValueOnce(denied);
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    const outcome = await applier.apply({ id: "third_party/blob", kind: "prune", targetPath: target });
    expect(outcome).toEqual({ status: "failure", message: "EACCES: permission denied, lstat" });
    await expect(fs.access(target)).resolves.toBeUndefined();
  });

  it("refuses targets outside the tree", async () => {
    const root = await makeTempDir("prune-escape");
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    const outcome = await applier.apply({ id: "../x", kind: "prune", targetPath: path.resolve(root, "..", "x") });
    expect(outcome.status).toBe("failure");
  });
});

describe("flag injection step", () => {
  it("creates the destination with its header, then appends", async () => {
    const root = await makeTempDir("inject");
    const destination = path.join(root, "out", "Ultimate", "args.gn");
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });
    const step: InjectStep = { id: "flags.gn", kind: "inject", destination, header: "# flags", text: "is_debug = false\n" };

    expect(await applier.apply(step)).toEqual({ status: "success", message: "created" });
    expect(await applier.apply({ ...step, header: "# more", text: "use_lld = true\n" })).toEqual({
      status: "success",
      message: "appended"
    });
    expect(await fs.readFile(destination, "utf8")).toBe("# flags\nis_debug = false\n\n\n# more\nuse_lld = true\n");
  });

  it("uses the append header when the destination already exists", async () => {
    const root = await makeTempDir("inject-append");
    const destination = path.join(root, "out", "Ultimate", "args.gn");
    await touch(destination, "is_official_build = true");
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    const outcome = await applier.apply({
      id: "flags.gn",
      kind: "inject",
      destination,
      header: "# created",
      appendHeader: "# appended",
      text: "use_lld = true\n"
    });
    expect(outcome).toEqual({ status: "success", message: "appended" });
    expect(await fs.readFile(destination, "utf8")).toBe("is_official_build = true\n\n# appended\nuse_lld = true\n");
  });

  it("fails when the destination cannot be created", async () => {
    const root = await makeTempDir("inject-blocked");
    await touch(path.join(root, "out"), "not a directory");
    const applier = new BuiltinStepApplier({ root, logger: createRecordingLogger() });

    const outcome = await applier.apply({
      id: "flags.gn",
      kind: "inject",
      destination: path.join(root, "out", "Ultimate", "args.gn"),
      header: "# flags",
      text: ""
    });
    expect(outcome.status).toBe("failure");
  });
});

describe("patch step", () => {
  async function patchFixture(name: string): Promise<{ root: string; step: PatchStep }> {
    const root = await makeTempDir("patch");
    const patchPath = path.join(root, "patches", name);
    await touch(patchPath, "--- a/x\n+++ b/x\n");
    return { root, step: { id: name, kind: "patch", patchPath } };
  }

  it("succeeds on the primary tool without trying the fallback", async () => {
    const { root, step } = await patchFixture("a.patch");
    const calls: string[] = [];
    const applier = new BuiltinStepApplier({
      root,
      logger: createRecordingLogger(),
      primaryPatchTool: fakePatchTool("primary", {}, calls),
      fallbackPatchTool: fakePatchTool("fallback", {}, calls)
    });

    expect(await applier.apply(step)).toEqual({ status: "success" });
    expect(calls).toEqual(["primary:a.patch"]);
  });

  it("records a clean fallback application as success", async () => {
    const { root, step } = await patchFixture("a.patch");
    const applier = new BuiltinStepApplier({
      root,
      logger: createRecordingLogger(),
      primaryPatchTool: fakePatchTool("primary", { "a.patch": commandResult(1, "", "error: patch does not apply") }),
      fallbackPatchTool: fakePatchTool("fallback", { "a.patch": commandResult(0, "patching file x\n") })
    });

    expect(await applier.apply(step)).toEqual({ status: "success", message: "applied with fallback" });
  });

  it("records rejected hunks from the fallback as partial success", async () => {
    const { root, step } = await patchFixture("a.patch");
    const applier = new BuiltinStepApplier({
      root,
      logger: createRecordingLogger(),
      primaryPatchTool: fakePatchTool("primary", { "a.patch": commandResult(1) }),
      fallbackPatchTool: fakePatchTool("fallback", {
        "a.patch": commandResult(1, "patching file x\nHunk #2 FAILED at 30.\n1 out of 2 hunks FAILED -- saving rejects to file x.rej\n")
      })
    });

    expect(await applier.apply(step)).toEqual({ status: "partial", message: "fallback rejected some hunks" });
  });

  it("fails with both diagnostics when every hunk is rejected", async () => {
    const { root, step } = await patchFixture("b.patch");
    const applier = new BuiltinStepApplier({
      root,
      logger: createRecordingLogger(),
      primaryPatchTool: fakePatchTool("primary", { "b.patch": commandResult(1, "", "error: corrupt patch") }),
      fallbackPatchTool: fakePatchTool("fallback", {
        "b.patch": commandResult(1, "1 out of 1 hunk FAILED -- saving rejects to file x.rej")
      })
    });

    expect(await applier.apply(step)).toEqual({
      status: "failure",
      message:
        "primary: primary exited 1: error: corrupt patch; fallback: fallback exited 1: 1 out of 1 hunk FAILED -- saving rejects to file x.rej"
    });
  });

  it("treats a timed-out fallback as a failed attempt", async () => {
    const { root, step } = await patchFixture("c.patch");
    const applier = new BuiltinStepApplier({
      root,
      logger: createRecordingLogger(),
      primaryPatchTool: fakePatchTool("primary", { "c.patch": commandResult(1) }),
      fallbackPatchTool: fakePatchTool("fallback", { "c.patch": commandResult(1, "1 out of 2 hunks FAILED", "", true) })
    });

    expect((await applier.apply(step)).status).toBe("failure");
  });

  it("fails without calling any tool when the patch file is missing", async () => {
    const root = await makeTempDir("patch-missing");
    const calls: string[] = [];
    const applier = new BuiltinStepApplier({
      root,
      logger: createRecordingLogger(),
      primaryPatchTool: fakePatchTool("primary", {}, calls),
      fallbackPatchTool: fakePatchTool("fallback", {}, calls)
    });

    const outcome = await applier.apply({ id: "gone.patch", kind: "patch", patchPath: path.join(root, "gone.patch") });
    expect(outcome.status).toBe("failure");
    expect(calls).toEqual([]);
  });

  it("converts a throwing tool into a failure outcome", async () => {
    const { root, step } = await patchFixture("a.patch");
    const applier = new BuiltinStepApplier({
      root,
      logger: createRecordingLogger(),
      primaryPatchTool: {
        name: "primary",
        async apply() {
          throw new Error("spawn git ENOENT");
        }
      }
    });

    expect(await applier.apply(step)).toEqual({ status: "failure", message: "spawn git ENOENT" });
  });
});
