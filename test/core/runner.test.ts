import { rm } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { ErrorCode, HookNotFoundError } from "../../src/core/errors.js";
import { executeHook, runHook } from "../../src/core/runner.js";
import { GitHookContext } from "../../src/hooks/context.js";
import { defineHook } from "../../src/hooks/git-hook.js";
import type { HookDefinition } from "../../src/hooks/git-hook.js";
import { fail, succeed } from "../../src/hooks/result.js";
import { createFakeLoader, createTempRepo, printed, touch } from "../helpers.js";

describe("runHook", () => {
  let root = "";
  let hookFile = "";
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  const run = async (definition: HookDefinition, stdin?: string, args?: string[]): Promise<number> =>
    await runHook({
      hookName: definition.hookName,
      projectRoot: root,
      loader: createFakeLoader({ [hookFile]: { default: definition } }),
      stdin,
      args,
    });

  beforeEach(async () => {
    root = await createTempRepo("hookwright-runner-");
    hookFile = await touch(join(root, "githooks", "hook.ts"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it("exits 0 and prints the message to stdout on success", async () => {
    const code = await run({ hookName: "pre-commit", execute: () => succeed("All checks passed") });

    expect(code).toBe(0);
    expect(printed(logSpy.mock.calls)).toContain("All checks passed");
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("prints nothing when the result carries no message", async () => {
    const code = await run({ hookName: "post-commit", execute: () => succeed() });

    expect(code).toBe(0);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("exits 1 and prints to stderr on failure", async () => {
    const code = await run({ hookName: "pre-commit", execute: () => fail("Lint failed") });

    expect(code).toBe(1);
    expect(printed(errorSpy.mock.calls)).toContain("Lint failed");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("uses an explicit failure exit code", async () => {
    const code = await run({ hookName: "pre-push", execute: () => fail("Tests failed", 7) });

    expect(code).toBe(7);
  });

  it("exits 1 for a failure code outside the range a process can report", async () => {
    const code = await run({ hookName: "pre-commit", execute: () => fail("blocked", 256) });

    expect(code).toBe(1);
    expect(printed(errorSpy.mock.calls)).toContain("blocked");
  });

  it("turns a thrown error into a failure", async () => {
    const code = await run({
      hookName: "pre-commit",
      execute: async () => {
        throw new Error("boom");
      },
    });

    expect(code).toBe(1);
    expect(printed(errorSpy.mock.calls)).toContain("Unexpected error in hook 'pre-commit': boom");
  });

  it("fails a hook that returns something other than a result", async () => {
    const hook = { hookName: "pre-commit", execute: () => Promise.resolve(undefined) };
    const code = await runHook({
      hookName: "pre-commit",
      projectRoot: root,
      loader: createFakeLoader({ [hookFile]: { hook } }),
    });

    expect(code).toBe(1);
    expect(printed(errorSpy.mock.calls)).toContain(
      "Hook 'pre-commit' did not return a result (expected { success: boolean, ... })"
    );
  });

  it("hands stdin lines, arguments and the project root to the hook", async () => {
    const seen: GitHookContext[] = [];
    const hook = defineHook({
      hookName: "pre-push",
      execute: (context: GitHookContext) => {
        seen.push(context);
        return succeed();
      },
    });

    await run(hook, "refs/heads/main 1111 refs/heads/main 0000\nrefs/heads/dev 2222 refs/heads/dev 0000\n", [
      "origin",
      "git@example.com:repo.git",
    ]);

    expect(seen).toHaveLength(1);
    const [context] = seen;
    expect(context?.hookName).toBe("pre-push");
    expect(context?.projectRoot).toBe(root);
    expect(context?.stdinLines).toEqual([
      "refs/heads/main 1111 refs/heads/main 0000",
      "refs/heads/dev 2222 refs/heads/dev 0000",
    ]);
    expect(context?.args).toEqual(["origin", "git@example.com:repo.git"]);
  });

  it("rejects with HookNotFoundError for an unknown hook", async () => {
    const attempt = runHook({ hookName: "pre-rebase", projectRoot: root, loader: createFakeLoader({}) });

    await expect(attempt).rejects.toBeInstanceOf(HookNotFoundError);
    await expect(
      runHook({ hookName: "pre-rebase", projectRoot: root, loader: createFakeLoader({}) })
    ).rejects.toMatchObject({ code: ErrorCode.HOOK_NOT_FOUND, exitCode: 3 });
  });
});

describe("executeHook", () => {
  it("returns the hook's own result untouched", async () => {
    const context = GitHookContext.empty("post-merge", "/work/app");
    const result = await executeHook({ hookName: "post-merge", execute: () => fail("conflict", 4) }, context);

    expect(result).toEqual({ success: false, message: "conflict", exitCode: 4 });
  });

  it("reports non-Error throws by value", async () => {
    const context = GitHookContext.empty("post-merge", "/work/app");
    const result = await executeHook(
      {
        hookName: "post-merge",
        execute: () => {
          throw "plain string";
        },
      },
      context
    );

    expect(result).toEqual({ success: false, message: "Unexpected error in hook 'post-merge': plain string" });
  });
});
