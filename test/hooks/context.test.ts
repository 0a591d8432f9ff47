import { describe, expect, it } from "vitest";
import { GitHookContext, readStdin, splitStdinLines } from "../../src/hooks/context.js";
import { stdinFrom } from "../helpers.js";

describe("GitHookContext", () => {
  it("splits raw stdin into lines", () => {
    const context = GitHookContext.fromRawStdin(
      "pre-push",
      "refs/heads/main 1111 refs/heads/main 2222\nrefs/tags/v1 3333 refs/tags/v1 0000\n",
      "/repo",
      ["origin", "git@example.com:repo.git"]
    );

    expect(context.hookName).toBe("pre-push");
    expect(context.projectRoot).toBe("/repo");
    expect(context.stdinLines).toEqual([
      "refs/heads/main 1111 refs/heads/main 2222",
      "refs/tags/v1 3333 refs/tags/v1 0000",
    ]);
    expect(context.args).toEqual(["origin", "git@example.com:repo.git"]);
    expect(context.hasStdin()).toBe(true);
  });

  it("treats blank stdin as no lines", () => {
    expect(splitStdinLines("")).toEqual([]);
    expect(splitStdinLines("  \n\n")).toEqual([]);
    expect(splitStdinLines("a\r\nb\r\n")).toEqual(["a", "b"]);
    expect(GitHookContext.empty("pre-commit", "/repo").hasStdin()).toBe(false);
  });

  it("returns a fallback for out-of-range stdin lines", () => {
    const context = GitHookContext.fromRawStdin("pre-push", "only", "/repo");

    expect(context.getStdinLine(0)).toBe("only");
    expect(context.getStdinLine(1)).toBeUndefined();
    expect(context.getStdinLine(-1, "none")).toBe("none");
  });

  it("is frozen once constructed", () => {
    const args = ["msg-file"];
    const context = new GitHookContext({ hookName: "commit-msg", projectRoot: "/repo", args });
    args.push("later");

    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.stdinLines)).toBe(true);
    expect(Object.isFrozen(context.args)).toBe(true);
    expect(context.args).toEqual(["msg-file"]);
  });
});

describe("readStdin", () => {
  it("collects piped input", async () => {
    expect(await readStdin(stdinFrom("line one\n", "line two\n"))).toBe("line one\nline two\n");
  });

  it("does not wait on an interactive terminal", async () => {
    const terminal = {
      isTTY: true,
      async *[Symbol.asyncIterator](): AsyncGenerator<string> {
        yield "typed by a human";
      },
    };

    expect(await readStdin(terminal)).toBe("");
  });
});
