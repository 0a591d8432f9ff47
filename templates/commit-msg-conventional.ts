import { readFile } from "node:fs/promises";
import { defineHook, fail, succeed } from "hookwright";
import type { GitHookContext } from "hookwright";

const CONVENTIONAL = /^(build|chore|ci|docs|feat|fix|perf|refactor|revert|style|test)(\([\w.-]+\))?!?: .+/;

/**
 * Rejects commit messages whose subject line is not a Conventional Commit.
 * Git passes the path of the message file as the first argument.
 */
export default defineHook({
  hookName: "commit-msg",

  async execute(context: GitHookContext) {
    const messageFile = context.args[0];
    if (!messageFile) {
      return fail("commit-msg hook expects the message file path as its first argument.");
    }

    const message = await readFile(messageFile, "utf8");
    const subject = message.split("\n").find((line) => line.trim() && !line.startsWith("#")) ?? "";

    if (!CONVENTIONAL.test(subject)) {
      return fail(`Commit subject "${subject}" is not a conventional commit (e.g. "feat: add login").`);
    }

    return succeed();
  },
});
