import { GitHook, fail, succeed } from "hookwright";
import type { GitHookContext, HookResult } from "hookwright";

const ZERO_SHA = /^0+$/;

/**
 * Runs the test suite before pushing, unless every ref being pushed is a
 * deletion.
 */
export default class PrePushTest extends GitHook {
  hookName = "pre-push";

  async execute(context: GitHookContext): Promise<HookResult> {
    // Each stdin line: <local ref> <local sha> <remote ref> <remote sha>
    const updates = context.stdinLines.map((line) => line.split(" "));
    if (updates.length > 0 && updates.every(([, localSha]) => localSha !== undefined && ZERO_SHA.test(localSha))) {
      return succeed("Only deleting refs; tests skipped.");
    }

    const remote = context.args[0] ?? "remote";
    this.logger.info(`Running tests before pushing to ${remote}...`);
    const result = await this.commands.run(["npm", "test"], { cwd: context.projectRoot });

    if (!result.success) {
      if (result.stdout) this.logger.error(result.stdout);
      return fail("Tests failed. Push aborted.", result.exitCode);
    }

    return succeed("Tests passed.");
  }
}
