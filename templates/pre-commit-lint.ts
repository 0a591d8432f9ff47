import { GitHook, fail, succeed } from "hookwright";
import type { GitHookContext, HookResult } from "hookwright";

/**
 * Runs the project's `lint` script on every commit.
 */
export default class PreCommitLint extends GitHook {
  hookName = "pre-commit";

  async execute(_context: GitHookContext): Promise<HookResult> {
    this.logger.info("Running lint...");
    const result = await this.commands.run(["npm", "run", "--silent", "lint"]);

    if (!result.success) {
      if (result.stdout) this.logger.error(result.stdout);
      if (result.stderr) this.logger.error(result.stderr);
      return fail("Lint failed. Commit aborted.");
    }

    return succeed("Lint passed.");
  }
}
