import chalk from "chalk";
import { GitHookContext } from "../hooks/context.js";
import type { HookDefinition } from "../hooks/git-hook.js";
import { HookResultSchema, fail, resolveExitCode } from "../hooks/result.js";
import type { HookResult } from "../hooks/result.js";
import { isDebugEnabled, logger } from "../utils/logger.js";
import { discoverHooks } from "./discovery.js";
import type { DiscoveryOptions } from "./discovery.js";
import { HookExecutionFault } from "./errors.js";

export interface RunHookOptions extends DiscoveryOptions {
  hookName: string;
  /** Everything Git piped to the hook, unsplit. */
  stdin?: string;
  /** Arguments Git passed to the hook. */
  args?: readonly string[];
}

/**
 * Calls `execute`, turning anything it throws (or a return value that is not
 * a result) into a failed result. Nothing escapes to the caller.
 */
export async function executeHook(definition: HookDefinition, context: GitHookContext): Promise<HookResult> {
  let returned: unknown;
  try {
    returned = await definition.execute(context);
  } catch (error: unknown) {
    const fault = new HookExecutionFault(context.hookName, error);
    if (isDebugEnabled() && error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return fail(fault.message);
  }

  const parsed = HookResultSchema.safeParse(returned);
  if (!parsed.success) {
    return fail(`Hook '${context.hookName}' did not return a result (expected { success: boolean, ... })`);
  }
  return parsed.data;
}

export function reportResult(result: HookResult): void {
  if (!result.message) {
    return;
  }

  if (result.success) {
    console.log(chalk.green(result.message));
  } else {
    console.error(chalk.red(result.message));
  }
}

/**
 * One hook invocation: discover, resolve, execute, report. Discovery and
 * resolution errors propagate; hook faults do not.
 */
export async function runHook(options: RunHookOptions): Promise<number> {
  const registry = await discoverHooks(options);
  const hook = registry.resolve(options.hookName);
  logger.debug(`Running "${hook.hookName}" from ${hook.source}`);

  const context = GitHookContext.fromRawStdin(
    hook.hookName,
    options.stdin ?? "",
    registry.projectRoot,
    options.args ?? []
  );

  const result = await executeHook(hook.definition, context);
  reportResult(result);

  const exitCode = resolveExitCode(result);
  logger.debug(`Hook "${hook.hookName}" finished with exit code ${exitCode}`);
  return exitCode;
}
