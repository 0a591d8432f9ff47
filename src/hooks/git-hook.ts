import { CommandExecutor } from "../tools/command-executor.js";
import { createLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import type { GitHookContext } from "./context.js";
import type { HookResult } from "./result.js";

export interface HookDefinition {
  readonly hookName: string;
  execute(context: GitHookContext): HookResult | Promise<HookResult>;
}

/**
 * Base class for hooks written as classes. Subclasses must be constructible
 * without arguments, since discovery instantiates them.
 *
 * @example
 * export default class PreCommit extends GitHook {
 *   hookName = "pre-commit";
 *
 *   async execute() {
 *     const result = await this.commands.run(["npm", "run", "lint"]);
 *     return result.success ? succeed("Lint passed") : fail("Lint failed");
 *   }
 * }
 */
export abstract class GitHook implements HookDefinition {
  abstract readonly hookName: string;

  private scopedLogger?: Logger;
  private commandExecutor?: CommandExecutor;

  // Lazy: `hookName` is assigned by the subclass after this constructor runs.
  protected get logger(): Logger {
    if (!this.scopedLogger) {
      this.scopedLogger = createLogger(this.hookName);
    }
    return this.scopedLogger;
  }

  protected get commands(): CommandExecutor {
    if (!this.commandExecutor) {
      this.commandExecutor = new CommandExecutor(this.logger);
    }
    return this.commandExecutor;
  }

  abstract execute(context: GitHookContext): HookResult | Promise<HookResult>;
}

/** Typed identity helper for hooks written as plain objects. */
export function defineHook<T extends HookDefinition>(definition: T): T {
  return definition;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function hasExecute(
  value: unknown
): value is Record<string, unknown> & { execute: (...args: unknown[]) => unknown } {
  return isRecord(value) && typeof value.execute === "function";
}

export function isHookDefinition(value: unknown): value is HookDefinition {
  return hasExecute(value) && typeof value.hookName === "string" && value.hookName.length > 0;
}
