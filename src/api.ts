/**
 * What hook files import. Nothing here reaches discovery or globby, so a hook
 * loads the same whether its project evaluates `.ts` files as ESM or CommonJS.
 */
export { GitHook, defineHook, isHookDefinition } from "./hooks/git-hook.js";
export type { HookDefinition } from "./hooks/git-hook.js";
export { GitHookContext, readStdin, splitStdinLines } from "./hooks/context.js";
export type { GitHookContextInit, StdinSource } from "./hooks/context.js";
export { fail, resolveExitCode, succeed } from "./hooks/result.js";
export type { HookResult } from "./hooks/result.js";
export { CommandExecutor, EXIT_COMMAND_NOT_FOUND } from "./tools/command-executor.js";
export type { CommandOptions, CommandResult } from "./tools/command-executor.js";
export { createLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export * from "./core/errors.js";
