export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_DISCOVERY_ERROR = 2;
/** Reserved so callers can tell "no such hook" apart from "hook ran and failed". */
export const EXIT_HOOK_NOT_FOUND = 3;

export enum ErrorCode {
  DUPLICATE_HOOK = "DUPLICATE_HOOK",
  MALFORMED_DEFINITION = "MALFORMED_DEFINITION",
  HOOK_NOT_FOUND = "HOOK_NOT_FOUND",
  HOOKS_DIR_MISSING = "HOOKS_DIR_MISSING",
  FOREIGN_HOOK = "FOREIGN_HOOK",
  WRITE_FAILED = "WRITE_FAILED",
  PROJECT_ROOT_NOT_FOUND = "PROJECT_ROOT_NOT_FOUND",
  INVALID_CONFIG = "INVALID_CONFIG",
  EXAMPLE_NOT_FOUND = "EXAMPLE_NOT_FOUND",
  TARGET_EXISTS = "TARGET_EXISTS",
  HOOK_EXECUTION_FAULT = "HOOK_EXECUTION_FAULT",
}

export class HookwrightError extends Error {
  public readonly code: ErrorCode;
  public readonly exitCode: number;
  public readonly suggestion?: string;

  constructor(message: string, code: ErrorCode, exitCode = EXIT_FAILURE, suggestion?: string) {
    super(message);
    this.name = "HookwrightError";
    this.code = code;
    this.exitCode = exitCode;
    this.suggestion = suggestion;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DiscoveryError extends HookwrightError {
  constructor(message: string, code: ErrorCode.DUPLICATE_HOOK | ErrorCode.MALFORMED_DEFINITION, suggestion?: string) {
    super(message, code, EXIT_DISCOVERY_ERROR, suggestion);
    this.name = "DiscoveryError";
  }
}

export class HookNotFoundError extends HookwrightError {
  public readonly hookName: string;

  constructor(hookName: string, suggestion?: string) {
    super(`Hook '${hookName}' not found`, ErrorCode.HOOK_NOT_FOUND, EXIT_HOOK_NOT_FOUND, suggestion);
    this.name = "HookNotFoundError";
    this.hookName = hookName;
  }
}

export class InstallError extends HookwrightError {
  constructor(
    message: string,
    code: ErrorCode.HOOKS_DIR_MISSING | ErrorCode.FOREIGN_HOOK | ErrorCode.WRITE_FAILED,
    suggestion?: string
  ) {
    super(message, code, EXIT_FAILURE, suggestion);
    this.name = "InstallError";
  }
}

export class UninstallError extends HookwrightError {
  constructor(message: string, code: ErrorCode.FOREIGN_HOOK | ErrorCode.WRITE_FAILED, suggestion?: string) {
    super(message, code, EXIT_FAILURE, suggestion);
    this.name = "UninstallError";
  }
}

export class ProjectRootError extends HookwrightError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.PROJECT_ROOT_NOT_FOUND, EXIT_FAILURE, suggestion);
    this.name = "ProjectRootError";
  }
}

export class ConfigError extends HookwrightError {
  constructor(message: string, suggestion?: string) {
    super(message, ErrorCode.INVALID_CONFIG, EXIT_FAILURE, suggestion);
    this.name = "ConfigError";
  }
}

export class SeedError extends HookwrightError {
  constructor(message: string, code: ErrorCode.EXAMPLE_NOT_FOUND | ErrorCode.TARGET_EXISTS, suggestion?: string) {
    super(message, code, EXIT_FAILURE, suggestion);
    this.name = "SeedError";
  }
}

/**
 * Wraps anything thrown from a hook's `execute`. The runner converts it into a
 * failed result; it never reaches the CLI layer.
 */
export class HookExecutionFault extends HookwrightError {
  public readonly hookName: string;

  constructor(hookName: string, cause: unknown) {
    super(
      `Unexpected error in hook '${hookName}': ${describeError(cause)}`,
      ErrorCode.HOOK_EXECUTION_FAULT,
      EXIT_FAILURE
    );
    this.name = "HookExecutionFault";
    this.hookName = hookName;
    this.cause = cause;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
