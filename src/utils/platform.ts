import { homedir } from "node:os";
import { join } from "node:path";

/**
 * Get the hookwright config directory (~/.hookwright/)
 */
export function getConfigDir(): string {
  return join(homedir(), ".hookwright");
}

/**
 * Get the current working directory
 */
export function getCwd(): string {
  return process.cwd();
}

/**
 * Check if debug logging was requested through the environment
 */
export function isDebugEnv(): boolean {
  const value = process.env.HOOKWRIGHT_DEBUG?.toLowerCase();
  return value === "1" || value === "true" || value === "yes";
}
