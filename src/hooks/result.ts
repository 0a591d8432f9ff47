import { z } from "zod";
import { EXIT_FAILURE, EXIT_SUCCESS } from "../core/errors.js";

export const HookResultSchema = z.object({
  success: z.boolean(),
  message: z.string().optional(),
  exitCode: z.number().int().optional(),
});

export type HookResult = z.infer<typeof HookResultSchema>;

export function succeed(message?: string): HookResult {
  return { success: true, message };
}

export function fail(message?: string, exitCode?: number): HookResult {
  return { success: false, message, exitCode };
}

/** Highest status a process can report; larger values wrap modulo 256. */
const MAX_EXIT_CODE = 255;

/**
 * A successful result always exits 0. A failure keeps an explicit exit code
 * in 1..255 and otherwise exits 1, so a failed hook can never let Git proceed.
 */
export function resolveExitCode(result: HookResult): number {
  if (result.success) {
    return EXIT_SUCCESS;
  }

  if (result.exitCode !== undefined && result.exitCode > EXIT_SUCCESS && result.exitCode <= MAX_EXIT_CODE) {
    return result.exitCode;
  }

  return EXIT_FAILURE;
}
