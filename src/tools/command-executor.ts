import { spawn } from "node:child_process";
import { EXIT_FAILURE } from "../core/errors.js";
import type { Logger } from "../utils/logger.js";

/** Exit status a shell reports for a command it cannot find. */
export const EXIT_COMMAND_NOT_FOUND = 127;

export interface CommandResult {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  command: string[];
}

export interface CommandOptions {
  cwd?: string;
  input?: string;
  env?: NodeJS.ProcessEnv;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Runs an argument list without a shell and captures its output. Never
 * rejects: spawn failures come back as unsuccessful results.
 */
export class CommandExecutor {
  private readonly logger?: Logger;
  private readonly defaultCwd?: string;

  constructor(logger?: Logger, defaultCwd?: string) {
    this.logger = logger;
    this.defaultCwd = defaultCwd;
  }

  async run(command: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const argv = [...command];
    const [executable, ...args] = argv;

    if (!executable) {
      return { success: false, exitCode: EXIT_FAILURE, stdout: "", stderr: "No command given", command: argv };
    }

    this.logger?.debug(`Executing: ${argv.join(" ")}`);

    return await new Promise<CommandResult>((resolve) => {
      const child = spawn(executable, args, {
        cwd: options.cwd ?? this.defaultCwd,
        env: options.env ?? process.env,
        stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";
      let settled = false;

      const finish = (result: CommandResult): void => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      child.stdout?.on("data", (chunk: Buffer | string) => {
        stdout += chunk.toString();
      });

      child.stderr?.on("data", (chunk: Buffer | string) => {
        stderr += chunk.toString();
      });

      if (child.stdin && options.input !== undefined) {
        child.stdin.on("error", (error) => {
          this.logger?.debug(`stdin of ${executable} closed early: ${error.message}`);
        });
        child.stdin.end(options.input);
      }

      child.on("error", (error) => {
        if (isErrnoException(error) && error.code === "ENOENT") {
          const message = `Command not found: ${executable}`;
          this.logger?.error(message);
          finish({ success: false, exitCode: EXIT_COMMAND_NOT_FOUND, stdout: "", stderr: message, command: argv });
          return;
        }

        const message = `Error executing command: ${error.message}`;
        this.logger?.error(message);
        finish({ success: false, exitCode: EXIT_FAILURE, stdout, stderr: message, command: argv });
      });

      child.on("close", (exitCode) => {
        const statusCode = typeof exitCode === "number" ? exitCode : EXIT_FAILURE;
        finish({ success: statusCode === 0, exitCode: statusCode, stdout, stderr, command: argv });
      });
    });
  }
}
