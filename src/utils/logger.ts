import chalk from "chalk";
import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getConfigDir, isDebugEnv } from "./platform.js";

let debugEnabled = isDebugEnv();

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugEnabled(): boolean {
  return debugEnabled;
}

function getLogFilePath(): string {
  const dir = getConfigDir();
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
  return join(dir, "debug.log");
}

function timestamp(): string {
  return new Date().toISOString();
}

function writeToFile(level: string, scope: string, message: string): void {
  if (!debugEnabled) return;
  try {
    const prefix = scope ? ` [${scope}]` : "";
    appendFileSync(getLogFilePath(), `[${timestamp()}] [${level}]${prefix} ${message}\n`);
  } catch {
    // Logging must not fail a hook
  }
}

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export function createLogger(scope = ""): Logger {
  const tag = scope ? `[${scope}] ` : "";

  return {
    info(message: string): void {
      console.log(`${tag}${message}`);
      writeToFile("INFO", scope, message);
    },

    success(message: string): void {
      console.log(chalk.green(`${tag}${message}`));
      writeToFile("INFO", scope, message);
    },

    warn(message: string): void {
      console.error(chalk.yellow(`${tag}[WARN] ${message}`));
      writeToFile("WARN", scope, message);
    },

    error(message: string): void {
      console.error(chalk.red(`${tag}[ERROR] ${message}`));
      writeToFile("ERROR", scope, message);
    },

    debug(message: string): void {
      if (debugEnabled) {
        console.error(chalk.gray(`${tag}[DEBUG] ${message}`));
      }
      writeToFile("DEBUG", scope, message);
    },
  };
}

export const logger = createLogger();
