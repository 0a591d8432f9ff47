import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { DEFAULT_HOOK_SEARCH_PATHS } from "../core/discovery.js";
import { ConfigError } from "../core/errors.js";

export const CONFIG_FILE_NAME = ".hookwrightrc.json";

export const SettingsSchema = z
  .object({
    hookPaths: z.array(z.string().min(1)).min(1).default([...DEFAULT_HOOK_SEARCH_PATHS]),
    includeRootHooks: z.boolean().default(true),
    debug: z.boolean().default(false),
  })
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;

export function getConfigPath(projectRoot: string): string {
  return join(projectRoot, CONFIG_FILE_NAME);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

export function loadSettings(projectRoot: string): Settings {
  const configPath = getConfigPath(projectRoot);

  if (!existsSync(configPath)) {
    return SettingsSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf8"));
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Could not parse ${configPath}: ${message}`);
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export interface SettingsOverrides {
  hookPaths?: readonly string[];
  debug?: boolean;
}

/** Command-line flags win over the config file, which wins over defaults. */
export function applyOverrides(settings: Settings, overrides: SettingsOverrides): Settings {
  return {
    ...settings,
    ...(overrides.hookPaths && overrides.hookPaths.length > 0 ? { hookPaths: [...overrides.hookPaths] } : {}),
    ...(overrides.debug ? { debug: true } : {}),
  };
}
