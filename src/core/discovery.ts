import { stat } from "node:fs/promises";
import { join, relative, resolve } from "node:path";
import { globby } from "globby";
import { hasExecute, isHookDefinition, isRecord } from "../hooks/git-hook.js";
import type { HookDefinition } from "../hooks/git-hook.js";
import { logger } from "../utils/logger.js";
import { DiscoveryError, ErrorCode, describeError } from "./errors.js";
import { HookRegistry } from "./hook-registry.js";
import { createModuleLoader } from "./module-loader.js";
import type { ModuleExports, ModuleLoader } from "./module-loader.js";

export const DEFAULT_HOOK_SEARCH_PATHS: readonly string[] = ["githooks"];

const EXTENSIONS = "{ts,mts,cts,js,mjs,cjs}";
const HOOK_FILE_PATTERN = `*.${EXTENSIONS}`;
export const ROOT_HOOK_PATTERN = `*_hook.${EXTENSIONS}`;

// Type declarations, tests and `_helpers` can sit next to hooks.
const IGNORED_FILES = ["*.d.ts", "*.d.mts", "*.d.cts", "*.test.*", "*.spec.*", "_*"];

export interface DiscoveryOptions {
  projectRoot: string;
  searchPaths?: readonly string[];
  /** Also scan `<root>/*_hook.*` files. Defaults to true. */
  includeRootHooks?: boolean;
  loader?: ModuleLoader;
}

interface FoundDefinition {
  exportName: string;
  definition: HookDefinition;
}

async function isDirectory(path: string): Promise<boolean> {
  return await stat(path)
    .then((entry) => entry.isDirectory())
    .catch(() => false);
}

async function findCandidates(cwd: string, pattern: string): Promise<string[]> {
  const matches = await globby(pattern, {
    cwd,
    onlyFiles: true,
    absolute: true,
    deep: 1,
    ignore: IGNORED_FILES,
  });
  return matches.sort();
}

function validateDefinition(candidate: unknown, exportName: string, filePath: string): HookDefinition {
  if (!isHookDefinition(candidate)) {
    throw new DiscoveryError(
      `Export "${exportName}" in ${filePath} has an execute method but no hook name`,
      ErrorCode.MALFORMED_DEFINITION,
      'Declare a non-empty string `hookName`, e.g. hookName = "pre-commit".'
    );
  }
  return candidate;
}

function toDefinition(value: unknown, exportName: string, filePath: string): HookDefinition | null {
  if (typeof value === "function") {
    const prototype: unknown = value.prototype;
    if (!hasExecute(prototype)) {
      return null;
    }

    let instance: unknown;
    try {
      instance = Reflect.construct(value, []);
    } catch (error: unknown) {
      throw new DiscoveryError(
        `Could not instantiate "${exportName}" from ${filePath}: ${describeError(error)}`,
        ErrorCode.MALFORMED_DEFINITION,
        "Hook classes must be constructible without arguments."
      );
    }
    return validateDefinition(instance, exportName, filePath);
  }

  if (hasExecute(value)) {
    return validateDefinition(value, exportName, filePath);
  }

  return null;
}

export function extractDefinitions(moduleExports: ModuleExports, filePath: string): FoundDefinition[] {
  const seen = new Set<unknown>();
  const found: FoundDefinition[] = [];

  const inspect = (exportName: string, value: unknown): void => {
    if (seen.has(value)) return;
    seen.add(value);

    const definition = toDefinition(value, exportName, filePath);
    if (definition) {
      found.push({ exportName, definition });
      return;
    }

    // CommonJS interop: `default` can hold the whole `module.exports` object.
    if (exportName === "default" && isRecord(value)) {
      for (const [innerName, innerValue] of Object.entries(value)) {
        inspect(innerName, innerValue);
      }
    }
  };

  for (const [exportName, value] of Object.entries(moduleExports)) {
    inspect(exportName, value);
  }

  return found;
}

async function registerFile(
  registry: HookRegistry,
  loader: ModuleLoader,
  projectRoot: string,
  filePath: string
): Promise<void> {
  let moduleExports: ModuleExports;
  try {
    moduleExports = await loader.load(filePath);
  } catch (error: unknown) {
    throw new DiscoveryError(
      `Failed to load hook file ${filePath}: ${describeError(error)}`,
      ErrorCode.MALFORMED_DEFINITION
    );
  }

  const displayPath = relative(projectRoot, filePath) || filePath;
  for (const { exportName, definition } of extractDefinitions(moduleExports, filePath)) {
    registry.register({
      hookName: definition.hookName,
      definition,
      source: `${displayPath}#${exportName}`,
    });
    logger.debug(`Discovered hook "${definition.hookName}" in ${displayPath}`);
  }
}

/**
 * Builds a fresh registry from every hook file under the search paths and,
 * unless disabled, the root-level `*_hook.*` files. A hook name defined twice
 * anywhere is an error; no location takes precedence.
 */
export async function discoverHooks(options: DiscoveryOptions): Promise<HookRegistry> {
  const projectRoot = resolve(options.projectRoot);
  const searchPaths = options.searchPaths ?? DEFAULT_HOOK_SEARCH_PATHS;
  const loader = options.loader ?? createModuleLoader();
  const registry = new HookRegistry(projectRoot);
  const visited = new Set<string>();

  const scan = async (files: string[]): Promise<void> => {
    for (const filePath of files) {
      if (visited.has(filePath)) continue;
      visited.add(filePath);
      await registerFile(registry, loader, projectRoot, filePath);
    }
  };

  for (const searchPath of searchPaths) {
    const directory = resolve(projectRoot, searchPath);
    if (!(await isDirectory(directory))) {
      logger.debug(`Skipping missing hook directory ${directory}`);
      registry.recordLocation({ path: directory, exists: false, candidates: 0 });
      continue;
    }

    const files = await findCandidates(directory, HOOK_FILE_PATTERN);
    registry.recordLocation({ path: directory, exists: true, candidates: files.length });
    await scan(files);
  }

  if (options.includeRootHooks ?? true) {
    const files = await findCandidates(projectRoot, ROOT_HOOK_PATTERN);
    registry.recordLocation({ path: join(projectRoot, "*_hook.*"), exists: true, candidates: files.length });
    await scan(files);
  }

  return registry;
}
