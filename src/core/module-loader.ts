import { extname } from "node:path";
import { pathToFileURL } from "node:url";
import { tsImport } from "tsx/esm/api";
import { isRecord } from "../hooks/git-hook.js";

export type ModuleExports = Record<string, unknown>;

export interface ModuleLoader {
  load(filePath: string): Promise<ModuleExports>;
}

const TYPESCRIPT_EXTENSIONS = new Set([".ts", ".mts", ".cts"]);

/**
 * TypeScript hook files go through tsx so projects need no build step for
 * their hooks; JavaScript files use Node's own loader.
 */
export function createModuleLoader(parentURL: string = import.meta.url): ModuleLoader {
  return {
    async load(filePath: string): Promise<ModuleExports> {
      const specifier = pathToFileURL(filePath).href;
      const loaded: unknown = TYPESCRIPT_EXTENSIONS.has(extname(filePath))
        ? await tsImport(specifier, parentURL)
        : await import(specifier);

      if (!isRecord(loaded)) {
        throw new Error(`${filePath} did not evaluate to a module`);
      }
      return loaded;
    },
  };
}
