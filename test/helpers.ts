import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { Readable } from "node:stream";
import type { ModuleExports, ModuleLoader } from "../src/core/module-loader.js";
import type { StdinSource } from "../src/hooks/context.js";

/** A directory with an empty `.git/hooks`, the layout `git init` leaves. */
export async function createTempRepo(prefix = "hookwright-repo-"): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), prefix));
  await mkdir(join(root, ".git", "hooks"), { recursive: true });
  return root;
}

/** Create an empty file (and its parents) so discovery can find it on disk. */
export async function touch(path: string, content = ""): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf8");
  return path;
}

export interface FakeLoader extends ModuleLoader {
  loaded: string[];
}

/** Serves module exports from memory, keyed by absolute file path. */
export function createFakeLoader(modules: Record<string, ModuleExports>): FakeLoader {
  const loaded: string[] = [];
  return {
    loaded,
    async load(filePath: string): Promise<ModuleExports> {
      loaded.push(filePath);
      const moduleExports = modules[filePath];
      if (!moduleExports) {
        throw new Error(`Cannot find module '${filePath}'`);
      }
      return moduleExports;
    },
  };
}

export function stdinFrom(...chunks: string[]): StdinSource {
  return Readable.from(chunks);
}

export function printed(calls: unknown[][]): string {
  return calls.map((call) => call.map(String).join(" ")).join("\n");
}
