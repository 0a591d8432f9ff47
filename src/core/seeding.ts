import { constants } from "node:fs";
import { copyFile, mkdir, readdir } from "node:fs/promises";
import { basename, join } from "node:path";
import { fileURLToPath } from "node:url";
import { DEFAULT_HOOK_SEARCH_PATHS } from "./discovery.js";
import { ErrorCode, SeedError } from "./errors.js";

const EXAMPLE_EXTENSION = ".ts";
const DEFAULT_SEED_DIR = DEFAULT_HOOK_SEARCH_PATHS[0] ?? "githooks";

/** `templates/` sits at the package root both for `src/core` and `dist/core`. */
export function getTemplatesDir(): string {
  return fileURLToPath(new URL("../../templates/", import.meta.url));
}

export async function listExamples(templatesDir: string = getTemplatesDir()): Promise<string[]> {
  const entries = await readdir(templatesDir, { withFileTypes: true }).catch(() => []);
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(EXAMPLE_EXTENSION))
    .map((entry) => basename(entry.name, EXAMPLE_EXTENSION))
    .sort();
}

export interface SeedOptions {
  templatesDir?: string;
  targetDir?: string;
}

/** Copy a bundled example into the project's hook directory; never overwrites. */
export async function seedExample(projectRoot: string, exampleName: string, options: SeedOptions = {}): Promise<string> {
  const templatesDir = options.templatesDir ?? getTemplatesDir();
  const available = await listExamples(templatesDir);

  if (!available.includes(exampleName)) {
    throw new SeedError(
      `Example '${exampleName}' not found`,
      ErrorCode.EXAMPLE_NOT_FOUND,
      available.length > 0 ? `Available examples: ${available.join(", ")}` : undefined
    );
  }

  const targetDir = join(projectRoot, options.targetDir ?? DEFAULT_SEED_DIR);
  const targetPath = join(targetDir, `${exampleName}${EXAMPLE_EXTENSION}`);
  await mkdir(targetDir, { recursive: true });

  try {
    await copyFile(join(templatesDir, `${exampleName}${EXAMPLE_EXTENSION}`), targetPath, constants.COPYFILE_EXCL);
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      throw new SeedError(`Example '${exampleName}' already exists at ${targetPath}`, ErrorCode.TARGET_EXISTS);
    }
    throw error;
  }

  return targetPath;
}
