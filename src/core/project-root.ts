import { statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { getCwd } from "../utils/platform.js";
import { ProjectRootError } from "./errors.js";

function hasGitDirectory(directory: string): boolean {
  try {
    return statSync(join(directory, ".git")).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Walk upward from `start` (inclusive) to the first directory containing a
 * `.git` directory.
 */
export function findProjectRoot(start: string = getCwd()): string {
  let current = resolve(start);

  while (true) {
    if (hasGitDirectory(current)) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) {
      throw new ProjectRootError(
        `Not a git repository (or any parent up to /): ${resolve(start)}`,
        "Run the command inside a git working tree, or pass --project-root."
      );
    }
    current = parent;
  }
}

/** Validate a root given explicitly, as installed shims do. */
export function assertProjectRoot(projectRoot: string): string {
  const resolved = resolve(projectRoot);
  if (!hasGitDirectory(resolved)) {
    throw new ProjectRootError(`No .git directory in project root ${resolved}`);
  }
  return resolved;
}

export function getHooksDir(projectRoot: string): string {
  return join(projectRoot, ".git", "hooks");
}
