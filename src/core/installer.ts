import { chmod, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { HookDefinition } from "../hooks/git-hook.js";
import { logger } from "../utils/logger.js";
import { ErrorCode, InstallError, UninstallError, describeError } from "./errors.js";
import { getHooksDir } from "./project-root.js";
import { isManagedShim, renderShim } from "./shim.js";
import type { ShimLauncher } from "./shim.js";

const SHIM_MODE = 0o755;

export interface InstallerOptions {
  projectRoot: string;
  launcher: ShimLauncher;
  /** Search paths baked into shims; omitted means the shim uses config/defaults at run time. */
  hookPaths?: readonly string[];
}

export interface InstalledHook {
  hookName: string;
  path: string;
  managed: boolean;
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  return await stat(path)
    .then((entry) => entry.isDirectory())
    .catch(() => false);
}

export class HookInstaller {
  readonly projectRoot: string;
  readonly hooksDir: string;
  private readonly launcher: ShimLauncher;
  private readonly hookPaths?: readonly string[];

  constructor(options: InstallerOptions) {
    this.projectRoot = options.projectRoot;
    this.hooksDir = getHooksDir(options.projectRoot);
    this.launcher = options.launcher;
    this.hookPaths = options.hookPaths;
  }

  getShimPath(hookName: string): string {
    return join(this.hooksDir, hookName);
  }

  async install(definition: Pick<HookDefinition, "hookName">): Promise<boolean> {
    const { hookName } = definition;

    if (!(await isDirectory(this.hooksDir))) {
      throw new InstallError(`Hooks directory not found: ${this.hooksDir}`, ErrorCode.HOOKS_DIR_MISSING);
    }

    const shimPath = this.getShimPath(hookName);
    let existing: string | null;
    try {
      existing = await readIfExists(shimPath);
    } catch (error: unknown) {
      throw new InstallError(`Cannot read existing hook ${shimPath}: ${describeError(error)}`, ErrorCode.WRITE_FAILED);
    }

    if (existing !== null && !isManagedShim(existing)) {
      throw new InstallError(
        `A hook not managed by hookwright already exists at ${shimPath}`,
        ErrorCode.FOREIGN_HOOK,
        "Move or delete the existing hook by hand, then install again."
      );
    }

    const content = renderShim({
      hookName,
      projectRoot: this.projectRoot,
      launcher: this.launcher,
      hookPaths: this.hookPaths,
    });

    try {
      await writeFile(shimPath, content, { encoding: "utf8", mode: SHIM_MODE });
      // `mode` only applies when the file is created; overwrites keep the old bits.
      await chmod(shimPath, SHIM_MODE);
    } catch (error: unknown) {
      throw new InstallError(`Failed to write hook ${shimPath}: ${describeError(error)}`, ErrorCode.WRITE_FAILED);
    }

    logger.debug(`Wrote shim ${shimPath}`);
    return true;
  }

  /** Returns false when nothing is installed under `hookName`. */
  async uninstall(hookName: string): Promise<boolean> {
    const shimPath = this.getShimPath(hookName);

    let existing: string | null;
    try {
      existing = await readIfExists(shimPath);
    } catch (error: unknown) {
      throw new UninstallError(`Cannot read hook ${shimPath}: ${describeError(error)}`, ErrorCode.WRITE_FAILED);
    }

    if (existing === null) {
      return false;
    }

    if (!isManagedShim(existing)) {
      throw new UninstallError(
        `Refusing to remove ${shimPath}: it was not installed by hookwright`,
        ErrorCode.FOREIGN_HOOK
      );
    }

    try {
      await rm(shimPath);
    } catch (error: unknown) {
      throw new UninstallError(`Failed to remove hook ${shimPath}: ${describeError(error)}`, ErrorCode.WRITE_FAILED);
    }

    logger.debug(`Removed shim ${shimPath}`);
    return true;
  }

  async listInstalled(): Promise<InstalledHook[]> {
    if (!(await isDirectory(this.hooksDir))) {
      return [];
    }

    const entries = await readdir(this.hooksDir, { withFileTypes: true });
    const installed: InstalledHook[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || entry.name.endsWith(".sample")) continue;

      const path = join(this.hooksDir, entry.name);
      const content = await readFile(path, "utf8").catch(() => "");
      installed.push({ hookName: entry.name, path, managed: isManagedShim(content) });
    }

    return installed.sort((a, b) => a.hookName.localeCompare(b.hookName));
  }
}
