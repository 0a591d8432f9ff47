/** Marker that identifies a hook file as written (and removable) by hookwright. */
export const SHIM_SENTINEL = "hookwright-managed-shim";

/** How an installed shim starts the CLI again. */
export interface ShimLauncher {
  /** Absolute path of the Node.js binary. */
  nodePath: string;
  /** Interpreter flags, e.g. `--import tsx` when running from sources. */
  nodeArgs: readonly string[];
  /** Absolute path of the CLI entry file. */
  entryPath: string;
}

export interface ShimOptions {
  hookName: string;
  projectRoot: string;
  launcher: ShimLauncher;
  hookPaths?: readonly string[];
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function isManagedShim(content: string): boolean {
  return content.includes(SHIM_SENTINEL);
}

/**
 * Render the POSIX shell script Git runs for `hookName`. `exec` hands stdin
 * over untouched and `"$@"` passes Git's arguments through after `--`.
 */
export function renderShim(options: ShimOptions): string {
  const { hookName, projectRoot, launcher, hookPaths } = options;

  const command = [
    shellQuote(launcher.nodePath),
    ...launcher.nodeArgs.map(shellQuote),
    shellQuote(launcher.entryPath),
    "--project-root",
    shellQuote(projectRoot),
    "run",
    shellQuote(hookName),
  ];

  if (hookPaths && hookPaths.length > 0) {
    command.push("--hook-paths", ...hookPaths.map(shellQuote));
  }

  command.push("--", '"$@"');

  return [
    "#!/bin/sh",
    `# ${SHIM_SENTINEL}`,
    "# Installed by hookwright. Remove with `hookwright uninstall` rather than editing.",
    `# hook: ${hookName}`,
    `# project root: ${projectRoot}`,
    `exec ${command.join(" ")}`,
    "",
  ].join("\n");
}
