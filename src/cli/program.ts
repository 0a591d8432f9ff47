import { relative } from "node:path";
import chalk from "chalk";
import { Command } from "commander";
import { applyOverrides, loadSettings } from "../config/settings.js";
import type { Settings } from "../config/settings.js";
import { discoverHooks } from "../core/discovery.js";
import { EXIT_FAILURE, EXIT_SUCCESS, HookwrightError, describeError } from "../core/errors.js";
import type { HookRegistry } from "../core/hook-registry.js";
import { HookInstaller } from "../core/installer.js";
import type { ModuleLoader } from "../core/module-loader.js";
import { assertProjectRoot, findProjectRoot } from "../core/project-root.js";
import { runHook } from "../core/runner.js";
import { listExamples, seedExample } from "../core/seeding.js";
import type { ShimLauncher } from "../core/shim.js";
import { readStdin } from "../hooks/context.js";
import type { StdinSource } from "../hooks/context.js";
import { isDebugEnabled, logger, setDebug } from "../utils/logger.js";

const VERSION = "0.1.0";

export interface CliEnvironment {
  cwd: string;
  launcher: ShimLauncher;
  stdin: StdinSource;
  setExitCode(code: number): void;
  loader?: ModuleLoader;
}

interface GlobalOptions {
  projectRoot?: string;
  hookPaths?: string[];
}

interface Workspace {
  projectRoot: string;
  settings: Settings;
  hookPathsOverride?: string[];
}

export function reportError(error: unknown): number {
  if (error instanceof HookwrightError) {
    console.error(chalk.red(`Error: ${error.message}`));
    if (error.suggestion) {
      console.error(error.suggestion);
    }
    return error.exitCode;
  }

  console.error(chalk.red(`Error: ${describeError(error)}`));
  if (isDebugEnabled() && error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  return EXIT_FAILURE;
}

export function createProgram(env: CliEnvironment): Command {
  const program = new Command();

  program
    .name("hookwright")
    .description("Git hooks as TypeScript modules: discover, install and run them")
    .version(VERSION)
    .option("--project-root <path>", "Repository root to use instead of searching upward from the current directory")
    .option("--hook-paths <paths...>", "Directories to search for hook definitions (place after the subcommand)");

  const resolveWorkspace = (): Workspace => {
    const options = program.opts<GlobalOptions>();
    const projectRoot = options.projectRoot ? assertProjectRoot(options.projectRoot) : findProjectRoot(env.cwd);
    const settings = applyOverrides(loadSettings(projectRoot), { hookPaths: options.hookPaths });
    if (settings.debug) {
      setDebug(true);
    }
    return { projectRoot, settings, hookPathsOverride: options.hookPaths };
  };

  const discover = async (workspace: Workspace): Promise<HookRegistry> =>
    await discoverHooks({
      projectRoot: workspace.projectRoot,
      searchPaths: workspace.settings.hookPaths,
      includeRootHooks: workspace.settings.includeRootHooks,
      loader: env.loader,
    });

  const createInstaller = (workspace: Workspace): HookInstaller =>
    new HookInstaller({
      projectRoot: workspace.projectRoot,
      launcher: env.launcher,
      hookPaths: workspace.hookPathsOverride,
    });

  const guard = async (handler: () => Promise<number>): Promise<void> => {
    try {
      env.setExitCode(await handler());
    } catch (error: unknown) {
      env.setExitCode(reportError(error));
    }
  };

  program
    .command("list")
    .description("List the hooks defined in this project")
    .action(async () => {
      await guard(async () => {
        const workspace = resolveWorkspace();
        const registry = await discover(workspace);
        const hooks = registry.list();

        if (hooks.length === 0) {
          console.log("No hooks found");
          return EXIT_SUCCESS;
        }

        console.log("Available hooks:");
        for (const hook of hooks) {
          console.log(`  - ${hook.hookName} (${hook.source})`);
        }
        return EXIT_SUCCESS;
      });
    });

  program
    .command("show")
    .description("Show the hooks installed in .git/hooks")
    .action(async () => {
      await guard(async () => {
        const installer = createInstaller(resolveWorkspace());
        const installed = await installer.listInstalled();

        if (installed.length === 0) {
          console.log("No hooks installed");
          return EXIT_SUCCESS;
        }

        console.log("Installed hooks:");
        for (const hook of installed) {
          console.log(`  - ${hook.hookName} (${hook.managed ? "hookwright" : "external"})`);
        }
        return EXIT_SUCCESS;
      });
    });

  program
    .command("install <name>")
    .description("Install the shim for a hook into .git/hooks")
    .action(async (hookName: string) => {
      await guard(async () => {
        const workspace = resolveWorkspace();
        const registry = await discover(workspace);
        const hook = registry.resolve(hookName);
        const installer = createInstaller(workspace);

        await installer.install(hook.definition);
        logger.success(`Installed hook: ${hookName} (${relative(workspace.projectRoot, installer.getShimPath(hookName))})`);
        return EXIT_SUCCESS;
      });
    });

  program
    .command("uninstall <name>")
    .description("Remove a hook's shim from .git/hooks")
    .action(async (hookName: string) => {
      await guard(async () => {
        const workspace = resolveWorkspace();
        const registry = await discover(workspace);
        registry.resolve(hookName);
        const installer = createInstaller(workspace);

        if (await installer.uninstall(hookName)) {
          logger.success(`Uninstalled hook: ${hookName}`);
        } else {
          logger.warn(`Hook '${hookName}' is not installed`);
        }
        return EXIT_SUCCESS;
      });
    });

  program
    .command("run <name> [args...]")
    .description("Run a hook now, passing stdin and any extra arguments through")
    .option("--debug", "Enable debug logging")
    .allowUnknownOption()
    .action(async (hookName: string, args: string[], options: { debug?: boolean }) => {
      await guard(async () => {
        if (options.debug) {
          setDebug(true);
        }
        const workspace = resolveWorkspace();
        const stdin = await readStdin(env.stdin);

        return await runHook({
          hookName,
          projectRoot: workspace.projectRoot,
          searchPaths: workspace.settings.hookPaths,
          includeRootHooks: workspace.settings.includeRootHooks,
          loader: env.loader,
          stdin,
          args,
        });
      });
    });

  program
    .command("seed [example]")
    .description("List the bundled example hooks, or copy one into githooks/")
    .action(async (example?: string) => {
      await guard(async () => {
        if (!example) {
          const examples = await listExamples();
          if (examples.length === 0) {
            console.log("No example hooks available");
            return EXIT_FAILURE;
          }
          console.log("Available example hooks:");
          for (const name of examples) {
            console.log(`  - ${name}`);
          }
          return EXIT_SUCCESS;
        }

        const { projectRoot } = resolveWorkspace();
        const target = await seedExample(projectRoot, example);
        logger.success(`Seeded example '${example}' to ${relative(projectRoot, target)}`);
        return EXIT_SUCCESS;
      });
    });

  return program;
}
