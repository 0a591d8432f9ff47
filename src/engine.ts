export { DEFAULT_HOOK_SEARCH_PATHS, discoverHooks, extractDefinitions } from "./core/discovery.js";
export type { DiscoveryOptions } from "./core/discovery.js";
export { HookRegistry } from "./core/hook-registry.js";
export type { RegisteredHook, ScannedLocation } from "./core/hook-registry.js";
export { createModuleLoader } from "./core/module-loader.js";
export type { ModuleExports, ModuleLoader } from "./core/module-loader.js";
export { HookInstaller } from "./core/installer.js";
export type { InstalledHook, InstallerOptions } from "./core/installer.js";
export { renderShim } from "./core/shim.js";
export type { ShimLauncher, ShimOptions } from "./core/shim.js";
export { executeHook, runHook } from "./core/runner.js";
export type { RunHookOptions } from "./core/runner.js";
export { findProjectRoot } from "./core/project-root.js";
export { loadSettings } from "./config/settings.js";
export type { Settings } from "./config/settings.js";
