import type { HookDefinition } from "../hooks/git-hook.js";
import { DiscoveryError, ErrorCode, HookNotFoundError } from "./errors.js";

export interface RegisteredHook {
  hookName: string;
  definition: HookDefinition;
  /** File and export the definition was read from, e.g. `githooks/lint.ts#default`. */
  source: string;
}

export interface ScannedLocation {
  /** Directory searched, or the glob used for root-level hook files. */
  path: string;
  exists: boolean;
  candidates: number;
}

export class HookRegistry {
  readonly projectRoot: string;
  private readonly hooks = new Map<string, RegisteredHook>();
  private readonly scanned: ScannedLocation[] = [];

  constructor(projectRoot: string) {
    this.projectRoot = projectRoot;
  }

  register(hook: RegisteredHook): void {
    const existing = this.hooks.get(hook.hookName);
    if (existing) {
      throw new DiscoveryError(
        `Hook "${hook.hookName}" is defined more than once: ${existing.source} and ${hook.source}`,
        ErrorCode.DUPLICATE_HOOK,
        "Rename or remove one of the definitions; each hook name may only be defined once."
      );
    }

    this.hooks.set(hook.hookName, hook);
  }

  get(hookName: string): RegisteredHook | undefined {
    return this.hooks.get(hookName);
  }

  has(hookName: string): boolean {
    return this.hooks.has(hookName);
  }

  list(): RegisteredHook[] {
    return [...this.hooks.values()].sort((a, b) => a.hookName.localeCompare(b.hookName));
  }

  names(): string[] {
    return this.list().map((hook) => hook.hookName);
  }

  get size(): number {
    return this.hooks.size;
  }

  recordLocation(location: ScannedLocation): void {
    this.scanned.push(location);
  }

  locations(): readonly ScannedLocation[] {
    return this.scanned;
  }

  resolve(hookName: string): RegisteredHook {
    const hook = this.hooks.get(hookName);
    if (!hook) {
      throw new HookNotFoundError(hookName, this.describeSearch());
    }
    return hook;
  }

  private describeSearch(): string {
    const lines = ["Searched:"];

    for (const location of this.scanned) {
      if (!location.exists) {
        lines.push(`  - ${location.path} (directory does not exist)`);
      } else if (location.candidates === 0) {
        lines.push(`  - ${location.path} (no hook files found)`);
      } else {
        const noun = location.candidates === 1 ? "file" : "files";
        lines.push(`  - ${location.path} (${location.candidates} hook ${noun})`);
      }
    }

    const names = this.names();
    lines.push(names.length > 0 ? `Available hooks: ${names.join(", ")}` : "No hooks are defined.");
    return lines.join("\n");
  }
}
