import { rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { discoverHooks, extractDefinitions } from "../../src/engine.js";
import { createModuleLoader } from "../../src/core/module-loader.js";
import { GitHookContext } from "../../src/hooks/context.js";
import { createTempRepo, touch } from "../helpers.js";

const authoringEntry = fileURLToPath(new URL("../../src/api.ts", import.meta.url));

const classHookSource = `import { GitHook, succeed } from ${JSON.stringify(authoringEntry)};
import type { GitHookContext } from ${JSON.stringify(authoringEntry)};

export default class PreCommit extends GitHook {
  hookName = "pre-commit";

  execute(context: GitHookContext) {
    return succeed(\`checked \${context.hookName}\`);
  }
}
`;

describe("createModuleLoader", () => {
  let root = "";

  beforeEach(async () => {
    root = await createTempRepo("hookwright-loader-");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("loads a TypeScript hook in a project without package.json", async () => {
    const hookFile = await touch(join(root, "githooks", "pre-commit.ts"), classHookSource);

    const moduleExports = await createModuleLoader().load(hookFile);
    const found = extractDefinitions(moduleExports, hookFile);

    expect(found.map((entry) => entry.definition.hookName)).toEqual(["pre-commit"]);
    expect(await found[0]?.definition.execute(GitHookContext.empty("pre-commit", root))).toEqual({
      success: true,
      message: "checked pre-commit",
    });
  });

  it("loads the same hook in an ESM-scoped project", async () => {
    await writeFile(join(root, "package.json"), JSON.stringify({ type: "module" }), "utf8");
    const hookFile = await touch(join(root, "githooks", "pre-commit.ts"), classHookSource);

    const found = extractDefinitions(await createModuleLoader().load(hookFile), hookFile);

    expect(found.map((entry) => entry.definition.hookName)).toEqual(["pre-commit"]);
  });

  it("loads plain JavaScript hooks with Node's loader", async () => {
    const hookFile = await touch(
      join(root, "githooks", "post-merge.mjs"),
      'export const postMerge = { hookName: "post-merge", execute: () => ({ success: true }) };\n'
    );

    const found = extractDefinitions(await createModuleLoader().load(hookFile), hookFile);

    expect(found).toHaveLength(1);
    expect(found[0]?.exportName).toBe("postMerge");
  });

  it("is what discovery uses when no loader is given", async () => {
    await touch(join(root, "githooks", "pre-commit.ts"), classHookSource);

    const registry = await discoverHooks({ projectRoot: root });

    expect(registry.names()).toEqual(["pre-commit"]);
    expect(registry.get("pre-commit")?.source).toBe("githooks/pre-commit.ts#default");
  });
});
