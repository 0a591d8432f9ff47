import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Bundled templates import the package by name, as seeded hooks do.
    alias: [{ find: /^hookwright$/, replacement: fileURLToPath(new URL("./src/api.ts", import.meta.url)) }],
  },
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
  },
});
