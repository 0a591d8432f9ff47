#!/usr/bin/env node
import { fileURLToPath } from "node:url";
import { createProgram } from "./cli/program.js";

// Debugger and watch flags must not leak into the shims this process writes.
const nodeArgs = process.execArgv.filter((arg) => !arg.startsWith("--inspect") && !arg.startsWith("--watch"));

const program = createProgram({
  cwd: process.cwd(),
  launcher: {
    nodePath: process.execPath,
    nodeArgs,
    entryPath: fileURLToPath(import.meta.url),
  },
  stdin: process.stdin,
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

await program.parseAsync(process.argv);
