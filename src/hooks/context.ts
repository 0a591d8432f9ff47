export interface GitHookContextInit {
  hookName: string;
  projectRoot: string;
  stdinLines?: readonly string[];
  args?: readonly string[];
}

/**
 * Immutable snapshot of one hook invocation: what Git passed on stdin and as
 * arguments, plus the project the hook belongs to.
 */
export class GitHookContext {
  readonly hookName: string;
  readonly projectRoot: string;
  readonly stdinLines: readonly string[];
  readonly args: readonly string[];

  constructor(init: GitHookContextInit) {
    this.hookName = init.hookName;
    this.projectRoot = init.projectRoot;
    this.stdinLines = Object.freeze([...(init.stdinLines ?? [])]);
    this.args = Object.freeze([...(init.args ?? [])]);
    Object.freeze(this);
  }

  static fromRawStdin(
    hookName: string,
    rawStdin: string,
    projectRoot: string,
    args: readonly string[] = []
  ): GitHookContext {
    return new GitHookContext({
      hookName,
      projectRoot,
      stdinLines: splitStdinLines(rawStdin),
      args,
    });
  }

  static empty(hookName: string, projectRoot: string): GitHookContext {
    return new GitHookContext({ hookName, projectRoot });
  }

  getStdinLine(index: number): string | undefined;
  getStdinLine(index: number, fallback: string): string;
  getStdinLine(index: number, fallback?: string): string | undefined {
    if (index >= 0 && index < this.stdinLines.length) {
      return this.stdinLines[index];
    }
    return fallback;
  }

  hasStdin(): boolean {
    return this.stdinLines.length > 0;
  }
}

export function splitStdinLines(rawStdin: string): string[] {
  const trimmed = rawStdin.trim();
  if (!trimmed) {
    return [];
  }
  return trimmed.split(/\r?\n/);
}

export interface StdinSource extends AsyncIterable<Buffer | string> {
  isTTY?: boolean;
}

/**
 * Read everything Git piped in. An interactive terminal means nothing was
 * piped, so it is not waited on.
 */
export async function readStdin(stream: StdinSource): Promise<string> {
  if (stream.isTTY) {
    return "";
  }

  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}
