import { spawn } from "child_process";
import { constants as fsConstants, promises as fs } from "fs";
import path from "path";

const MAX_CAPTURE_BYTES = 4 * 1024 * 1024;

export interface CommandOptions {
  /** Seconds before the child is killed. `null` waits indefinitely (interactive jobs). */
  timeoutSeconds?: number | null;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
  cwd?: string;
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  startedAt: string;
  finishedAt: string;
}

/**
 * The only process capability the schedulers depend on: run a command with a
 * timeout. Rejects only when the command cannot be started at all.
 */
export interface CommandRunner {
  run(argv: string[], options?: CommandOptions): Promise<CommandResult>;
  which(binary: string): Promise<string | null>;
}

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number; truncated: boolean }): void {
  if (state.truncated) return;
  const next = state.bytes + chunk.byteLength;
  if (next > MAX_CAPTURE_BYTES) {
    const keep = Math.max(0, MAX_CAPTURE_BYTES - state.bytes);
    if (keep > 0) chunks.push(chunk.subarray(0, keep));
    state.bytes = MAX_CAPTURE_BYTES;
    state.truncated = true;
    return;
  }
  chunks.push(chunk);
  state.bytes = next;
}

export class LocalCommandRunner implements CommandRunner {
  constructor(private readonly defaultTimeoutSeconds: number = 30) {}

  async run(argv: string[], options: CommandOptions = {}): Promise<CommandResult> {
    const [command, ...args] = argv;
    if (!command) throw new Error("command argv must be non-empty");
    const startedAt = new Date().toISOString();

    const child = spawn(command, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env }
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const stdoutState = { bytes: 0, truncated: false };
    const stderrState = { bytes: 0, truncated: false };

    child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
    child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));

    // EPIPE from a child that exits without reading is reported through its exit code.
    child.stdin.on("error", () => undefined);
    if (options.input !== undefined) child.stdin.end(options.input, "utf8");
    else child.stdin.end();

    let timedOut = false;
    const timeoutSeconds = options.timeoutSeconds === undefined ? this.defaultTimeoutSeconds : options.timeoutSeconds;
    const timeoutMs = timeoutSeconds === null ? 0 : Math.max(0, Math.floor(timeoutSeconds * 1000));
    const timeout =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : null;

    const exitCode = await new Promise<number>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code: number | null) => resolve(code ?? (timedOut ? 124 : 1)));
    }).finally(() => {
      if (timeout) clearTimeout(timeout);
    });

    const finishedAt = new Date().toISOString();

    const stdout = Buffer.concat(stdoutChunks).toString("utf8") + (stdoutState.truncated ? "\n[stdout truncated]\n" : "");
    const stderr = Buffer.concat(stderrChunks).toString("utf8") + (stderrState.truncated ? "\n[stderr truncated]\n" : "");

    return { exitCode, stdout, stderr, timedOut, startedAt, finishedAt };
  }

  async which(binary: string): Promise<string | null> {
    if (binary.includes(path.sep)) {
      return (await isExecutable(binary)) ? binary : null;
    }
    const dirs = (process.env.PATH ?? "").split(path.delimiter).filter((d) => d.length > 0);
    for (const dir of dirs) {
      const candidate = path.join(dir, binary);
      if (await isExecutable(candidate)) return candidate;
    }
    return null;
  }
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    const st = await fs.stat(filePath);
    if (!st.isFile()) return false;
    await fs.access(filePath, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}
