import { spawn, type ChildProcess } from 'node:child_process';
import { performance } from 'node:perf_hooks';
import process from 'node:process';

export type ProcessResult = {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  readonly durationMs: number;
};

export type RunCommandOptions = {
  readonly cwd?: string;
  /**
   * Kill the child and everything it started once this many milliseconds have passed. `0`
   * disables. At most {@link MAX_TIMEOUT_MS}.
   */
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
};

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions,
) => Promise<ProcessResult>;

export type CommandFailureKind = 'spawn-failure' | 'timeout' | 'exit-non-zero' | 'aborted';

type CommandOutput = {
  readonly stdout: Buffer;
  readonly stderr: Buffer;
  readonly durationMs: number;
};

const EMPTY_OUTPUT: CommandOutput = {
  stdout: Buffer.alloc(0),
  stderr: Buffer.alloc(0),
  durationMs: 0,
};

export abstract class CommandError extends Error {
  abstract readonly kind: CommandFailureKind;
  readonly command: string;
  readonly args: readonly string[];
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;

  protected constructor(
    message: string,
    command: string,
    args: readonly string[],
    output: CommandOutput,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.command = command;
    this.args = [...args];
    this.stdout = output.stdout.toString('utf8');
    this.stderr = output.stderr.toString('utf8');
    this.durationMs = output.durationMs;
  }

  /** Captured output of the failed invocation, stderr first. */
  get diagnostics(): string {
    return [this.stderr.trim(), this.stdout.trim()].filter((part) => part.length > 0).join('\n');
  }
}

export class SpawnFailureError extends CommandError {
  readonly kind = 'spawn-failure';
  readonly code: string | undefined;

  constructor(command: string, args: readonly string[], cause: Error, output = EMPTY_OUTPUT) {
    const code = errnoCode(cause);
    super(
      `Failed to start "${command}"${code ? ` (${code})` : ''}: ${cause.message}`,
      command,
      args,
      output,
      { cause },
    );
    this.code = code;
  }
}

export class CommandTimeoutError extends CommandError {
  readonly kind = 'timeout';
  readonly timeoutMs: number;

  constructor(command: string, args: readonly string[], timeoutMs: number, output: CommandOutput) {
    super(`Command "${command}" timed out after ${timeoutMs}ms`, command, args, output);
    this.timeoutMs = timeoutMs;
  }
}

export class CommandExitError extends CommandError {
  readonly kind = 'exit-non-zero';
  readonly exitCode: number;
  readonly signal: NodeJS.Signals | null;

  constructor(
    command: string,
    args: readonly string[],
    exitCode: number,
    signal: NodeJS.Signals | null,
    output: CommandOutput,
  ) {
    super(
      signal
        ? `Command "${command}" was terminated by ${signal}`
        : `Command "${command}" failed with exit code ${exitCode}`,
      command,
      args,
      output,
    );
    this.exitCode = exitCode;
    this.signal = signal;
  }
}

export class CommandAbortedError extends CommandError {
  readonly kind = 'aborted';

  constructor(command: string, args: readonly string[], output = EMPTY_OUTPUT) {
    super(`Command "${command}" was cancelled`, command, args, output);
  }
}

const errnoCode = (error: Error): string | undefined => {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
};

const quoteArg = (arg: string): string =>
  /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`;

export const formatCommandLine = (command: string, args: readonly string[]): string =>
  [command, ...args].map(quoteArg).join(' ');

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

// Children lead their own process group so a kill reaches the helpers they spawn.
const useProcessGroups = process.platform !== 'win32';
const running = new Set<ChildProcess>();

const killProcessTree = (child: ChildProcess) => {
  if (child.pid === undefined) {
    return;
  }
  if (useProcessGroups) {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch {
      // ESRCH: the group is gone, so only the leader can be left.
      child.kill('SIGKILL');
      return;
    }
  }
  child.kill('SIGKILL');
};

/** SIGKILLs every command still running, for a forced exit. */
export const killRunningCommands = () => {
  for (const child of running) {
    killProcessTree(child);
  }
};

type ChildOutcome =
  | { readonly kind: 'exit'; readonly code: number | null; readonly signal: NodeJS.Signals | null }
  | { readonly kind: 'error'; readonly error: Error };

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? 0;
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(`timeoutMs must be between 0 and ${MAX_TIMEOUT_MS} (got ${timeoutMs})`);
  }
  if (options.signal?.aborted) {
    throw new CommandAbortedError(command, args);
  }

  const started = performance.now();
  const child = spawn(command, [...args], {
    cwd: options.cwd,
    stdio: ['ignore', 'pipe', 'pipe'],
    detached: useProcessGroups,
  });
  running.add(child);

  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
  child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

  let timedOut = false;
  let aborted = false;
  let killed = false;
  let exited: ChildOutcome | undefined;
  let settle: (outcome: ChildOutcome) => void = () => {};
  // After a kill, a surviving grandchild may still hold the pipes open, so `exit` settles.
  const terminate = () => {
    killed = true;
    killProcessTree(child);
    if (exited) {
      settle(exited);
    }
  };
  const timer =
    timeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          terminate();
        }, timeoutMs)
      : undefined;
  const onAbort = () => {
    aborted = true;
    terminate();
  };
  options.signal?.addEventListener('abort', onAbort, { once: true });

  let outcome: ChildOutcome;
  try {
    outcome = await new Promise<ChildOutcome>((resolve) => {
      settle = resolve;
      child.once('error', (error) => resolve({ kind: 'error', error }));
      child.once('exit', (code, signal) => {
        exited = { kind: 'exit', code, signal };
        if (killed) {
          resolve(exited);
        }
      });
      child.once('close', (code, signal) => resolve({ kind: 'exit', code, signal }));
    });
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onAbort);
    running.delete(child);
    if (killed) {
      child.stdout.destroy();
      child.stderr.destroy();
    }
  }

  const output: CommandOutput = {
    stdout: Buffer.concat(stdoutChunks),
    stderr: Buffer.concat(stderrChunks),
    durationMs: performance.now() - started,
  };

  if (outcome.kind === 'error') {
    if (aborted) {
      throw new CommandAbortedError(command, args, output);
    }
    throw new SpawnFailureError(command, args, outcome.error, output);
  }
  if (aborted) {
    throw new CommandAbortedError(command, args, output);
  }
  if (timedOut) {
    throw new CommandTimeoutError(command, args, timeoutMs, output);
  }
  const exitCode = outcome.code ?? -1;
  if (exitCode !== 0) {
    throw new CommandExitError(command, args, exitCode, outcome.signal, output);
  }

  return { command, args: [...args], exitCode, ...output };
};
