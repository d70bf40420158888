import { spawn, type ChildProcess } from 'node:child_process';
import { ExecutionError } from './errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

// ── Types ──

export type FlagValue = string | number | boolean | readonly (string | number)[] | null | undefined;

export type CommandArg =
  | { kind: 'flag'; name: string; value: FlagValue }
  | { kind: 'positional'; value: string };

/** One external invocation: `<subcommand> <args...>`, args kept in the given order. */
export interface CommandSpec {
  subcommand: string;
  args: CommandArg[];
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface LaunchedProcess {
  pid: number | undefined;
  commandLine: string;
  /** Settles when the process exits. Never rejects; a non-zero code is not an error here. */
  exited: Promise<ProcessExit>;
}

export interface CapturedProcess extends LaunchedProcess {
  stdout: Promise<string>;
  stderr: Promise<string>;
  /** stdout and stderr interleaved in arrival order. */
  output: Promise<string>;
}

export interface CommandRunnerOptions {
  executable: string;
  /** Arguments placed before the subcommand, e.g. `['-jar', jarPath]`. */
  baseArgs?: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  logger?: Logger;
}

// ── Argument assembly ──

export function flag(name: string, value: FlagValue): CommandArg {
  return { kind: 'flag', name, value };
}

export function positional(value: string): CommandArg {
  return { kind: 'positional', value };
}

function isList(value: FlagValue): value is readonly (string | number)[] {
  return Array.isArray(value);
}

export function serializeArgs(args: readonly CommandArg[]): string[] {
  const tokens: string[] = [];

  for (const arg of args) {
    if (arg.kind === 'positional') {
      if (arg.value !== '') tokens.push(arg.value);
      continue;
    }

    const { name, value } = arg;
    if (value === undefined || value === null || value === false || value === '') continue;

    if (value === true) {
      tokens.push(`-${name}`);
    } else if (isList(value)) {
      if (value.length === 0) continue;
      tokens.push(`-${name}`, ...value.map(String));
    } else {
      tokens.push(`-${name}`, String(value));
    }
  }

  return tokens;
}

export function formatCommandLine(argv: readonly string[]): string {
  return argv
    .map((token) => (/[\s"'\\]/.test(token) ? `"${token.replace(/(["\\])/g, '\\$1')}"` : token))
    .join(' ');
}

// ── Runner ──

export class CommandRunner {
  readonly executable: string;
  private readonly baseArgs: string[];
  private readonly env: NodeJS.ProcessEnv | undefined;
  private readonly cwd: string | undefined;
  private readonly logger: Logger;

  constructor(options: CommandRunnerOptions) {
    this.executable = options.executable;
    this.baseArgs = options.baseArgs ?? [];
    this.env = options.env;
    this.cwd = options.cwd;
    this.logger = options.logger ?? silentLogger;
  }

  buildArgv(spec: CommandSpec): string[] {
    return [...this.baseArgs, spec.subcommand, ...serializeArgs(spec.args)];
  }

  /**
   * Spawn and attach output capture. Resolves once the process is running,
   * not when it exits; await `stdout`, `output` or `exited` for that.
   */
  async run(spec: CommandSpec): Promise<CapturedProcess> {
    const { child, commandLine } = await this.spawnChild(spec);

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    const combined: Buffer[] = [];

    child.stdout?.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk);
      combined.push(chunk);
    });
    child.stderr?.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk);
      combined.push(chunk);
    });

    const exited = waitForExit(child, this.logger);
    const closed = exited.then(() => undefined);

    return {
      pid: child.pid,
      commandLine,
      exited,
      stdout: closed.then(() => Buffer.concat(stdoutChunks).toString('utf-8')),
      stderr: closed.then(() => Buffer.concat(stderrChunks).toString('utf-8')),
      output: closed.then(() => Buffer.concat(combined).toString('utf-8')),
    };
  }

  /**
   * Fire-and-forget: spawn, drain output into the debug log and return
   * immediately. Nothing waits on the process unless the caller awaits `exited`.
   */
  async launch(spec: CommandSpec): Promise<LaunchedProcess> {
    const { child, commandLine } = await this.spawnChild(spec);

    const drain = (chunk: Buffer) => {
      for (const line of chunk.toString('utf-8').split(/\r?\n/)) {
        if (line.length > 0) this.logger.debug(`${spec.subcommand}: ${line}`);
      }
    };
    child.stdout?.on('data', drain);
    child.stderr?.on('data', drain);

    return { pid: child.pid, commandLine, exited: waitForExit(child, this.logger) };
  }

  private spawnChild(spec: CommandSpec): Promise<{ child: ChildProcess; commandLine: string }> {
    const argv = this.buildArgv(spec);
    const commandLine = formatCommandLine([this.executable, ...argv]);
    this.logger.debug(`Running: ${commandLine}`);

    return new Promise((resolvePromise, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(this.executable, argv, {
          cwd: this.cwd,
          env: this.env,
          stdio: ['ignore', 'pipe', 'pipe'],
          windowsHide: true,
        });
      } catch (err) {
        reject(new ExecutionError(spawnMessage(this.executable, err), commandLine, err));
        return;
      }

      const onError = (err: Error) => {
        child.off('spawn', onSpawn);
        reject(new ExecutionError(spawnMessage(this.executable, err), commandLine, err));
      };
      const onSpawn = () => {
        child.off('error', onError);
        resolvePromise({ child, commandLine });
      };
      child.once('error', onError);
      child.once('spawn', onSpawn);
    });
  }
}

function spawnMessage(executable: string, err: unknown): string {
  return `Failed to start ${executable}: ${err instanceof Error ? err.message : String(err)}`;
}

function waitForExit(child: ChildProcess, logger: Logger): Promise<ProcessExit> {
  return new Promise((resolvePromise) => {
    // 'close' fires after stdio is flushed, so captured output is complete
    child.once('close', (code, signal) => {
      resolvePromise({ code, signal });
    });
    child.on('error', (err) => {
      logger.warn(`Process ${child.pid ?? '?'} reported an error: ${err.message}`);
    });
  });
}
