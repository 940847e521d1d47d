import { spawnSync } from 'node:child_process';
import { accessSync, statSync, constants } from 'node:fs';
import { delimiter, join } from 'node:path';
import type { PdfBackendSetting } from '../config/env.js';

export type NativeBackendResult =
  | { status: 'unavailable'; reason: string }
  | { status: 'ok'; backend: string; bytes: Buffer }
  | { status: 'failed'; backend: string; error: Error };

/** An optional HTML -> PDF converter found in the environment. */
export interface NativeBackend {
  readonly name: string;
  convert(markup: string): NativeBackendResult;
}

export interface CommandResult {
  status: number | null;
  signal?: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: Buffer;
  error?: Error;
}

export interface RunOptions {
  cwd?: string;
}

export type CommandRunner = (executable: string, args: string[], input: string, options?: RunOptions) => CommandResult;
export type ExecutableLookup = (command: string) => string | undefined;

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

function isExecutable(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/** Search PATH for a command, the way a shell would. */
export function findExecutable(command: string, pathEnv: string = process.env.PATH ?? ''): string | undefined {
  const extensions =
    process.platform === 'win32' ? ['', ...(process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';')] : [''];
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (isExecutable(candidate)) return candidate;
    }
  }
  return undefined;
}

export const spawnRunner: CommandRunner = (executable, args, input, options = {}) =>
  spawnSync(executable, args, { input, cwd: options.cwd, maxBuffer: MAX_OUTPUT_BYTES });

export function isNotFound(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

export function isPdf(bytes: Buffer): boolean {
  return bytes.subarray(0, 5).toString('latin1') === '%PDF-';
}

/** The error a finished command reports, or undefined when it exited cleanly. */
export function commandFailure(command: string, result: CommandResult): Error | undefined {
  if (result.error) return result.error;
  if (result.status === 0) return undefined;
  const stderr = result.stderr.toString('utf-8').trim();
  const how = result.status === null ? `was terminated by ${result.signal ?? 'a signal'}` : `exited with status ${result.status}`;
  return new Error(`${command} ${how}${stderr ? `: ${stderr}` : ''}`);
}

export interface CommandBackendOptions {
  name: string;
  command: string;
  /** Arguments that make the command read HTML on stdin and write PDF to stdout */
  args: string[];
  findExecutable?: ExecutableLookup;
  run?: CommandRunner;
}

/**
 * Runs an external converter synchronously. The executable is looked up on
 * every call, so installing or removing it takes effect without a restart.
 */
export class CommandBackend implements NativeBackend {
  readonly name: string;
  private readonly command: string;
  private readonly args: string[];
  private readonly lookup: ExecutableLookup;
  private readonly run: CommandRunner;

  constructor(options: CommandBackendOptions) {
    this.name = options.name;
    this.command = options.command;
    this.args = options.args;
    this.lookup = options.findExecutable ?? ((command) => findExecutable(command));
    this.run = options.run ?? spawnRunner;
  }

  convert(markup: string): NativeBackendResult {
    const executable = this.lookup(this.command);
    if (!executable) {
      return { status: 'unavailable', reason: `${this.command} not found on PATH` };
    }

    const result = this.run(executable, this.args, markup);
    // Removed between the lookup and the spawn: still absence, not failure
    if (result.error && isNotFound(result.error)) {
      return { status: 'unavailable', reason: `${this.command} disappeared from ${executable}` };
    }
    const failure = commandFailure(this.command, result);
    if (failure) return { status: 'failed', backend: this.name, error: failure };

    if (!isPdf(result.stdout)) {
      return { status: 'failed', backend: this.name, error: new Error(`${this.command} did not produce a PDF`) };
    }

    return { status: 'ok', backend: this.name, bytes: result.stdout };
  }
}

export function weasyprintBackend(options: Partial<CommandBackendOptions> = {}): CommandBackend {
  return new CommandBackend({ name: 'weasyprint', command: 'weasyprint', args: ['--quiet', '-', '-'], ...options });
}

export function wkhtmltopdfBackend(options: Partial<CommandBackendOptions> = {}): CommandBackend {
  return new CommandBackend({ name: 'wkhtmltopdf', command: 'wkhtmltopdf', args: ['--quiet', '-', '-'], ...options });
}

export function backendsFromEnv(setting: PdfBackendSetting): NativeBackend[] {
  switch (setting) {
    case 'none':
      return [];
    case 'weasyprint':
      return [weasyprintBackend()];
    case 'wkhtmltopdf':
      return [wkhtmltopdfBackend()];
    case 'auto':
      return [weasyprintBackend(), wkhtmltopdfBackend()];
  }
}

/**
 * Ask each backend in turn. The first one that is present decides the
 * outcome, success or failure; only when none is present is the result
 * `unavailable`, which is the caller's cue to use the built-in serializer.
 */
export function tryNativeRender(markup: string, backends: readonly NativeBackend[]): NativeBackendResult {
  const reasons: string[] = [];
  for (const backend of backends) {
    const result = backend.convert(markup);
    if (result.status !== 'unavailable') return result;
    reasons.push(`${backend.name}: ${result.reason}`);
  }
  return {
    status: 'unavailable',
    reason: reasons.length > 0 ? reasons.join('; ') : 'no native backend configured',
  };
}
