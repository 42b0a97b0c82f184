import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import {
  BridgeError,
  CommandFailedError,
  CommandNotFoundError,
  describeError,
  type ResultDecodeError,
} from './errors.js';
import { createResultExtractor } from './result.js';
import type { CommandSpec, JsonValue, Logger, RunnerOptions } from './types.js';

/**
 * Shells used on platforms whose process launcher cannot run a script by its
 * extension. Any platform listed here gets `<shell> <flag> <command line>`.
 */
export const SHELL_WRAPPERS: Partial<Record<NodeJS.Platform, readonly [string, string]>> = {
  win32: ['cmd', '/c'],
};

/** Full argv for a command spec, wrapped in a shell where the platform needs one */
export function buildCommandLine(spec: CommandSpec, platform: NodeJS.Platform = process.platform): string[] {
  const line = [spec.command, spec.script, ...spec.args];
  const wrapper = SHELL_WRAPPERS[platform];
  return wrapper ? [...wrapper, ...line] : line;
}

/** URL-encode runner options so they travel as a single argument */
export function encodeRunnerOptions(options: RunnerOptions): string {
  return encodeURIComponent(JSON.stringify(options));
}

/** Read the options argument back on the runner side */
export function decodeRunnerOptions(arg: string): RunnerOptions {
  let parsed: unknown;
  try {
    parsed = JSON.parse(decodeURIComponent(arg));
  } catch (err: unknown) {
    throw new BridgeError(`Invalid runner options: ${arg}`, { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || !('watch' in parsed) || typeof parsed.watch !== 'boolean') {
    throw new BridgeError(`Invalid runner options: ${arg}`);
  }
  return { watch: parsed.watch };
}

function launch(spec: CommandSpec, platform: NodeJS.Platform): ChildProcess {
  const [file, ...args] = buildCommandLine(spec, platform);
  try {
    return spawn(file, args, {
      cwd: spec.cwd,
      env: { ...process.env, ...spec.env },
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
  } catch (err: unknown) {
    throw new CommandNotFoundError(spec.command, err);
  }
}

/** Read a stream line by line until it closes */
export function drainLines(stream: Readable | null, onLine: (line: string) => void): Promise<void> {
  if (!stream) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve, reject) => {
    stream.once('error', reject);
    const rl = createInterface({ input: stream, crlfDelay: Infinity });
    rl.on('line', onLine);
    rl.once('close', () => resolve());
  });
}

function waitForExit(child: ChildProcess, command: string): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    child.once('error', (err) => reject(new CommandNotFoundError(command, err)));
    // Killed by a signal: no exit code, counted as a plain failure
    child.once('close', (code: number | null) => resolve(code ?? 1));
  });
}

/**
 * Run a script to completion and return the result payloads it printed.
 * Stdout log text goes to `log.info`, stderr lines to `log.error`.
 */
export async function runScript(
  spec: CommandSpec,
  log: Logger,
  platform: NodeJS.Platform = process.platform,
): Promise<JsonValue[]> {
  const results: JsonValue[] = [];
  const decodeErrors: ResultDecodeError[] = [];

  const child = launch(spec, platform);
  const extract = createResultExtractor({
    onLog: (line) => log.info(line),
    onResult: (value) => results.push(value),
    onError: (err) => decodeErrors.push(err),
  });

  // Both readers must be fully drained before the exit code is final
  const [exitCode] = await Promise.all([
    waitForExit(child, spec.command),
    drainLines(child.stdout, extract),
    drainLines(child.stderr, (line) => log.error(line)),
  ]);

  if (exitCode !== 0) {
    throw new CommandFailedError(spec.command, exitCode);
  }
  if (decodeErrors.length > 0) {
    throw decodeErrors[0];
  }
  return results;
}

/**
 * Launch a script without waiting for it to finish. Resolves with the live
 * process once it has spawned; result payloads are dropped.
 */
export async function forkScript(
  spec: CommandSpec,
  log: Logger,
  onExit?: (exitCode: number) => void,
  platform: NodeJS.Platform = process.platform,
): Promise<ChildProcess> {
  const child = launch(spec, platform);
  const extract = createResultExtractor({
    onLog: (line) => log.info(line),
    onResult: () => {},
    onError: (err) => log.error(err.message),
  });

  const onReadError = (err: unknown) => log.error(`Output stream failed: ${describeError(err)}`);
  drainLines(child.stdout, extract).catch(onReadError);
  drainLines(child.stderr, (line) => log.error(line)).catch(onReadError);
  child.once('exit', (code: number | null) => onExit?.(code ?? 1));

  await new Promise<void>((resolve, reject) => {
    let spawned = false;
    child.once('spawn', () => {
      spawned = true;
      resolve();
    });
    child.on('error', (err) => {
      if (spawned) {
        log.error(`${spec.command}: ${err.message}`);
      } else {
        reject(new CommandNotFoundError(spec.command, err));
      }
    });
  });

  return child;
}
