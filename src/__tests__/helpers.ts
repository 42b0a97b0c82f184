import { EventEmitter } from 'node:events';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';
import { vi } from 'vitest';
import type { Logger } from '../types.js';

let nextPid = 4100;

/** In-process stand-in for a spawned ChildProcess */
export class FakeChild extends EventEmitter {
  readonly pid = nextPid++;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn((_signal?: NodeJS.Signals) => true);

  /** Print lines, end both streams, then close with `code` */
  finish(code: number, stdoutLines: string[] = [], stderrLines: string[] = []): void {
    for (const line of stdoutLines) this.stdout.write(`${line}\n`);
    for (const line of stderrLines) this.stderr.write(`${line}\n`);
    this.stdout.end();
    this.stderr.end();
    setImmediate(() => this.emit('close', code, null));
  }
}

export interface MemoryLogger extends Logger {
  infos: string[];
  errors: string[];
}

export function createMemoryLogger(): MemoryLogger {
  const infos: string[] = [];
  const errors: string[] = [];
  return {
    infos,
    errors,
    info: (line) => infos.push(line),
    error: (line) => errors.push(line),
  };
}

export function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `bundler-bridge-${prefix}-`));
}
