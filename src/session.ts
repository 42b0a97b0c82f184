import { consoleLogger } from './log.js';
import type { BridgeSettings, Logger } from './types.js';
import { WatcherRunner } from './watcher.js';

/**
 * Host lifecycle context. Opened at host startup and closed at shutdown;
 * closing stops any running watcher.
 */
export class Session {
  readonly watchers = new WatcherRunner();
  private closed = false;

  constructor(
    readonly settings: BridgeSettings,
    readonly log: Logger = consoleLogger,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.watchers.close();
  }
}
