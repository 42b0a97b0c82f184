import type { ChildProcess } from 'node:child_process';
import { rm } from 'node:fs/promises';
import treeKill from 'tree-kill';
import { partitionRoot } from './clean.js';
import { BridgeError, describeError } from './errors.js';
import { encodeRunnerOptions, forkScript } from './executor.js';
import { relativizedPath } from './paths.js';
import type { BridgeSettings, Logger, ModeSettings, Watcher } from './types.js';

/**
 * Holds at most one active watcher. `start` and `stop` are the only mutators;
 * starting always stops the previous watcher first. Once closed, no watcher
 * can be started again.
 */
export class WatcherRunner {
  private current: Watcher | null = null;
  private generation = 0;
  private closed = false;
  private queue: Promise<void> = Promise.resolve();

  get running(): boolean {
    return this.current !== null;
  }

  /**
   * Stop the active watcher, then start `subject` in its place. A start
   * overtaken by `stop()`, `close()` or a later `start()` before it launched
   * is skipped; one overtaken while launching stops what it launched.
   */
  start(subject: Watcher): Promise<void> {
    if (this.closed) {
      return Promise.reject(new BridgeError('Cannot start a watcher after shutdown'));
    }

    const generation = ++this.generation;
    const run = this.queue.then(async () => {
      if (generation !== this.generation) return;
      this.stopCurrent();
      await subject.start();
      if (generation !== this.generation) {
        subject.stop();
        return;
      }
      this.current = subject;
    });
    // A failed start is reported through `run`; later starts still proceed
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  stop(): void {
    this.generation += 1;
    this.stopCurrent();
  }

  /** Stop for good; pending and later starts never launch */
  close(): void {
    this.closed = true;
    this.stop();
  }

  private stopCurrent(): void {
    const current = this.current;
    this.current = null;
    current?.stop();
  }
}

/** Runs the bundler script in watch mode as a long-lived subprocess */
export class BundlerWatcher implements Watcher {
  private child: ChildProcess | null = null;

  constructor(
    private readonly settings: BridgeSettings,
    private readonly mode: ModeSettings,
    private readonly log: Logger,
    private readonly onExit?: (exitCode: number) => void,
  ) {}

  private get label(): string {
    return relativizedPath(this.settings.baseDir, this.mode.config);
  }

  async start(): Promise<void> {
    this.log.info(`Starting watcher by ${this.label}`);

    // Builds made while watching are not tracked, so every partition goes stale
    await rm(partitionRoot(this.settings.cacheDir), { recursive: true, force: true });

    const child = await forkScript(
      {
        command: this.settings.nodeCommand,
        cwd: this.settings.baseDir,
        script: this.settings.script,
        args: [this.mode.config, encodeRunnerOptions({ watch: true })],
        env: this.mode.env,
      },
      this.log,
      (exitCode) => {
        this.log.info(`Watcher exited with code ${exitCode}`);
        if (this.child === child) this.child = null;
        this.onExit?.(exitCode);
      },
    );
    this.child = child;
  }

  stop(): void {
    this.log.info(`Stopping watcher by ${this.label}`);
    const child = this.child;
    this.child = null;
    if (!child) return;

    // Behind a shell wrapper the bundler is a grandchild: signal the whole tree
    if (child.pid === undefined) {
      child.kill('SIGTERM');
      return;
    }
    treeKill(child.pid, 'SIGTERM', (err) => {
      if (err) this.log.error(`Could not stop watcher: ${describeError(err)}`);
    });
  }
}
