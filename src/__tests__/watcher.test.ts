import { vi, describe, it, expect, beforeEach, afterEach } from 'vitest';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

vi.mock('tree-kill', () => ({
  default: vi.fn(),
}));

import { spawn } from 'node:child_process';
import treeKill from 'tree-kill';
import { mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { DEFAULT_RUNNER_SCRIPT, resolveModeSettings, resolveSettings } from '../config.js';
import { Session } from '../session.js';
import type { BridgeSettings, Watcher } from '../types.js';
import { BundlerWatcher, WatcherRunner } from '../watcher.js';
import { createMemoryLogger, FakeChild, makeTempDir } from './helpers.js';

const mockSpawn = vi.mocked(spawn);
const mockTreeKill = vi.mocked(treeKill);

/** Watcher double that records whether it is alive */
function fakeWatcher(alive: Set<string>, name: string, start?: () => Promise<void>): Watcher {
  return {
    start: vi.fn(async () => {
      await start?.();
      alive.add(name);
    }),
    stop: vi.fn(() => {
      alive.delete(name);
    }),
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

// ---------------------------------------------------------------------------
// WatcherRunner
// ---------------------------------------------------------------------------

describe('WatcherRunner', () => {
  it('starts in the idle state and ignores stop', () => {
    const runner = new WatcherRunner();
    expect(runner.running).toBe(false);
    expect(() => runner.stop()).not.toThrow();
  });

  it('stops the previous watcher before starting the next one', async () => {
    const alive = new Set<string>();
    const runner = new WatcherRunner();
    const first = fakeWatcher(alive, 'first');
    const second = fakeWatcher(alive, 'second');

    await runner.start(first);
    await runner.start(second);

    expect(first.stop).toHaveBeenCalledTimes(1);
    expect(second.stop).not.toHaveBeenCalled();
    expect([...alive]).toEqual(['second']);
    expect(runner.running).toBe(true);
  });

  it('launches only the last of several rapid starts', async () => {
    const alive = new Set<string>();
    const runner = new WatcherRunner();
    const a = fakeWatcher(alive, 'a');
    const b = fakeWatcher(alive, 'b');
    const c = fakeWatcher(alive, 'c');

    await Promise.all([runner.start(a), runner.start(b), runner.start(c)]);

    expect(a.start).not.toHaveBeenCalled();
    expect(b.start).not.toHaveBeenCalled();
    expect([...alive]).toEqual(['c']);
  });

  it('never launches a start followed by stop before it ran', async () => {
    const alive = new Set<string>();
    const runner = new WatcherRunner();
    const watcher = fakeWatcher(alive, 'w');

    const starting = runner.start(watcher);
    runner.stop();
    await starting;

    expect(watcher.start).not.toHaveBeenCalled();
    expect(alive.size).toBe(0);
    expect(runner.running).toBe(false);
  });

  it('moves back to idle on stop', async () => {
    const alive = new Set<string>();
    const runner = new WatcherRunner();
    await runner.start(fakeWatcher(alive, 'only'));

    runner.stop();
    runner.stop();

    expect(alive.size).toBe(0);
    expect(runner.running).toBe(false);
  });

  it('stops a watcher whose launch completes after stop was called', async () => {
    const alive = new Set<string>();
    const runner = new WatcherRunner();
    const launch = deferred();
    const slow = fakeWatcher(alive, 'slow', () => launch.promise);

    const starting = runner.start(slow);
    await vi.waitFor(() => expect(slow.start).toHaveBeenCalled());
    runner.stop();
    launch.resolve();
    await starting;

    expect(slow.stop).toHaveBeenCalledTimes(1);
    expect(alive.size).toBe(0);
    expect(runner.running).toBe(false);
  });

  it('reports a failed start and still accepts later starts', async () => {
    const alive = new Set<string>();
    const runner = new WatcherRunner();
    const broken: Watcher = { start: vi.fn().mockRejectedValue(new Error('no node')), stop: vi.fn() };

    await expect(runner.start(broken)).rejects.toThrow('no node');
    await runner.start(fakeWatcher(alive, 'next'));

    expect([...alive]).toEqual(['next']);
  });

  it('refuses starts after close', async () => {
    const alive = new Set<string>();
    const runner = new WatcherRunner();
    runner.close();

    await expect(runner.start(fakeWatcher(alive, 'late'))).rejects.toThrow('Cannot start a watcher after shutdown');
    expect(alive.size).toBe(0);
  });
});

describe('Session', () => {
  it('stops the running watcher when closed, once', async () => {
    const alive = new Set<string>();
    const session = new Session(resolveSettings({}, '/project'), createMemoryLogger());
    const watcher = fakeWatcher(alive, 'w');
    await session.watchers.start(watcher);

    session.close();
    session.close();

    expect(session.isClosed).toBe(true);
    expect(watcher.stop).toHaveBeenCalledTimes(1);
    expect(session.watchers.running).toBe(false);
  });

  it('keeps a start issued just before close from launching', async () => {
    const alive = new Set<string>();
    const session = new Session(resolveSettings({}, '/project'), createMemoryLogger());
    const watcher = fakeWatcher(alive, 'w');

    const starting = session.watchers.start(watcher);
    session.close();
    await starting;

    expect(watcher.start).not.toHaveBeenCalled();
    expect(alive.size).toBe(0);
    expect(session.watchers.running).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// BundlerWatcher
// ---------------------------------------------------------------------------

describe('BundlerWatcher', () => {
  let baseDir: string;
  let settings: BridgeSettings;
  let children: FakeChild[];

  beforeEach(async () => {
    baseDir = await makeTempDir('watcher');
    settings = resolveSettings({}, baseDir);
    children = [];
    mockTreeKill.mockReset();
    mockSpawn.mockReset();
    mockSpawn.mockImplementation(() => {
      const child = new FakeChild();
      children.push(child);
      process.nextTick(() => child.emit('spawn'));
      return child as any;
    });
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('launches the runner script in watch mode with the dev environment', async () => {
    const log = createMemoryLogger();
    const watcher = new BundlerWatcher(settings, resolveModeSettings(settings, 'dev'), log);

    await watcher.start();

    expect(mockSpawn).toHaveBeenCalledWith(
      'node',
      [DEFAULT_RUNNER_SCRIPT, join(baseDir, 'webpack.config.js'), '%7B%22watch%22%3Atrue%7D'],
      expect.objectContaining({ cwd: baseDir }),
    );
    const opts = mockSpawn.mock.calls[0][2] as any;
    expect(opts.env.NODE_ENV).toBe('development');
    expect(log.infos).toEqual(['Starting watcher by webpack.config.js']);
  });

  it('drops every build partition on start', async () => {
    await mkdir(join(settings.cacheDir, 'run', 'prod'), { recursive: true });
    const watcher = new BundlerWatcher(settings, resolveModeSettings(settings, 'dev'), createMemoryLogger());

    await watcher.start();

    expect(await readdir(settings.cacheDir)).toEqual([]);
  });

  it('sends SIGTERM to the whole process tree on stop', async () => {
    const log = createMemoryLogger();
    const watcher = new BundlerWatcher(settings, resolveModeSettings(settings, 'dev'), log);
    await watcher.start();

    watcher.stop();

    expect(mockTreeKill).toHaveBeenCalledWith(children[0].pid, 'SIGTERM', expect.any(Function));
    expect(children[0].kill).not.toHaveBeenCalled();
    expect(log.infos).toContain('Stopping watcher by webpack.config.js');
  });

  it('logs a failed tree kill', async () => {
    mockTreeKill.mockImplementationOnce((_pid, _signal, callback) => callback?.(new Error('kill ESRCH')));
    const log = createMemoryLogger();
    const watcher = new BundlerWatcher(settings, resolveModeSettings(settings, 'dev'), log);
    await watcher.start();

    watcher.stop();

    expect(log.errors).toEqual(['Could not stop watcher: kill ESRCH']);
  });

  it('logs a watcher that exits on its own and forgets its process', async () => {
    const log = createMemoryLogger();
    const onExit = vi.fn();
    const watcher = new BundlerWatcher(settings, resolveModeSettings(settings, 'dev'), log, onExit);
    await watcher.start();

    children[0].emit('exit', 2, null);
    watcher.stop();

    expect(log.infos).toContain('Watcher exited with code 2');
    expect(onExit).toHaveBeenCalledWith(2);
    expect(mockTreeKill).not.toHaveBeenCalled();
  });

  it('never leaves two watcher processes running through the runner', async () => {
    const runner = new WatcherRunner();
    const dev = resolveModeSettings(settings, 'dev');

    await runner.start(new BundlerWatcher(settings, dev, createMemoryLogger()));
    await runner.start(new BundlerWatcher(settings, dev, createMemoryLogger()));

    expect(children).toHaveLength(2);
    expect(mockTreeKill).toHaveBeenCalledTimes(1);
    expect(mockTreeKill).toHaveBeenCalledWith(children[0].pid, 'SIGTERM', expect.any(Function));
  });
});
