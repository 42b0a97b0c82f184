import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { BridgeError } from '../errors.js';
import { contextsOf, requireProjectWebpack, resolveBundlerConfig, webpackMode } from '../bundler/load-config.js';
import { summarizeStats } from '../bundler/summary.js';
import { makeTempDir } from './helpers.js';

const argv = { mode: 'production' } as const;

describe('resolveBundlerConfig', () => {
  it('wraps a single config in a list', async () => {
    expect(await resolveBundlerConfig({ entry: './src/index.js' }, argv)).toEqual([{ entry: './src/index.js' }]);
  });

  it('unwraps a default export holding several configs', async () => {
    const configs = [{ name: 'client' }, { name: 'server' }];
    expect(await resolveBundlerConfig({ default: configs }, argv)).toEqual(configs);
  });

  it('calls a config function with an env object and argv', async () => {
    const seen: unknown[] = [];
    const exported = {
      default: async (env: unknown, args: unknown) => {
        seen.push(env, args);
        return { mode: 'production' };
      },
    };

    expect(await resolveBundlerConfig(exported, argv)).toEqual([{ mode: 'production' }]);
    expect(seen).toEqual([{}, { mode: 'production' }]);
  });

  it('rejects exports that are not configs', async () => {
    await expect(resolveBundlerConfig({ default: 'webpack.config' }, argv)).rejects.toThrow(
      'Bundler config must export an object or an array of objects',
    );
    await expect(resolveBundlerConfig([{ name: 'ok' }, null], argv)).rejects.toThrow(BridgeError);
  });
});

describe('webpackMode', () => {
  it('builds for production only under NODE_ENV=production', () => {
    expect(webpackMode('production')).toBe('production');
    expect(webpackMode('testing')).toBe('development');
    expect(webpackMode(undefined)).toBe('development');
  });
});

describe('contextsOf', () => {
  it('falls back to the working directory and lists each context once', () => {
    const configs = [{ context: '/app/src' }, {}, { context: '/app/src' }];
    expect(contextsOf(configs, '/app')).toEqual(['/app/src', '/app']);
  });
});

describe('summarizeStats', () => {
  it('counts problems and lists assets per compilation', () => {
    const summary = summarizeStats([
      {
        hash: 'abc123',
        compilation: { name: 'client', errors: [], warnings: ['big bundle'], assets: { 'main.js': {}, 'app.css': {} } },
      },
      { compilation: { errors: ['Module not found'], warnings: [], assets: {} } },
    ]);

    expect(summary).toEqual([
      { name: 'client', hash: 'abc123', errors: 0, warnings: 1, assets: ['app.css', 'main.js'] },
      { name: null, hash: null, errors: 1, warnings: 0, assets: [] },
    ]);
  });
});

describe('requireProjectWebpack', () => {
  let projectDir: string;

  beforeEach(async () => {
    projectDir = await makeTempDir('webpack');
  });

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true });
  });

  it('loads webpack from the project node_modules', async () => {
    const pkgDir = join(projectDir, 'node_modules', 'webpack');
    await mkdir(pkgDir, { recursive: true });
    await writeFile(join(pkgDir, 'package.json'), '{"name":"webpack","main":"index.js"}');
    await writeFile(join(pkgDir, 'index.js'), 'module.exports = function projectWebpack() { return null; };');

    expect(requireProjectWebpack(projectDir).name).toBe('projectWebpack');
  });

  it('reports a project without webpack', () => {
    expect(() => requireProjectWebpack(projectDir)).toThrow(`webpack is not installed in ${projectDir}`);
  });
});
