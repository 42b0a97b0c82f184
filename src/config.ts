import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { BridgeSettings, Mode, ModeSettings } from './types.js';

/** Bundler runner shipped with the package */
export const DEFAULT_RUNNER_SCRIPT = fileURLToPath(new URL('./bundler/webpack-runner.js', import.meta.url));

/** Script printing the context directories of a bundler config, shipped with the package */
export const DEFAULT_CONTEXTS_SCRIPT = fileURLToPath(new URL('./bundler/contexts.js', import.meta.url));

/** NODE_ENV value of each mode */
export const NODE_ENVS: Record<Mode, string> = {
  dev: 'development',
  prod: 'production',
  test: 'testing',
};

/** Raw option values, before defaults are applied */
export type SettingsOptions = {
  base?: string;
  node?: string;
  script?: string;
  config?: string;
  devConfig?: string;
  prodConfig?: string;
  testConfig?: string;
  cacheDir?: string;
  context?: string[];
  contextsScript?: string;
  include?: string[];
  exclude?: string[];
  env?: string[];
};

/** Parse `KEY=VALUE` pairs; the value may itself contain `=` */
export function parseEnvPairs(pairs: readonly string[]): Record<string, string> {
  const env: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new Error(`Invalid environment entry "${pair}", expected KEY=VALUE`);
    }
    env[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return env;
}

/** Apply defaults and resolve every path against the base directory */
export function resolveSettings(options: SettingsOptions, cwd: string = process.cwd()): BridgeSettings {
  const baseDir = resolve(cwd, options.base ?? '.');
  const at = (path: string | undefined) => (path === undefined ? undefined : resolve(baseDir, path));

  const modeConfigs: BridgeSettings['modeConfigs'] = {};
  const overrides: [Mode, string | undefined][] = [
    ['dev', options.devConfig],
    ['prod', options.prodConfig],
    ['test', options.testConfig],
  ];
  for (const [mode, path] of overrides) {
    const resolved = at(path);
    if (resolved) modeConfigs[mode] = resolved;
  }

  return {
    baseDir,
    nodeCommand: options.node ?? 'node',
    script: at(options.script) ?? DEFAULT_RUNNER_SCRIPT,
    cacheDir: at(options.cacheDir) ?? join(baseDir, '.bundler-bridge'),
    config: at(options.config) ?? join(baseDir, 'webpack.config.js'),
    modeConfigs,
    contexts: options.context ?? [],
    contextsScript: at(options.contextsScript) ?? DEFAULT_CONTEXTS_SCRIPT,
    include: options.include ?? [],
    exclude: options.exclude ?? [],
    env: parseEnvPairs(options.env ?? []),
  };
}

/** Config path and environment of one mode */
export function resolveModeSettings(settings: BridgeSettings, mode: Mode): ModeSettings {
  return {
    mode,
    config: settings.modeConfigs[mode] ?? settings.config,
    env: {
      NODE_PATH: join(settings.baseDir, 'node_modules'),
      ...settings.env,
      NODE_ENV: NODE_ENVS[mode],
    },
  };
}
