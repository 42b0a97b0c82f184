import { createRequire } from 'node:module';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { Configuration, MultiCompiler } from 'webpack';
import { BridgeError } from '../errors.js';

/** webpack as a project installs it, always driven with a list of configs */
export type CreateCompiler = (options: Configuration[]) => MultiCompiler;

/** Second argument webpack-cli hands to a config function */
export interface ConfigArgv {
  mode: 'production' | 'development';
}

export function webpackMode(nodeEnv: string | undefined): ConfigArgv['mode'] {
  return nodeEnv === 'production' ? 'production' : 'development';
}

/** Load webpack from the project in `cwd` (or NODE_PATH), never from this package */
export function requireProjectWebpack(cwd: string): CreateCompiler {
  const projectRequire = createRequire(join(cwd, 'package.json'));
  try {
    const webpack: CreateCompiler = projectRequire('webpack');
    return webpack;
  } catch (err: unknown) {
    throw new BridgeError(`webpack is not installed in ${cwd}`, { cause: err });
  }
}

function isConfiguration(value: unknown): value is Configuration {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn what a config module exports into a config list: unwraps a default
 * export, calls a config function with `(env, argv)`, accepts one config or
 * an array of them.
 */
export async function resolveBundlerConfig(exported: unknown, argv: ConfigArgv): Promise<Configuration[]> {
  let value: unknown = exported;
  if (typeof value === 'object' && value !== null && 'default' in value) {
    value = value.default;
  }
  if (typeof value === 'function') {
    value = await value({}, argv);
  }

  const list: unknown[] = Array.isArray(value) ? value : [value];
  return list.map((entry) => {
    if (!isConfiguration(entry)) {
      throw new BridgeError('Bundler config must export an object or an array of objects');
    }
    return entry;
  });
}

/** Import a config file (ESM or CommonJS) and resolve it */
export async function loadBundlerConfig(configPath: string, argv: ConfigArgv): Promise<Configuration[]> {
  const exported: unknown = await import(pathToFileURL(configPath).href);
  return resolveBundlerConfig(exported, argv);
}

/** Context directory of each config, webpack's default being the working directory */
export function contextsOf(configs: readonly Configuration[], cwd: string): string[] {
  return [...new Set(configs.map((config) => config.context ?? cwd))];
}
