/*
 * Prints the context directories of a webpack config as a result line.
 * Usage: node contexts.js <config path>
 */
import { describeError } from '../errors.js';
import { formatResultLine } from '../result.js';
import { contextsOf, loadBundlerConfig, webpackMode } from './load-config.js';

async function main(): Promise<void> {
  const [configPath] = process.argv.slice(2);
  if (!configPath) {
    throw new Error('Usage: contexts <config path>');
  }

  const configs = await loadBundlerConfig(configPath, { mode: webpackMode(process.env.NODE_ENV) });
  process.stdout.write(`${formatResultLine(contextsOf(configs, process.cwd()))}\n`);
}

main().catch((err: unknown) => {
  process.stderr.write(`${describeError(err)}\n`);
  process.exit(1);
});
