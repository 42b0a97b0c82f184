/*
 * Runs webpack on behalf of bundler-bridge.
 * Usage: node webpack-runner.js <config path> <urlencoded options JSON>
 * Prints webpack's report, then a result line with one summary per compilation.
 */
import type { MultiStats } from 'webpack';
import { describeError } from '../errors.js';
import { decodeRunnerOptions } from '../executor.js';
import { formatResultLine } from '../result.js';
import { loadBundlerConfig, requireProjectWebpack, webpackMode } from './load-config.js';
import { summarizeStats } from './summary.js';

function report(stats: MultiStats): void {
  const text = stats.toString({ colors: false, preset: 'minimal' });
  if (text) {
    process.stdout.write(`${text}\n`);
  }
  process.stdout.write(`${formatResultLine(summarizeStats(stats.stats))}\n`);
}

async function main(): Promise<void> {
  const [configPath, rawOptions] = process.argv.slice(2);
  if (!configPath || !rawOptions) {
    throw new Error('Usage: webpack-runner <config path> <options>');
  }

  const options = decodeRunnerOptions(rawOptions);
  const configs = await loadBundlerConfig(configPath, { mode: webpackMode(process.env.NODE_ENV) });
  const compiler = requireProjectWebpack(process.cwd())(configs);

  if (options.watch) {
    const watching = compiler.watch({}, (err, stats) => {
      if (err) {
        process.stderr.write(`${describeError(err)}\n`);
      } else if (stats) {
        report(stats);
      }
    });
    const shutdown = () => watching.close(() => process.exit(0));
    process.once('SIGTERM', shutdown);
    process.once('SIGINT', shutdown);
    return;
  }

  const stats = await new Promise<MultiStats | undefined>((resolve, reject) => {
    compiler.run((err, result) => (err ? reject(err) : resolve(result)));
  });
  await new Promise<void>((resolve, reject) => {
    compiler.close((err) => (err ? reject(err) : resolve()));
  });

  if (stats) report(stats);
  if (!stats || stats.hasErrors()) {
    process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`${describeError(err)}\n`);
  process.exit(1);
});
