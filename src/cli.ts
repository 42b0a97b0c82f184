#!/usr/bin/env node

import { Command } from 'commander';
import { resolveSettings, type SettingsOptions } from './config.js';
import { describeError } from './errors.js';
import { dispatch, runShell, type HostCommand } from './host.js';
import { consoleLogger } from './log.js';
import { Session } from './session.js';

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/** Close the session on SIGINT/SIGTERM so no watcher outlives the host */
function bindShutdown(session: Session): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    session.close();
    process.exit(signal === 'SIGINT' ? 130 : 143);
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

function openSession(program: Command): Session {
  return new Session(resolveSettings(program.opts<SettingsOptions>()), consoleLogger);
}

async function runOnce(program: Command, command: HostCommand): Promise<void> {
  const session = openSession(program);
  const unbind = bindShutdown(session);
  try {
    if (command === 'watch') {
      // Stay alive until the watcher exits or a signal closes the session
      const exitCode = await new Promise<number>((resolve, reject) => {
        dispatch(session, 'watch', resolve).catch(reject);
      });
      process.exitCode = exitCode;
    } else {
      await dispatch(session, command);
    }
  } finally {
    unbind();
    session.close();
  }
}

async function shell(program: Command): Promise<void> {
  const session = openSession(program);
  const unbind = bindShutdown(session);
  try {
    await runShell(session, process.stdin);
  } finally {
    unbind();
  }
}

function createProgram(): Command {
  const program = new Command();
  program
    .name('bundler-bridge')
    .description('Run a JavaScript bundler per build mode, skipping runs whose inputs did not change')
    .option('--base <dir>', 'Base directory the bundler runs in')
    .option('--node <cmd>', 'Command used to run scripts', 'node')
    .option('--script <path>', 'Bundler runner script (default: the bundled webpack runner)')
    .option('--config <path>', 'Bundler config for every mode (default: webpack.config.js)')
    .option('--dev-config <path>', 'Bundler config for dev mode')
    .option('--prod-config <path>', 'Bundler config for prod mode')
    .option('--test-config <path>', 'Bundler config for test mode')
    .option('--cache-dir <dir>', 'Cache directory (default: .bundler-bridge)')
    .option('--context <dir>', 'Input root directory (repeatable, default: asked from the contexts script)', collect, [])
    .option('--contexts-script <path>', 'Script printing the input root directories (default: the bundled webpack one)')
    .option('--include <glob>', 'Only track input files matching the glob (repeatable, a glob without a slash matches file names)', collect, [])
    .option('--exclude <glob>', 'Ignore input files matching the glob (repeatable)', collect, [])
    .option('--env <KEY=VALUE>', 'Extra environment variable (repeatable)', collect, []);

  const once = (command: HostCommand) => () => runOnce(program, command);
  program.command('prod', { isDefault: true }).description('Production build').action(once('prod'));
  program.command('dev').description('Development build').action(once('dev'));
  program.command('test').description('Test build').action(once('test'));
  program.command('watch').description('Start the dev-mode watcher and wait for it').action(once('watch'));
  program.command('stop').description('Stop the running watcher').action(once('stop'));
  program
    .command('shell')
    .description('Read commands from stdin against one long-lived session')
    .action(() => shell(program));

  return program;
}

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(`bundler-bridge: ${describeError(err)}\n`);
    process.exit(1);
  });
