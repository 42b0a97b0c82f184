import { deleteOtherPartitions, partitionDir, reconcilePartitions } from './clean.js';
import { resolveModeSettings } from './config.js';
import { encodeRunnerOptions, runScript } from './executor.js';
import { collectInputFiles, resolveContexts } from './inputs.js';
import { relativizedPath } from './paths.js';
import type { Session } from './session.js';
import { runIfChanged, type CacheOutcome } from './state.js';
import type { BridgeSettings, CommandSpec, InvocationRequest, Mode, RunnerOptions } from './types.js';
import { BundlerWatcher } from './watcher.js';

/** Command line running the bundler script for one request */
export function bundlerCommand(
  settings: BridgeSettings,
  request: InvocationRequest,
  options: RunnerOptions,
): CommandSpec {
  return {
    command: settings.nodeCommand,
    cwd: request.baseDir,
    script: settings.script,
    args: [request.config, encodeRunnerOptions(options)],
    env: { ...request.env },
  };
}

/** Gather the config path, input set and environment of a mode */
export async function prepareRequest(session: Session, mode: Mode): Promise<InvocationRequest> {
  const { settings, log } = session;
  const modeSettings = resolveModeSettings(settings, mode);
  const roots = await resolveContexts(settings, modeSettings, log);
  const inputs = await collectInputFiles(roots, settings);

  return Object.freeze({
    mode,
    baseDir: settings.baseDir,
    config: modeSettings.config,
    inputs: Object.freeze([modeSettings.config, ...inputs]),
    env: Object.freeze({ ...modeSettings.env }),
  });
}

/**
 * Build one mode. Stops any watcher, drops the other modes' partitions and runs
 * the bundler only when the mode's inputs changed since its last successful run.
 */
export async function runMode(session: Session, mode: Mode): Promise<CacheOutcome> {
  const { settings, log } = session;
  session.watchers.stop();
  await deleteOtherPartitions(settings.cacheDir, mode);

  const request = await prepareRequest(session, mode);
  const outcome = await runIfChanged(partitionDir(settings.cacheDir, mode), request.inputs, async (changed) => {
    if (changed) {
      log.info(`${changed.length} input file(s) changed for ${mode}`);
    }
    log.info(`Running ${mode} by ${relativizedPath(request.baseDir, request.config)}`);
    await runScript(bundlerCommand(settings, request, { watch: false }), log);
  });

  if (!outcome.ran) {
    log.info(`No changes detected for ${mode}, skipping`);
    return outcome;
  }

  await reconcilePartitions(settings.cacheDir, mode);
  return outcome;
}

/** Replace the session's watcher with a fresh dev-mode one */
export async function startWatch(session: Session, onExit?: (exitCode: number) => void): Promise<void> {
  const { settings, log } = session;
  const watcher = new BundlerWatcher(settings, resolveModeSettings(settings, 'dev'), log, onExit);
  await session.watchers.start(watcher);
}

export function stopWatch(session: Session): void {
  session.watchers.stop();
}
