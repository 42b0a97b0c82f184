export { bundlerCommand, prepareRequest, runMode, startWatch, stopWatch } from './build.js';
export { cleanButPreserve, deleteOtherPartitions, partitionDir, partitionRoot, reconcilePartitions } from './clean.js';
export {
  DEFAULT_CONTEXTS_SCRIPT,
  DEFAULT_RUNNER_SCRIPT,
  NODE_ENVS,
  parseEnvPairs,
  resolveModeSettings,
  resolveSettings,
} from './config.js';
export type { SettingsOptions } from './config.js';
export { BridgeError, CommandFailedError, CommandNotFoundError, ResultDecodeError } from './errors.js';
export {
  buildCommandLine,
  decodeRunnerOptions,
  encodeRunnerOptions,
  forkScript,
  runScript,
  SHELL_WRAPPERS,
} from './executor.js';
export { dispatch, HOST_COMMANDS, parseHostCommand, runShell } from './host.js';
export type { HostCommand } from './host.js';
export { collectInputFiles, resolveContexts } from './inputs.js';
export { consoleLogger } from './log.js';
export { createResultExtractor, decodePayload, formatResultLine, RESULT_ESCAPE_CHAR, splitResultLine } from './result.js';
export { Session } from './session.js';
export { computeFingerprint, findChangedFiles, loadFingerprint, runIfChanged, saveFingerprint } from './state.js';
export type { CacheOutcome } from './state.js';
export { MODES } from './types.js';
export type {
  BridgeSettings,
  CommandSpec,
  InvocationRequest,
  JsonValue,
  Logger,
  Mode,
  ModeSettings,
  RunnerOptions,
  Watcher,
} from './types.js';
export { BundlerWatcher, WatcherRunner } from './watcher.js';
export { contextsOf, resolveBundlerConfig, webpackMode } from './bundler/load-config.js';
export type { ConfigArgv } from './bundler/load-config.js';
export { summarizeStats } from './bundler/summary.js';
export type { CompilationSummary } from './bundler/summary.js';
