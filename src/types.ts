/** Mutually exclusive build targets, each with its own config, env and cache partition */
export const MODES = ['dev', 'prod', 'test'] as const;
export type Mode = (typeof MODES)[number];

/** Structured value decoded from a result payload */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Line sinks for subprocess and lifecycle output */
export interface Logger {
  info(line: string): void;
  error(line: string): void;
}

/** Everything needed to launch one subprocess */
export interface CommandSpec {
  /** Command used to run the script, e.g. `node` */
  command: string;
  cwd: string;
  script: string;
  args: string[];
  /** Merged on top of the ambient environment */
  env: Record<string, string>;
}

/** Options passed to the bundler runner script, URL-encoded JSON */
export interface RunnerOptions {
  watch: boolean;
}

/** Host-wide settings resolved from the command line */
export interface BridgeSettings {
  baseDir: string;
  nodeCommand: string;
  script: string;
  cacheDir: string;
  /** Shared bundler config path */
  config: string;
  /** Per-mode config overrides */
  modeConfigs: Partial<Record<Mode, string>>;
  /** Explicit input roots; when empty the contexts script supplies them */
  contexts: string[];
  contextsScript: string;
  include: string[];
  exclude: string[];
  env: Record<string, string>;
}

/** Settings of one mode, derived from BridgeSettings */
export interface ModeSettings {
  mode: Mode;
  config: string;
  env: Record<string, string>;
}

/** Immutable description of one build run */
export interface InvocationRequest {
  readonly mode: Mode;
  readonly baseDir: string;
  readonly config: string;
  readonly inputs: readonly string[];
  readonly env: Readonly<Record<string, string>>;
}

/** Persisted fingerprint of a partition */
export interface FingerprintFile {
  version: 1;
  /** Map of absolute file path -> content hash (SHA-256 hex) */
  files: Record<string, string>;
}

/** A long-running subprocess that rebuilds on its own */
export interface Watcher {
  start(): Promise<void>;
  stop(): void;
}
