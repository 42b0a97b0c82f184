/** Base class of every failure surfaced to the caller of a build */
export class BridgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The command could not be started (missing executable, permission denied) */
export class CommandNotFoundError extends BridgeError {
  constructor(
    readonly command: string,
    cause: unknown,
  ) {
    super(`'${command}' is required. Please install it and add it to your PATH.`, { cause });
  }
}

/** The subprocess ran and exited non-zero */
export class CommandFailedError extends BridgeError {
  constructor(
    readonly command: string,
    readonly exitCode: number,
  ) {
    super(`Failed to execute ${command} (exit code ${exitCode}).`);
  }
}

/** A result payload was not valid JSON */
export class ResultDecodeError extends BridgeError {
  constructor(
    readonly payload: string,
    cause: unknown,
  ) {
    super(`Could not decode result payload: ${payload}`, { cause });
  }
}

/** Format any thrown value for a one-line report */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
