import { ResultDecodeError } from './errors.js';
import type { JsonValue } from './types.js';

/**
 * Separates log text from a trailing result payload on a stdout line.
 *
 * The runner script is trusted never to print this byte in ordinary log text.
 * Nothing verifies that: a log line containing it is read as a payload.
 */
export const RESULT_ESCAPE_CHAR = '\u0010';

/** A stdout line split around the first escape character */
export interface SplitLine {
  /** Log text, absent when the line holds only a payload */
  log?: string;
  /** Raw payload text, absent on plain log lines */
  payload?: string;
}

/** Split a stdout line into its log part and its result payload */
export function splitResultLine(line: string): SplitLine {
  const index = line.indexOf(RESULT_ESCAPE_CHAR);
  if (index === -1) {
    return { log: line };
  }

  const log = line.slice(0, index);
  const payload = line.slice(index + 1);
  return log ? { log, payload } : { payload };
}

/** Line a runner script prints to hand `value` back to the host */
export function formatResultLine(value: JsonValue, log = ''): string {
  return `${log}${RESULT_ESCAPE_CHAR}${JSON.stringify(value)}`;
}

/** Decode a payload as JSON, failing with ResultDecodeError */
export function decodePayload(payload: string): JsonValue {
  try {
    const value: JsonValue = JSON.parse(payload);
    return value;
  } catch (err: unknown) {
    throw new ResultDecodeError(payload, err);
  }
}

/**
 * Route each stdout line: log text to `onLog`, decoded payloads to `onResult`.
 * Decode failures go to `onError` so a stream reader can keep draining.
 */
export function createResultExtractor(handlers: {
  onLog: (line: string) => void;
  onResult: (value: JsonValue) => void;
  onError: (err: ResultDecodeError) => void;
}): (line: string) => void {
  return (line) => {
    const { log, payload } = splitResultLine(line);
    if (log !== undefined) {
      handlers.onLog(log);
    }
    if (payload === undefined) {
      return;
    }
    try {
      handlers.onResult(decodePayload(payload));
    } catch (err: unknown) {
      if (!(err instanceof ResultDecodeError)) throw err;
      handlers.onError(err);
    }
  };
}
