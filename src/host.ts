import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { runMode, startWatch, stopWatch } from './build.js';
import { describeError } from './errors.js';
import type { Session } from './session.js';
import { MODES } from './types.js';

export const HOST_COMMANDS = [...MODES, 'watch', 'stop'] as const;
export type HostCommand = (typeof HOST_COMMANDS)[number];

/** Empty input selects a production build */
export function parseHostCommand(text: string): HostCommand | undefined {
  const word = text.trim() || 'prod';
  return HOST_COMMANDS.find((command) => command === word);
}

/** Run one command against a session */
export async function dispatch(
  session: Session,
  command: HostCommand,
  onWatcherExit?: (exitCode: number) => void,
): Promise<void> {
  switch (command) {
    case 'dev':
    case 'prod':
    case 'test':
      await runMode(session, command);
      return;
    case 'watch':
      await startWatch(session, onWatcherExit);
      return;
    case 'stop':
      stopWatch(session);
      return;
  }
}

/**
 * Read commands line by line until `exit` or end of input. Failing commands are
 * reported and the shell keeps going; the session is closed on the way out.
 */
export async function runShell(session: Session, input: Readable): Promise<void> {
  const rl = createInterface({ input, terminal: false, crlfDelay: Infinity });
  session.log.info(`Commands: ${HOST_COMMANDS.join(', ')}, exit`);

  try {
    for await (const line of rl) {
      if (line.trim() === 'exit') break;

      const command = parseHostCommand(line);
      if (!command) {
        session.log.error(`Unknown command "${line.trim()}"`);
        continue;
      }
      try {
        await dispatch(session, command);
      } catch (err: unknown) {
        session.log.error(describeError(err));
      }
    }
  } finally {
    rl.close();
    session.close();
  }
}
