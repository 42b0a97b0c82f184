import type { Logger } from './types.js';

const PREFIX = 'bundler-bridge: ';

/** Logger writing to stderr, leaving stdout to the bundler output */
export const consoleLogger: Logger = {
  info(line) {
    process.stderr.write(`${PREFIX}${line}\n`);
  },
  error(line) {
    process.stderr.write(`${PREFIX}${line}\n`);
  },
};
