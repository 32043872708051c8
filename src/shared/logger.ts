import pino from 'pino';

function defaultLevel(): string {
  if (process.env['LOG_LEVEL']) return process.env['LOG_LEVEL'];
  return process.env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

// stderr only: the proxy's console UI owns stdout and the terminal while a session runs.
export const logger = pino({ name: 'pinswap', level: defaultLevel() }, pino.destination(2));

export function setVerbose(verbose: boolean): void {
  if (verbose && !process.env['LOG_LEVEL']) logger.level = 'debug';
}
