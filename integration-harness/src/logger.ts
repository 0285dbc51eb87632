import { destination, pino, type Level } from 'pino';

const LEVELS: readonly Level[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

function isLevel(value: string): value is Level {
  return LEVELS.some(level => level === value);
}

/**
 * Resolve the log level: LOG_LEVEL wins, then --verbose, then warn.
 */
export function resolveLogLevel(verbose: boolean, envLevel = process.env['LOG_LEVEL']): Level {
  if (envLevel && isLevel(envLevel)) {
    return envLevel;
  }
  return verbose ? 'debug' : 'warn';
}

// stdout carries the report; logs go to stderr.
export const logger = pino(
  { name: 'job-hunter-integration', level: resolveLogLevel(false) },
  destination(2)
);

export function setVerbose(verbose: boolean): void {
  logger.level = resolveLogLevel(verbose);
}
