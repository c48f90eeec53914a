import { pino } from 'pino';
import type { Logger as PinoLogger, LevelWithSilent } from 'pino';

export type Logger = PinoLogger;

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/**
 * Root logger for the CLI and worker processes. Scenario code logs through
 * `scenarioLogger` so every line carries the scenario id.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'cosim',
    level: options.level ?? parseLevel(process.env.LOG_LEVEL),
  });
}

export function scenarioLogger(parent: Logger, scenarioId: string): Logger {
  return parent.child({ scenarioId });
}

/** Logger that discards everything. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLevel(value: string | undefined): LevelWithSilent {
  const match = LEVELS.find((level) => level === value);
  return match ?? 'info';
}
