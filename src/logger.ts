import pino from 'pino';
import config from 'config';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'vendorcat';

const AVAILABLE_LOG_LEVELS = new Set(
  [...Object.keys(pino.levels.values), 'silent'].map(value => value.toLowerCase())
);

const logger = pino({ name, level });

export const metricsLogger = logger.child({ logger: 'metrics' });
export const alertLogger = logger.child({ logger: 'alerts' });
export const perfLogger = logger.child({ logger: 'perf' });
export const httpLogger = logger.child({ logger: 'http' });

const childLoggers = [metricsLogger, alertLogger, perfLogger, httpLogger];

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function isLevel(value: string): value is pino.LevelWithSilent {
  return AVAILABLE_LOG_LEVELS.has(value);
}

export function getLogLevel(): string {
  return logger.level;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  if (!isLevel(normalized)) {
    const available = getAvailableLogLevels().join(', ');
    throw new Error(`Unknown log level "${nextLevel}" (available: ${available})`);
  }
  if (logger.level === normalized) {
    return logger.level;
  }

  // children keep their own level once created, so they follow the root explicitly
  logger.level = normalized;
  for (const child of childLoggers) {
    child.level = normalized;
  }
  logger.info({ level: normalized }, 'Log level updated');
  return logger.level;
}

export default logger;
