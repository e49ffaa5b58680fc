import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'prtg-exporter';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values).map(level => level.toLowerCase())
);

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      metrics.incrementLogLevel(resolvedLevel);
      return method.apply(this, inputArgs);
    }
  }
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

export function isLogLevel(value: string): value is pino.LevelWithSilent {
  return AVAILABLE_LOG_LEVELS.has(value) || value === 'silent';
}

export function getLogLevel(): string {
  return logger.level;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  if (!isLogLevel(normalized)) {
    const available = getAvailableLogLevels().join(', ');
    throw new Error(`Unknown log level "${nextLevel}" (available: ${available})`);
  }
  if (logger.level === normalized) {
    return logger.level;
  }

  const previous = logger.level;
  logger.level = normalized;
  logger.info({ level: logger.level, previous }, 'Log level updated');
  return logger.level;
}

export default logger;
