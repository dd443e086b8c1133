import pino from 'pino';
import config from 'config';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'gpu-textfile-exporter';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values).map(level => level.toLowerCase()).concat('silent')
);

// stdout carries the exposition text, so logs go to stderr
const logger = pino({ name, level }, pino.destination(2));

let currentLevel = logger.level;

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string) {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export function getLogLevel(): string {
  return currentLevel;
}

export function getAvailableLogLevels(): string[] {
  return Array.from(AVAILABLE_LOG_LEVELS).sort();
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  if (currentLevel === normalized) {
    return currentLevel;
  }

  const previous = currentLevel;
  logger.level = normalized;
  currentLevel = logger.level;
  logger.debug({ logLevel: currentLevel, previous }, 'Log level updated');
  return currentLevel;
}

export default logger;
