type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

// Read on every call so tests and the demo can change LOG_LEVEL at runtime
function currentLevel(): number {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? LEVELS[raw] : LEVELS.info;
}

function tag(level: string, scope: string): string {
  return `[${new Date().toISOString()}][${scope}][${level}]`;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (...args) => {
      if (currentLevel() <= LEVELS.debug) console.log(`🐛 ${tag('DEBUG', scope)}`, ...args);
    },
    info: (...args) => {
      if (currentLevel() <= LEVELS.info) console.log(`ℹ️ ${tag('INFO', scope)}`, ...args);
    },
    warn: (...args) => {
      if (currentLevel() <= LEVELS.warn) console.warn(`⚠️ ${tag('WARN', scope)}`, ...args);
    },
    error: (...args) => {
      if (currentLevel() <= LEVELS.error) console.error(`❌ ${tag('ERROR', scope)}`, ...args);
    }
  };
}
