import { LogLevelName } from '../config/settings.ts';

// Log levels enum
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

// Helper function to get formatted timestamp
const getTimestamp = (): string => {
  const now = new Date();
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const hours = String(now.getHours()).padStart(2, '0');
  const minutes = String(now.getMinutes()).padStart(2, '0');
  const seconds = String(now.getSeconds()).padStart(2, '0');
  const milliseconds = String(now.getMilliseconds()).padStart(3, '0');

  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds}.${milliseconds}`;
};

// Read on every call so LOG_LEVEL can change at runtime; unknown values mean INFO
const getCurrentLogLevel = (): LogLevel => {
  const parsed = LogLevelName.safeParse(process.env.LOG_LEVEL);
  return parsed.success ? LEVEL_BY_NAME[parsed.data] : LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => level >= getCurrentLogLevel();

export type Logger = {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
};

// Console-based logger with timestamps, an optional context tag and level filtering
export const createLogger = (context?: string): Logger => {
  const prefix = (tag: string) => `${getTimestamp()} [${tag}] ${context ? `[${context}] ` : ''}`;
  return {
    debug: (message, ...args) => {
      if (shouldLog(LogLevel.DEBUG)) {
        console.debug(`${prefix('DEBUG')}${message}`, ...args);
      }
    },
    info: (message, ...args) => {
      if (shouldLog(LogLevel.INFO)) {
        console.info(`${prefix('INFO')}${message}`, ...args);
      }
    },
    warn: (message, ...args) => {
      if (shouldLog(LogLevel.WARN)) {
        console.warn(`${prefix('WARN')}${message}`, ...args);
      }
    },
    error: (message, ...args) => {
      if (shouldLog(LogLevel.ERROR)) {
        console.error(`${prefix('ERROR')}${message}`, ...args);
      }
    },
  };
};
