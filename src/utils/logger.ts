import { Logger, LogLevel } from '../types/index.js';
import { SETUP_ENV } from '../constants/index.js';

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3
};

const LEVEL_PREFIX: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '🐛 [DEBUG]',
  [LogLevel.INFO]: 'ℹ️  [INFO] ',
  [LogLevel.WARN]: '⚠️  [WARN] ',
  [LogLevel.ERROR]: '❌ [ERROR]'
};

const CONSOLE_METHOD: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: line => console.debug(line),
  [LogLevel.INFO]: line => console.info(line),
  [LogLevel.WARN]: line => console.warn(line),
  [LogLevel.ERROR]: line => console.error(line)
};

/**
 * Level from the environment: SETUPKIT_VERBOSE=1 turns on debug output,
 * NODE_ENV=development shows info, anything else only errors.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  if (env[SETUP_ENV.VERBOSE] === '1') return LogLevel.DEBUG;
  if (env.NODE_ENV === 'development') return LogLevel.INFO;
  return LogLevel.ERROR;
}

function renderMeta(meta: unknown): string {
  if (meta === undefined) return '';
  if (meta === null || typeof meta !== 'object') return ` ${String(meta)}`;
  // JSON.stringify(new Error()) is {}
  const payload = meta instanceof Error ? { ...meta, name: meta.name, message: meta.message, stack: meta.stack } : meta;
  return `\n${JSON.stringify(payload, null, 2)}`;
}

export function formatLogLine(level: LogLevel, message: string, meta?: unknown, now: Date = new Date()): string {
  return `${now.toISOString()} ${LEVEL_PREFIX[level]} ${message}${renderMeta(meta)}`;
}

/**
 * Console logger filtered by a minimum level
 */
export class ConsoleLogger implements Logger {
  constructor(private level: LogLevel = LogLevel.INFO) {}

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private write(level: LogLevel, message: string, meta?: unknown): void {
    if (this.isEnabled(level)) {
      CONSOLE_METHOD[level](formatLogLine(level, message, meta));
    }
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export const logger = new ConsoleLogger(resolveLogLevel(process.env));
