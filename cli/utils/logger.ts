export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  meta?: unknown;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

class Logger {
  private minLevel: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const minIndex = LEVELS.indexOf(this.minLevel);
    const currentIndex = LEVELS.indexOf(level);
    return currentIndex >= minIndex;
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      meta,
    };

    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}]`;
    const metaStr = meta !== undefined ? ` ${formatMeta(meta)}` : '';

    switch (level) {
      case 'error':
        console.error(`${prefix} ${message}${metaStr}`);
        break;
      case 'warn':
        console.warn(`${prefix} ${message}${metaStr}`);
        break;
      case 'info':
        console.info(`${prefix} ${message}${metaStr}`);
        break;
      case 'debug':
        console.debug(`${prefix} ${message}${metaStr}`);
        break;
    }
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  progress(current: number, total: number, label: string): void {
    if (total <= 0) return;
    const percentage = Math.round((current / total) * 100);
    const bar = '='.repeat(Math.floor(percentage / 2)) + ' '.repeat(50 - Math.floor(percentage / 2));
    process.stderr.write(`\r[${bar}] ${percentage}% - ${label} (${current}/${total})`);
    if (current === total) {
      process.stderr.write('\n');
    }
  }
}

// Errors serialize to {} through JSON.stringify
function formatMeta(meta: unknown): string {
  if (meta instanceof Error) {
    return JSON.stringify({ name: meta.name, message: meta.message });
  }
  return JSON.stringify(meta);
}

export const logger = new Logger();

const envLevel = process.env.MEDIA_RESOLVER_LOG_LEVEL;
if (isLogLevel(envLevel)) {
  logger.setLevel(envLevel);
}
