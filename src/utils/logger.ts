/**
 * Line-oriented logger
 * Threshold comes from LOG_LEVEL (DEBUG, INFO, WARN, ERROR, SILENT)
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

function threshold(): number {
  const configured = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
  if (configured === 'SILENT') return Number.POSITIVE_INFINITY;
  const level = Object.values(LogLevel).find(l => l === configured);
  return level ? LEVEL_ORDER[level] : LEVEL_ORDER[LogLevel.INFO];
}

function formatLog(entry: LogEntry): string {
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}${metadataStr}`;
}

function write(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < threshold()) return;

  const line = formatLog({
    level,
    message,
    timestamp: new Date().toISOString(),
    metadata,
  });

  if (level === LogLevel.ERROR) {
    console.error(line);
  } else if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

/**
 * Shortens upstream payloads before they go into a log line
 */
export function preview(text: string, max = 500): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export const logger = {
  debug(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.DEBUG, message, metadata);
  },

  info(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.INFO, message, metadata);
  },

  warn(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.WARN, message, metadata);
  },

  error(message: string, error?: Error | unknown, metadata?: Record<string, unknown>): void {
    write(LogLevel.ERROR, message, {
      ...metadata,
      error: error instanceof Error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : error,
    });
  },
};
