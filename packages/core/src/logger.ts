export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
}

export type LogTransport = (entry: LogEntry) => void;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let globalTransports: LogTransport[] = [];
let globalMinLevel: LogLevel = 'info';

/** Add a transport that receives all log entries. Returns a remover. */
export function addLogTransport(transport: LogTransport): () => void {
  globalTransports.push(transport);
  return () => {
    globalTransports = globalTransports.filter((t) => t !== transport);
  };
}

/** Set the minimum log level (entries below this are dropped) */
export function setLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalMinLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

export function formatLogEntry(entry: LogEntry): string {
  const prefix = `[${entry.scope}]`;
  return entry.data !== undefined
    ? `${prefix} ${entry.message} ${JSON.stringify(entry.data)}`
    : `${prefix} ${entry.message}`;
}

/** Console transport, the default: debug/info to stdout, warn/error to stderr */
export function consoleTransport(entry: LogEntry): void {
  const msg = formatLogEntry(entry);
  switch (entry.level) {
    case 'debug':
    case 'info':
      process.stdout.write(`${msg}\n`);
      break;
    case 'warn':
      process.stderr.write(`WARN ${msg}\n`);
      break;
    case 'error':
      process.stderr.write(`ERROR ${msg}\n`);
      break;
  }
}

function emit(entry: LogEntry): void {
  if (LOG_LEVELS[entry.level] < LOG_LEVELS[globalMinLevel]) return;
  for (const transport of globalTransports) {
    try {
      transport(entry);
    } catch (err) {
      // A broken transport must not break the caller
      process.stderr.write(`[Logger] transport failed: ${String(err)}\n`);
    }
  }
}

export type Logger = Record<LogLevel, (message: string, data?: unknown) => void>;

/**
 * Create a scoped logger. Each module creates one:
 *   const log = createLogger('JobTracker');
 *   log.info('Job started', { jobId });
 */
export function createLogger(scope: string): Logger {
  function log(level: LogLevel, message: string, data?: unknown): void {
    emit({
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      data,
    });
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

// Register console transport by default
addLogTransport(consoleTransport);
