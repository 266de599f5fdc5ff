// Console logging wrapper. Everything goes to stderr: under the stdio
// transport stdout belongs to the MCP protocol.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogMeta = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function write(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
    return;
  }
  const line = `[${level.toUpperCase()}] ${message}`;
  if (meta) {
    console.error(line, meta);
    return;
  }
  console.error(line);
}

export function logDebug(message: string, meta?: LogMeta): void {
  write('debug', message, meta);
}

export function logInfo(message: string, meta?: LogMeta): void {
  write('info', message, meta);
}

export function logWarn(message: string, meta?: LogMeta): void {
  write('warn', message, meta);
}

export function logError(message: string, meta?: LogMeta): void {
  write('error', message, meta);
}
