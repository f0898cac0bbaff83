export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function parseThreshold(raw: string | undefined): LogLevel | 'silent' {
  const value = raw?.toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error' || value === 'silent') {
    return value;
  }
  return 'info';
}

const threshold = parseThreshold(process.env.LOG_LEVEL);

export function formatLogLine(level: LogLevel, event: string, fields: LogFields = {}, now = new Date()): string {
  return JSON.stringify({
    level,
    event,
    timestamp: now.toISOString(),
    ...fields
  });
}

function write(level: LogLevel, event: string, fields?: LogFields): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) {
    return;
  }
  const line = formatLogLine(level, event, fields);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function logDebug(event: string, fields?: LogFields): void {
  write('debug', event, fields);
}

export function logInfo(event: string, fields?: LogFields): void {
  write('info', event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  write('warn', event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  write('error', event, fields);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
