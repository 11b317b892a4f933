import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set([
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
]);

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const normalized = envValue.toLowerCase().trim();
  if (isLogLevel(normalized)) return normalized;
  return 'info';
}

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const isDev = process.env.NODE_ENV !== 'production';
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL);
  const pretty = options.pretty ?? isDev;

  const transport = pretty
    ? {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'UTC:yyyy-mm-dd HH:MM:ss', ignore: 'pid,hostname' },
    }
    : undefined;

  return pino({ name: options.name ?? 'downornot', level, transport });
}

const logger = createLogger();

export default logger;
