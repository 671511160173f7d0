import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const VALID_LOG_LEVELS: ReadonlySet<LogLevel> = new Set<LogLevel>([
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
]);

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LOG_LEVELS as ReadonlySet<string>).has(value);
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
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const env = process.env.NODE_ENV;
  const isTest = env === 'test';
  const isDev = env !== 'production' && !isTest;

  // Tests stay quiet unless LOG_LEVEL asks otherwise
  const level = options.level
    ?? (isTest && !process.env.LOG_LEVEL ? 'silent' : parseLogLevel(process.env.LOG_LEVEL));
  const pretty = options.pretty ?? isDev;

  const transport = pretty
    ? { target: 'pino-pretty', options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' } }
    : undefined;

  return pino({ level, transport });
}

const logger = createLogger();

export default logger;
