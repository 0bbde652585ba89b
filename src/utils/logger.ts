import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set([
  'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent',
]);

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!envValue) return fallback;
  const normalized = envValue.toLowerCase().trim();
  if (isLogLevel(normalized)) return normalized;
  return fallback;
}

export type LogStream = 'stdout' | 'stderr';

const STREAM_FD: Record<LogStream, number> = { stdout: 1, stderr: 2 };

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
  /** Defaults to stderr; stdout is left to command output such as `collect --verbose` */
  stream?: LogStream;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const env = process.env.NODE_ENV;
  const isDev = env !== 'production' && env !== 'test';
  // Jest runs with NODE_ENV=test; keep test output quiet unless LOG_LEVEL asks otherwise
  const level = options.level ?? parseLogLevel(process.env.LOG_LEVEL, env === 'test' ? 'silent' : 'info');
  const pretty = options.pretty ?? isDev;
  const fd = STREAM_FD[options.stream ?? 'stderr'];

  if (pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', destination: fd },
      },
    });
  }

  return pino({ level }, pino.destination(fd));
}

const logger = createLogger();

export default logger;
