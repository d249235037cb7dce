import pino, { type Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  // File descriptor for output; the CLI uses 2 so stdout carries only the report.
  destination?: 1 | 2;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const destination = options.destination ?? 1;

  if (options.pretty) {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination }
      }
    });
  }

  return pino({ level }, pino.destination(destination));
}
