import winston from 'winston';

export interface LoggerOptions {
  logFilePath?: string;
  level?: string;
  /** Suppress console output (tests) */
  silent?: boolean;
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: Array<
    winston.transports.ConsoleTransportInstance | winston.transports.FileTransportInstance
  > = [
    new winston.transports.Console({
      format: winston.format.simple(),
    }),
  ];

  if (options.logFilePath) {
    transports.push(new winston.transports.File({ filename: options.logFilePath }));
  }

  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
  });
}
