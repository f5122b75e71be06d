import { mkdirSync } from 'fs';
import { join } from 'path';

import { createLogger, format, transports, type Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface AppLoggerOptions {
  level: string;
  fileEnabled: boolean;
  fileRetentionHours: number;
  /** Defaults to ./logs */
  logsDir?: string;
}

/**
 * JSON logger writing to the console and, when enabled, to hourly rotated
 * files under logs/.
 */
export function createAppLogger(options: AppLoggerOptions): Logger {
  const loggerTransports: Logger['transports'] = [new transports.Console()];

  if (options.fileEnabled) {
    const logsDir = options.logsDir ?? join(process.cwd(), 'logs');
    mkdirSync(logsDir, { recursive: true });

    // winston-daily-rotate-file takes 'Nh' or 'Nd'; floor so we never exceed the configured retention
    const retentionSpec = options.fileRetentionHours >= 24
      ? `${Math.floor(options.fileRetentionHours / 24)}d`
      : `${options.fileRetentionHours}h`;

    loggerTransports.push(new DailyRotateFile({
      filename: join(logsDir, 'metrics-%DATE%.log'),
      datePattern: 'YYYY-MM-DD-HH',
      maxSize: '50m',
      maxFiles: retentionSpec,
      format: format.combine(format.timestamp(), format.json()),
      auditFile: join(logsDir, '.audit.json')
    }));
  }

  return createLogger({
    level: options.level,
    format: format.combine(format.timestamp(), format.json()),
    transports: loggerTransports
  });
}

let scopeLogger: Logger = createLogger({
  level: 'info',
  format: format.combine(format.timestamp(), format.json()),
  transports: [new transports.Console()]
});

/**
 * Logger used by code that has none passed in (the metric update functions).
 */
export function getLogger(): Logger {
  return scopeLogger;
}

export function setLogger(logger: Logger): void {
  scopeLogger = logger;
}
