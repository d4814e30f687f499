// Shared winston logger: JSON to console, optional hourly rotating file output
import { mkdirSync } from 'fs';
import { join } from 'path';

import { createLogger, format, transports, type Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

import { config } from './config/index.js';

export type LoggerTransport = InstanceType<typeof transports.Console> | DailyRotateFile;

export interface FileLogOptions {
  enabled: boolean;
  dir: string;
  retentionHours: number;
}

/**
 * winston-daily-rotate-file takes 'Nh' and 'Nd' retention specs
 */
export function retentionSpec(retentionHours: number): string {
  return retentionHours >= 24
    ? `${Math.floor(retentionHours / 24)}d`
    : `${retentionHours}h`;
}

export function buildTransports(file: FileLogOptions): LoggerTransport[] {
  const loggerTransports: LoggerTransport[] = [new transports.Console()];

  if (file.enabled) {
    mkdirSync(file.dir, { recursive: true });
    loggerTransports.push(new DailyRotateFile({
      filename: join(file.dir, 'engine-%DATE%.log'),
      datePattern: 'YYYY-MM-DD-HH',
      maxSize: '50m',
      maxFiles: retentionSpec(file.retentionHours),
      format: format.combine(format.timestamp(), format.json()),
      auditFile: join(file.dir, '.audit.json')
    }));
  }

  return loggerTransports;
}

export const logger: Logger = createLogger({
  level: config.logLevel,
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.json()
  ),
  transports: buildTransports({
    enabled: config.logFileEnabled,
    dir: join(process.cwd(), 'logs'),
    retentionHours: config.logFileRetentionHours
  })
});

export type { Logger };
