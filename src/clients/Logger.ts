import winston from 'winston';
import { BackupStage, Logger as ILogger, LogLevel, LogMeta } from '../interfaces/Logger';
import { RunSummary } from '../interfaces/BackupManager';
import { formatError } from '../utils/errors';

const LOG_LEVELS: Record<LogLevel, number> = {
  [LogLevel.FATAL]: 0,
  [LogLevel.ERROR]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
};

const SENSITIVE_KEYS = ['password', 'secret', 'accesskey', 'token', 'credential', 'webhook'];

export interface LoggerOptions {
  level?: LogLevel;
  /** Append records to this file in addition to the console */
  logFile?: string;
}

export interface LogRecord {
  level: string;
  message: unknown;
  timestamp?: unknown;
  [key: string]: unknown;
}

/**
 * Render one record as `[timestamp] [LEVEL] message`, followed by its metadata as JSON
 */
export function formatLogLine(info: LogRecord): string {
  const { timestamp, level, message, ...meta } = info;
  const line = `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}`;

  if (Object.keys(meta).length === 0) {
    return line;
  }
  return `${line} ${JSON.stringify(meta)}`;
}

/**
 * Sanitize metadata to remove sensitive information
 */
export function sanitizeMeta(meta: LogMeta): LogMeta {
  const sanitized: LogMeta = { ...meta };

  for (const [key, value] of Object.entries(sanitized)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      sanitized[key] = sanitizeMeta(value);
    }
  }

  return sanitized;
}

function isPlainObject(value: unknown): value is LogMeta {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(options: LoggerOptions = {}) {
    const format = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.printf(info => formatLogLine(info))
    );

    const consoleTransport = new winston.transports.Console();
    const transports = options.logFile
      ? [consoleTransport, new winston.transports.File({ filename: options.logFile })]
      : [consoleTransport];

    this.winston = winston.createLogger({
      levels: LOG_LEVELS,
      level: options.level ?? LogLevel.INFO,
      format,
      transports,
    });
  }

  fatal(message: string, error?: Error, meta?: LogMeta): void {
    this.winston.log(LogLevel.FATAL, message, this.withError(meta, error));
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    this.winston.log(LogLevel.ERROR, message, this.withError(meta, error));
  }

  warn(message: string, meta?: LogMeta): void {
    this.winston.log(LogLevel.WARN, message, this.clean(meta));
  }

  info(message: string, meta?: LogMeta): void {
    this.winston.log(LogLevel.INFO, message, this.clean(meta));
  }

  debug(message: string, meta?: LogMeta): void {
    this.winston.log(LogLevel.DEBUG, message, this.clean(meta));
  }

  logRunStart(databaseCount: number): void {
    this.info(`Starting backup run for ${databaseCount} database(s)`);
  }

  logRunSkipped(ownerPid: number | null): void {
    this.warn(`Another backup is still running (PID ${ownerPid ?? 'unknown'}). Skipping.`);
  }

  logDatabaseStart(databaseName: string, location: string): void {
    this.info(`Backing up database: ${databaseName} → ${location}`);
  }

  logDatabaseFailure(databaseName: string, stage: BackupStage, error: Error): void {
    const message = stage === 'dump' ? `mysqldump failed for ${databaseName}` : `S3 upload failed for ${databaseName}`;
    this.error(message, error);
  }

  logPrune(databaseName: string, fileName: string): void {
    this.info(`Pruning old backup: ${fileName}`, { databaseName });
  }

  logRetentionCleanup(databaseName: string, deletedCount: number, retentionCount: number): void {
    this.info(`Pruned ${deletedCount} old backup(s) for ${databaseName} (keeping ${retentionCount})`);
  }

  logRunSummary(summary: RunSummary): void {
    if (summary.failed > 0) {
      this.warn(
        `Backup finished with errors: ${summary.total - summary.failed}/${summary.total} succeeded.`,
        { failedDatabases: summary.outcomes.filter(o => !o.succeeded).map(o => o.target.databaseName) }
      );
    } else {
      this.info(`All backups completed successfully: ${summary.total}/${summary.total} databases.`);
    }
  }

  logConfigurationStart(config: LogMeta): void {
    this.info('Application starting with configuration', { config: sanitizeMeta(config) });
  }

  logScheduledExecution(intervalHours: number): void {
    this.info('Scheduled backup execution triggered', { intervalHours });
  }

  /**
   * Create a logger from LOG_LEVEL and LOG_FILE in the environment
   */
  static createFromEnvironment(env: NodeJS.ProcessEnv = process.env): Logger {
    const requested = env.LOG_LEVEL?.toLowerCase();
    const level = Object.values(LogLevel).find(candidate => candidate === requested) ?? LogLevel.INFO;
    return new Logger({ level, logFile: env.LOG_FILE || undefined });
  }

  private clean(meta?: LogMeta): LogMeta {
    return meta ? sanitizeMeta(meta) : {};
  }

  private withError(meta?: LogMeta, error?: Error): LogMeta {
    if (!error) {
      return this.clean(meta);
    }
    return {
      ...this.clean(meta),
      error: formatError(error),
    };
  }
}
