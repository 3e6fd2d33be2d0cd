import { RunSummary } from './BackupManager';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  fatal(message: string, error?: Error, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;

  // Specialized logging methods for backup runs
  logRunStart(databaseCount: number): void;
  logRunSkipped(ownerPid: number | null): void;
  logDatabaseStart(databaseName: string, location: string): void;
  logDatabaseFailure(databaseName: string, stage: BackupStage, error: Error): void;
  logPrune(databaseName: string, fileName: string): void;
  logRetentionCleanup(databaseName: string, deletedCount: number, retentionCount: number): void;
  logRunSummary(summary: RunSummary): void;
  logConfigurationStart(config: LogMeta): void;
  logScheduledExecution(intervalHours: number): void;
}

export type BackupStage = 'dump' | 'upload';

export enum LogLevel {
  FATAL = 'fatal',
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
