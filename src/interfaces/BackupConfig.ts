import { LogLevel } from './Logger';

export type NotificationType = 'slack' | 'discord';

/**
 * Which databases a run backs up: every non-system schema on the server,
 * or an explicit list in the configured order
 */
export type DatabaseSelection = { mode: 'all' } | { mode: 'list'; names: string[] };

export interface BackupConfig {
  mysqlHost: string;
  mysqlPort: number;
  mysqlUser: string;
  mysqlPassword: string;
  databases: DatabaseSelection;
  backupNamePattern: string;
  s3Bucket: string;
  s3Path: string;
  s3Endpoint?: string;
  s3Region: string;
  s3AccessKey?: string;
  s3SecretKey?: string;
  backupIntervalHours: number;
  retentionCount: number;
  notifyWebhookUrl?: string;
  notifyType: NotificationType;
  logFile: string;
  logLevel: LogLevel;
  lockFile: string;
}
