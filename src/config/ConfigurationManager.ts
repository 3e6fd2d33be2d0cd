import { BackupConfig, DatabaseSelection, NotificationType } from '../interfaces/BackupConfig';
import { LogLevel } from '../interfaces/Logger';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export const DEFAULT_S3_ENDPOINT = 'https://s3.amazonaws.com';

const DEFAULTS = {
  MYSQL_HOST: 'localhost',
  MYSQL_PORT: '3306',
  MYSQL_USER: 'root',
  MYSQL_DATABASES: 'ALL',
  BACKUP_NAME_PATTERN: '{hostname}_{db}_{date}_{time}',
  S3_PATH: 'backups/mysql',
  AWS_DEFAULT_REGION: 'us-east-1',
  BACKUP_INTERVAL_HOURS: '24',
  BACKUP_RETENTION_COUNT: '7',
  NOTIFY_TYPE: 'slack',
  LOG_FILE: '/var/log/mysql-backup-service.log',
  LOG_LEVEL: 'info',
  LOCK_FILE: '/tmp/mysql-backup-service.lock',
} as const;

const REQUIRED_VARS = ['S3_BUCKET'] as const;

export class ConfigurationManager {
  /**
   * Load and validate configuration from environment variables
   */
  static loadConfiguration(env: NodeJS.ProcessEnv = process.env): BackupConfig {
    const missingVars = REQUIRED_VARS.filter(varName => !env[varName]?.trim());
    if (missingVars.length > 0) {
      throw new ConfigurationError(
        `Missing required environment variables: ${missingVars.join(', ')}`,
        missingVars[0]
      );
    }

    const read = (name: keyof typeof DEFAULTS): string => {
      const value = env[name]?.trim();
      return value ? value : DEFAULTS[name];
    };

    const mysqlPort = this.parseInteger(read('MYSQL_PORT'), 'MYSQL_PORT', 1);
    if (mysqlPort > 65535) {
      throw new ConfigurationError('MYSQL_PORT must be between 1 and 65535', 'MYSQL_PORT');
    }

    const backupIntervalHours = this.parseInteger(read('BACKUP_INTERVAL_HOURS'), 'BACKUP_INTERVAL_HOURS', 1);

    const config: BackupConfig = {
      mysqlHost: read('MYSQL_HOST'),
      mysqlPort,
      mysqlUser: read('MYSQL_USER'),
      mysqlPassword: env.MYSQL_PASSWORD ?? '',
      databases: this.parseDatabaseSelection(read('MYSQL_DATABASES')),
      backupNamePattern: read('BACKUP_NAME_PATTERN'),
      s3Bucket: env.S3_BUCKET?.trim() ?? '',
      // An explicitly empty path stores backups at the bucket root
      s3Path: env.S3_PATH === undefined ? DEFAULTS.S3_PATH : env.S3_PATH.trim(),
      s3Region: read('AWS_DEFAULT_REGION'),
      backupIntervalHours,
      retentionCount: this.parseInteger(read('BACKUP_RETENTION_COUNT'), 'BACKUP_RETENTION_COUNT', 0),
      notifyType: this.parseNotificationType(read('NOTIFY_TYPE')),
      logFile: read('LOG_FILE'),
      logLevel: this.parseLogLevel(read('LOG_LEVEL')),
      lockFile: read('LOCK_FILE'),
    };

    // Add optional properties only if they exist
    const s3Endpoint = env.S3_ENDPOINT?.trim();
    if (s3Endpoint) {
      config.s3Endpoint = s3Endpoint;
    }
    if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
      config.s3AccessKey = env.AWS_ACCESS_KEY_ID;
      config.s3SecretKey = env.AWS_SECRET_ACCESS_KEY;
    } else if (env.AWS_ACCESS_KEY_ID || env.AWS_SECRET_ACCESS_KEY) {
      const missing = env.AWS_ACCESS_KEY_ID ? 'AWS_SECRET_ACCESS_KEY' : 'AWS_ACCESS_KEY_ID';
      throw new ConfigurationError(
        'AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together',
        missing
      );
    }
    const webhookUrl = env.NOTIFY_WEBHOOK_URL?.trim();
    if (webhookUrl) {
      config.notifyWebhookUrl = this.parseUrl(webhookUrl, 'NOTIFY_WEBHOOK_URL');
    }

    return config;
  }

  /**
   * Copy of the configuration that is safe to write to the log
   */
  static sanitizeForLogging(config: BackupConfig): Record<string, unknown> {
    return {
      ...config,
      mysqlPassword: config.mysqlPassword ? '[REDACTED]' : '',
      s3AccessKey: config.s3AccessKey ? '[REDACTED]' : undefined,
      s3SecretKey: config.s3SecretKey ? '[REDACTED]' : undefined,
      notifyWebhookUrl: config.notifyWebhookUrl ? '[REDACTED]' : undefined,
    };
  }

  /**
   * Whether names rendered from the pattern sort in chronological order.
   * Retention relies on this; without {date} or {timestamp} pruning order is arbitrary.
   */
  static hasSortableNamePattern(pattern: string): boolean {
    return pattern.includes('{date}') || pattern.includes('{timestamp}');
  }

  private static parseDatabaseSelection(value: string): DatabaseSelection {
    if (value === 'ALL') {
      return { mode: 'all' };
    }

    const names = value
      .split(',')
      .map(name => name.trim())
      .filter(name => name.length > 0);

    return { mode: 'list', names };
  }

  private static parseInteger(value: string, field: string, min: number): number {
    if (!/^\d+$/.test(value)) {
      throw new ConfigurationError(`${field} must be a whole number`, field);
    }
    const parsed = parseInt(value, 10);
    if (parsed < min) {
      throw new ConfigurationError(`${field} must be at least ${min}`, field);
    }
    return parsed;
  }

  private static parseNotificationType(value: string): NotificationType {
    const lower = value.toLowerCase();
    if (lower === 'slack' || lower === 'discord') {
      return lower;
    }
    throw new ConfigurationError('NOTIFY_TYPE must be "slack" or "discord"', 'NOTIFY_TYPE');
  }

  private static parseLogLevel(value: string): LogLevel {
    const lower = value.toLowerCase();
    const level = Object.values(LogLevel).find(candidate => candidate === lower);
    if (!level) {
      throw new ConfigurationError(
        `LOG_LEVEL must be one of: ${Object.values(LogLevel).join(', ')}`,
        'LOG_LEVEL'
      );
    }
    return level;
  }

  private static parseUrl(value: string, field: string): string {
    try {
      const url = new URL(value);
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new ConfigurationError(`${field} must be an http(s) URL`, field);
      }
      return value;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(`${field} is not a valid URL`, field);
    }
  }
}
