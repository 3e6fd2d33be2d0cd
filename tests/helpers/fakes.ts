import { Logger } from '../../src/interfaces/Logger';
import { S3Client, S3Object } from '../../src/interfaces/S3Client';
import { BackupConfig } from '../../src/interfaces/BackupConfig';
import { LogLevel } from '../../src/interfaces/Logger';
import { Result, ok, err } from '../../src/types/Result';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    fatal: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
    logRunStart: jest.fn(),
    logRunSkipped: jest.fn(),
    logDatabaseStart: jest.fn(),
    logDatabaseFailure: jest.fn(),
    logPrune: jest.fn(),
    logRetentionCleanup: jest.fn(),
    logRunSummary: jest.fn(),
    logConfigurationStart: jest.fn(),
    logScheduledExecution: jest.fn(),
  };
}

export function createTestConfig(overrides: Partial<BackupConfig> = {}): BackupConfig {
  return {
    mysqlHost: 'db.internal',
    mysqlPort: 3306,
    mysqlUser: 'backup',
    mysqlPassword: 'test-secret',
    databases: { mode: 'all' },
    backupNamePattern: '{db}_{date}_{time}',
    s3Bucket: 'test-bucket',
    s3Path: 'backups/mysql',
    s3Region: 'us-east-1',
    backupIntervalHours: 24,
    retentionCount: 7,
    notifyType: 'slack',
    logFile: '/var/log/test.log',
    logLevel: LogLevel.INFO,
    lockFile: '/tmp/test.lock',
    ...overrides,
  };
}

/**
 * Object store kept in a map, listing keys in lexicographic order
 */
export class InMemoryS3Client implements S3Client {
  readonly objects = new Map<string, number>();
  readonly failingDeletes = new Set<string>();
  readonly failingUploads = new Set<string>();
  failListing = false;

  constructor(private readonly bucket = 'test-bucket') {}

  seed(keys: readonly string[]): void {
    keys.forEach(key => this.objects.set(key, 100));
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  async uploadFile(_filePath: string, key: string): Promise<string> {
    if (this.failingUploads.has(key)) {
      throw new Error(`upload rejected for ${key}`);
    }
    this.objects.set(key, 100);
    return `s3://${this.bucket}/${key}`;
  }

  async *listObjects(prefix: string): AsyncGenerator<S3Object> {
    if (this.failListing) {
      throw new Error('listing unavailable');
    }
    for (const key of this.keys()) {
      if (key.startsWith(prefix)) {
        yield { key, size: this.objects.get(key) ?? 0 };
      }
    }
  }

  async deleteObject(key: string): Promise<Result<void, Error>> {
    if (this.failingDeletes.has(key)) {
      return err(new Error(`delete rejected for ${key}`));
    }
    this.objects.delete(key);
    return ok(undefined);
  }

  async testConnection(): Promise<boolean> {
    return true;
  }
}
