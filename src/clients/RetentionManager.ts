import {
  RetentionManager as IRetentionManager,
  RetentionResult,
} from '../interfaces/RetentionManager';
import { S3Client } from '../interfaces/S3Client';
import { BackupConfig } from '../interfaces/BackupConfig';
import { Logger } from '../interfaces/Logger';
import { BACKUP_FILE_SUFFIX, buildDatabasePrefix } from '../utils/BackupNaming';
import { formatError, toError } from '../utils/errors';

/**
 * Custom error classes for retention management operations
 */
export class RetentionError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RetentionError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Choose which artifacts to delete so that at most `retentionCount` remain.
 *
 * Expects names ordered oldest first and returns the oldest
 * `names.length - retentionCount` of them (none when within the limit).
 * A retention count of 0 selects every name.
 */
export function selectForDeletion(existingNamesOldestFirst: readonly string[], retentionCount: number): string[] {
  const excess = existingNamesOldestFirst.length - retentionCount;
  if (excess <= 0) {
    return [];
  }
  return existingNamesOldestFirst.slice(0, excess);
}

/**
 * RetentionManager implementation that keeps the newest N artifacts per database.
 * Names are assumed to sort chronologically, which holds when the naming
 * pattern carries {date}/{time} or {timestamp}.
 */
export class RetentionManager implements IRetentionManager {
  private s3Client: S3Client;
  private s3Path: string;
  private retentionCount: number;
  private logger: Logger;

  constructor(s3Client: S3Client, config: Pick<BackupConfig, 's3Path' | 'retentionCount'>, logger: Logger) {
    this.s3Client = s3Client;
    this.s3Path = config.s3Path;
    this.retentionCount = config.retentionCount;
    this.logger = logger;
  }

  async pruneDatabase(databaseName: string): Promise<RetentionResult> {
    const result: RetentionResult = {
      deletedCount: 0,
      totalCount: 0,
      deletedKeys: [],
      errors: [],
    };

    const prefix = buildDatabasePrefix(this.s3Path, databaseName);

    let existing: string[];
    try {
      existing = await this.listArtifactNames(prefix);
    } catch (error) {
      const listingError = new RetentionError(
        `Failed to list backups for ${databaseName}: ${formatError(error)}`,
        'listing',
        toError(error)
      );
      result.errors.push(listingError.message);
      this.logger.warn(listingError.message);
      return result;
    }

    result.totalCount = existing.length;

    const toDelete = selectForDeletion(existing, this.retentionCount);
    if (toDelete.length === 0) {
      this.logger.debug(`Nothing to prune for ${databaseName}`, {
        totalCount: existing.length,
        retentionCount: this.retentionCount,
      });
      return result;
    }

    for (const fileName of toDelete) {
      const key = `${prefix}${fileName}`;
      this.logger.logPrune(databaseName, fileName);

      // Deletion failures are logged and skipped
      const deletion = await this.s3Client.deleteObject(key);
      if (!deletion.ok) {
        const message = `Failed to delete backup ${key}: ${formatError(deletion.error)}`;
        result.errors.push(message);
        this.logger.warn(message);
        continue;
      }

      result.deletedCount++;
      result.deletedKeys.push(key);
    }

    this.logger.logRetentionCleanup(databaseName, toDelete.length, this.retentionCount);

    if (result.errors.length > 0) {
      this.logger.warn(
        `Retention cleanup for ${databaseName} had ${result.errors.length} errors. Some backups may not have been deleted.`
      );
    }

    return result;
  }

  /**
   * Artifact file names directly under the prefix, sorted oldest first
   */
  private async listArtifactNames(prefix: string): Promise<string[]> {
    const names: string[] = [];

    for await (const object of this.s3Client.listObjects(prefix)) {
      const name = object.key.slice(prefix.length);
      if (name.length > 0 && !name.includes('/') && name.endsWith(BACKUP_FILE_SUFFIX)) {
        names.push(name);
      }
    }

    return names.sort();
  }
}
