import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  BackupManager as IBackupManager,
  BackupTarget,
  DatabaseOutcome,
  RunReport,
  RunSummary,
} from '../interfaces/BackupManager';
import { BackupConfig } from '../interfaces/BackupConfig';
import { BackupStage, Logger } from '../interfaces/Logger';
import { MySQLClient } from '../interfaces/MySQLClient';
import { Notifier } from '../interfaces/Notifier';
import { RetentionManager } from '../interfaces/RetentionManager';
import { LockAcquisition, RunLock } from '../interfaces/RunLock';
import { S3Client } from '../interfaces/S3Client';
import { PreflightError } from './MySQLClient';
import { buildArtifactKey, renderBackupName, shortHostname } from '../utils/BackupNaming';
import { formatBytes, formatError, toError } from '../utils/errors';

/**
 * Custom error classes for run-level failures
 */
export class BackupError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class EmptyTargetSetError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'resolve_targets', cause);
    this.name = 'EmptyTargetSetError';
  }
}

export type CoordinatorConfig = Pick<
  BackupConfig,
  'databases' | 'backupNamePattern' | 's3Bucket' | 's3Path' | 'logFile'
>;

export interface BackupManagerDependencies {
  mysqlClient: MySQLClient;
  s3Client: S3Client;
  retentionManager: RetentionManager;
  runLock: RunLock;
  notifier: Notifier;
  logger: Logger;
  /** Source of the instant captured for each database's artifact name */
  clock?: () => Date;
  hostname?: string;
  /** Parent directory of the per-run working directory */
  tempRoot?: string;
}

/**
 * Fold per-database outcomes into the run summary
 */
export function summarizeOutcomes(outcomes: readonly DatabaseOutcome[]): RunSummary {
  return outcomes.reduce<RunSummary>(
    (summary, outcome) => ({
      total: summary.total + 1,
      failed: summary.failed + (outcome.succeeded ? 0 : 1),
      outcomes: [...summary.outcomes, outcome],
    }),
    { total: 0, failed: 0, outcomes: [] }
  );
}

/**
 * Process exit status for a finished run: 0 when skipped or fully successful, 1 otherwise
 */
export function exitCodeFor(report: RunReport): number {
  switch (report.status) {
    case 'skipped':
      return 0;
    case 'aborted':
      return 1;
    case 'completed':
      return report.summary.failed > 0 ? 1 : 0;
  }
}

/**
 * BackupManager implementation that coordinates one backup run:
 * lock, resolve databases, then dump, upload and prune each database in turn
 */
export class BackupManager implements IBackupManager {
  private readonly mysqlClient: MySQLClient;
  private readonly s3Client: S3Client;
  private readonly retentionManager: RetentionManager;
  private readonly runLock: RunLock;
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly hostname: string;
  private readonly tempRoot: string;
  private workDir: string | null = null;

  constructor(
    private readonly config: CoordinatorConfig,
    dependencies: BackupManagerDependencies
  ) {
    this.mysqlClient = dependencies.mysqlClient;
    this.s3Client = dependencies.s3Client;
    this.retentionManager = dependencies.retentionManager;
    this.runLock = dependencies.runLock;
    this.notifier = dependencies.notifier;
    this.logger = dependencies.logger;
    this.clock = dependencies.clock ?? (() => new Date());
    this.hostname = dependencies.hostname ?? shortHostname();
    this.tempRoot = dependencies.tempRoot ?? tmpdir();
  }

  async executeBackup(): Promise<RunReport> {
    const startTime = Date.now();

    let lock: LockAcquisition;
    try {
      lock = await this.runLock.acquire();
    } catch (error) {
      return this.abortRun(error, startTime);
    }

    if (!lock.acquired) {
      this.logger.logRunSkipped(lock.ownerPid);
      return { status: 'skipped', ownerPid: lock.ownerPid };
    }

    try {
      await this.mysqlClient.checkDumpTool();
      const targets = await this.resolveTargets();

      this.logger.logRunStart(targets.length);
      this.workDir = await fs.mkdtemp(join(this.tempRoot, 'mysql-backup-'));

      const outcomes = await this.processTargets(targets, this.workDir);
      const summary = summarizeOutcomes(outcomes);

      this.logger.logRunSummary(summary);
      if (summary.failed > 0) {
        await this.notifier.notify(
          `MySQL Backup on ${this.hostname}: ${summary.failed}/${summary.total} databases FAILED. Check ${this.config.logFile}.`
        );
      }

      return { status: 'completed', summary, duration: Date.now() - startTime };
    } catch (error) {
      return await this.abortRun(error, startTime);
    } finally {
      await this.cleanup();
    }
  }

  /**
   * Validate the current configuration
   * Checks connectivity to MySQL and S3
   */
  async validateConfiguration(): Promise<boolean> {
    this.logger.info('Testing MySQL connection...');
    if (!(await this.mysqlClient.testConnection())) {
      return false;
    }

    this.logger.info('Testing S3 connection...');
    if (!(await this.s3Client.testConnection())) {
      return false;
    }

    this.logger.info('Connection checks passed');
    return true;
  }

  async abort(): Promise<void> {
    await this.cleanup();
  }

  /**
   * The configured database list, or every non-system database on the server for ALL
   */
  private async resolveTargets(): Promise<BackupTarget[]> {
    let names: string[];

    if (this.config.databases.mode === 'list') {
      names = this.config.databases.names;
    } else {
      try {
        names = await this.mysqlClient.listDatabases();
      } catch (error) {
        this.logger.error('Failed to list databases', toError(error));
        names = [];
      }
    }

    if (names.length === 0) {
      throw new EmptyTargetSetError('No databases found to back up.');
    }

    return names.map(databaseName => ({ databaseName }));
  }

  /**
   * Back up each target in order; one database finishes before the next starts
   */
  private processTargets(targets: readonly BackupTarget[], workDir: string): Promise<DatabaseOutcome[]> {
    return targets.reduce<Promise<DatabaseOutcome[]>>(async (previous, target) => {
      const outcomes = await previous;
      return [...outcomes, await this.backupDatabase(target, workDir)];
    }, Promise.resolve([]));
  }

  /**
   * Dump, upload and prune one database. Never rejects: failures become outcomes.
   */
  private async backupDatabase(target: BackupTarget, workDir: string): Promise<DatabaseOutcome> {
    const { databaseName } = target;
    const fileName = renderBackupName(this.config.backupNamePattern, databaseName, this.clock(), this.hostname);
    const s3Key = buildArtifactKey(this.config.s3Path, databaseName, fileName);
    const localPath = join(workDir, fileName);

    this.logger.logDatabaseStart(databaseName, `s3://${this.config.s3Bucket}/${s3Key}`);

    let stage: BackupStage = 'dump';
    try {
      const backupInfo = await this.mysqlClient.createBackup(databaseName, localPath);
      this.logger.info(`Dump complete: ${fileName} (${formatBytes(backupInfo.fileSize)})`);

      stage = 'upload';
      const location = await this.s3Client.uploadFile(localPath, s3Key);
      this.logger.info(`Uploaded to ${location}`);
    } catch (error) {
      this.logger.logDatabaseFailure(databaseName, stage, toError(error));
      return { target, succeeded: false, failedStage: stage, errorDetail: formatError(error) };
    } finally {
      await this.removeFile(localPath);
    }

    let prunedCount = 0;
    try {
      const retention = await this.retentionManager.pruneDatabase(databaseName);
      prunedCount = retention.deletedCount;
    } catch (error) {
      this.logger.warn(`Retention cleanup failed for ${databaseName} (backup still successful): ${formatError(error)}`);
    }

    return { target, succeeded: true, s3Key, prunedCount };
  }

  private async abortRun(error: unknown, startTime: number): Promise<RunReport> {
    let notification: string;

    if (error instanceof PreflightError) {
      this.logger.fatal(`${error.message}. Install the MySQL client tools and retry.`, error);
      notification = `MySQL Backup FAILED on ${this.hostname}: '${error.command}' not installed.`;
    } else if (error instanceof EmptyTargetSetError) {
      this.logger.fatal(error.message);
      notification = `MySQL Backup FAILED on ${this.hostname}: no databases found.`;
    } else {
      this.logger.fatal('Backup run aborted', toError(error));
      notification = `MySQL Backup FAILED on ${this.hostname}: run aborted. Check ${this.config.logFile}.`;
    }

    await this.notifier.notify(notification);
    return { status: 'aborted', reason: formatError(error), duration: Date.now() - startTime };
  }

  private async removeFile(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true }).catch(error => {
      this.logger.warn(`Failed to cleanup temporary file ${filePath}: ${formatError(error)}`);
    });
  }

  /**
   * Remove the working directory and release the lock; safe to call more than once
   */
  private async cleanup(): Promise<void> {
    const workDir = this.workDir;
    this.workDir = null;

    if (workDir) {
      await fs.rm(workDir, { recursive: true, force: true }).catch(error => {
        this.logger.warn(`Failed to remove working directory ${workDir}: ${formatError(error)}`);
      });
    }

    await this.runLock.release();
  }
}
