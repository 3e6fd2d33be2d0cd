import * as cron from 'node-cron';
import { CronScheduler as ICronScheduler, CronSchedulerConfig } from '../interfaces/CronScheduler';
import { BackupManager } from '../interfaces/BackupManager';
import { Logger } from '../interfaces/Logger';
import { formatError, toError } from '../utils/errors';

/**
 * Custom error classes for cron scheduling operations
 */
export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/** node-cron expression for the hourly tick that checks whether a backup is due */
export const HOURLY_TICK = '0 * * * *';

const HOUR_MS = 60 * 60 * 1000;

// Half a tick of slack so a run started a few milliseconds late still counts as on time
const DUE_TOLERANCE_MS = HOUR_MS / 2;

/**
 * CronScheduler implementation using node-cron library.
 * node-cron ticks every hour; a backup runs once the configured number of hours
 * has passed since the previous run (or since start, before the first one).
 * Ticks are skipped while a run is still in progress.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private config: CronSchedulerConfig;
  private backupManager: BackupManager;
  private isBackupRunning = false;
  private logger: Logger;
  private clock: () => Date;
  private lastRunAt = 0;

  constructor(config: CronSchedulerConfig, backupManager: BackupManager, logger: Logger) {
    this.config = config;
    this.backupManager = backupManager;
    this.logger = logger;
    this.clock = config.clock ?? (() => new Date());
  }

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    const timezone = this.config.timezone || 'UTC';
    this.logger.info(`Starting cron scheduler: every ${this.config.intervalHours} hour(s) (timezone: ${timezone})`);

    try {
      this.task = cron.schedule(HOURLY_TICK, () => this.onTick(), {
        scheduled: false,
        timezone,
      });
      this.task.start();
    } catch (error) {
      throw new CronSchedulerError(
        `Failed to start cron scheduler: ${formatError(error)}`,
        'start',
        toError(error)
      );
    }

    this.lastRunAt = this.clock().getTime();
    this.logger.info('CronScheduler started successfully');

    if (this.config.runOnInit) {
      this.logger.info('Running initial backup due to runOnInit configuration');
      setImmediate(() => {
        void this.runScheduledBackup();
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped successfully');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * Whether the configured interval has passed since the previous run
   */
  isDue(now: Date): boolean {
    const elapsed = now.getTime() - this.lastRunAt;
    return elapsed >= this.config.intervalHours * HOUR_MS - DUE_TOLERANCE_MS;
  }

  private onTick(): void {
    const now = this.clock();
    if (!this.isDue(now)) {
      return;
    }

    this.lastRunAt = now.getTime();
    this.logger.logScheduledExecution(this.config.intervalHours);
    void this.runScheduledBackup();
  }

  /**
   * Execute one backup run; never rejects
   */
  async runScheduledBackup(): Promise<void> {
    // Prevent overlapping backups
    if (this.isBackupRunning) {
      this.logger.warn('Backup is already running, skipping this scheduled execution');
      return;
    }

    this.isBackupRunning = true;

    try {
      const report = await this.backupManager.executeBackup();

      switch (report.status) {
        case 'completed':
          this.logger.info(
            `Scheduled backup finished in ${report.duration}ms: ${report.summary.total - report.summary.failed}/${report.summary.total} databases succeeded`
          );
          break;
        case 'aborted':
          this.logger.error(`Scheduled backup aborted after ${report.duration}ms: ${report.reason}`);
          break;
        case 'skipped':
          this.logger.info(`Scheduled backup skipped; run held by PID ${report.ownerPid ?? 'unknown'}`);
          break;
      }
    } catch (error) {
      this.logger.error('Unexpected error in scheduled backup execution', toError(error));
    } finally {
      this.isBackupRunning = false;
    }
  }
}
