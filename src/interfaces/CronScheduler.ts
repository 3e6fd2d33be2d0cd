/**
 * Interface for interval-based backup scheduling
 */
export interface CronScheduler {
  /** Start the cron scheduler with the configured interval */
  start(): void;

  /** Stop the cron scheduler */
  stop(): void;

  /** Check if the scheduler is currently running */
  isRunning(): boolean;
}

/**
 * Configuration for the cron scheduler
 */
export interface CronSchedulerConfig {
  /** Hours between the start of one backup run and the next */
  intervalHours: number;

  /** Timezone for cron execution (defaults to UTC) */
  timezone?: string;

  /** Whether to run immediately on start */
  runOnInit?: boolean;

  /** Time source, replaceable in tests */
  clock?: () => Date;
}
