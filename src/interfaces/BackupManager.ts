import { BackupStage } from './Logger';

/**
 * A database selected for backup in a given run
 */
export interface BackupTarget {
  databaseName: string;
}

/**
 * Result of backing up a single database
 */
export interface DatabaseOutcome {
  target: BackupTarget;

  succeeded: boolean;

  /** Stage that failed, when the database did not succeed */
  failedStage?: BackupStage;

  /** Formatted cause of the failure; only ever written to the log */
  errorDetail?: string;

  /** Storage key of the uploaded artifact */
  s3Key?: string;

  /** Number of older artifacts pruned after the upload */
  prunedCount?: number;
}

export interface RunSummary {
  total: number;
  failed: number;
  outcomes: DatabaseOutcome[];
}

/**
 * How a run ended
 */
export type RunReport =
  | { status: 'skipped'; ownerPid: number | null }
  | { status: 'aborted'; reason: string; duration: number }
  | { status: 'completed'; summary: RunSummary; duration: number };

/**
 * Interface for the run coordinator
 */
export interface BackupManager {
  /** Execute one complete backup cycle across all targets */
  executeBackup(): Promise<RunReport>;

  /** Check connectivity to the database server and the bucket */
  validateConfiguration(): Promise<boolean>;

  /** Remove the working directory and release the run lock, if held */
  abort(): Promise<void>;
}
