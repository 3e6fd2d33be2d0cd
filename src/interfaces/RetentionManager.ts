/**
 * Result of a retention cleanup operation
 */
export interface RetentionResult {
  /** Number of backups that were deleted */
  deletedCount: number;

  /** Total number of backups found */
  totalCount: number;

  /** List of deleted backup keys */
  deletedKeys: string[];

  /** Any errors encountered during listing or deletion */
  errors: string[];
}

/**
 * Interface for managing count-based backup retention
 */
export interface RetentionManager {
  /**
   * Delete the oldest artifacts of a database beyond the retention count.
   * Never rejects; problems are reported in the result.
   */
  pruneDatabase(databaseName: string): Promise<RetentionResult>;
}
