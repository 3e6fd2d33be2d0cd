export type LockAcquisition = { acquired: true } | { acquired: false; ownerPid: number | null };

/**
 * Process-wide mutual exclusion between overlapping backup runs
 */
export interface RunLock {
  /** Take the lock, reclaiming it when its recorded owner is no longer alive */
  acquire(): Promise<LockAcquisition>;

  /** Release the lock if this process holds it */
  release(): Promise<void>;
}
