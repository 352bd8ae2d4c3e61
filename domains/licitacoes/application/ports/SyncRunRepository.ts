import type { SyncRunOutcome } from '../SyncRunOutcome';

/**
* Append-only log of sync run outcomes
*/
export interface SyncRunRepository {
  record(outcome: SyncRunOutcome): Promise<void>;

  /**
  * Most recent outcomes, newest first
  */
  listRecent(limit: number): Promise<SyncRunOutcome[]>;
}
