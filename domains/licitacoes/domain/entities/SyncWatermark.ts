import type { DateWindow } from '../dates';

/**
* Last fully stored and indexed page of a window that has not finished yet
*/
export interface SyncCursor extends DateWindow {
  pagina: number;
}

/**
* SyncWatermark - Immutable per-modality sync progress
*
* `lastSyncedDate` is the end of the last completed window and never moves
* backwards. `cursor` lets an interrupted window resume after its last
* completed page.
*/
export class SyncWatermark {
  private constructor(
    public readonly modalidade: number,
    public readonly lastSyncedDate: string | null,
    public readonly cursor: SyncCursor | null,
    public readonly updatedAt: Date
  ) {}

  /**
  * Watermark of a modality that has never been synchronized
  */
  static initial(modalidade: number, now: Date = new Date()): SyncWatermark {
    return new SyncWatermark(modalidade, null, null, now);
  }

  /**
  * Reconstitute from persistence
  */
  static reconstitute(
    modalidade: number,
    lastSyncedDate: string | null,
    cursor: SyncCursor | null,
    updatedAt: Date
  ): SyncWatermark {
    return new SyncWatermark(modalidade, lastSyncedDate, cursor ? { ...cursor } : null, updatedAt);
  }

  /**
  * First page to fetch for a window
  */
  resumePageFor(window: DateWindow): number {
    if (
      this.cursor &&
      this.cursor.dataInicial === window.dataInicial &&
      this.cursor.dataFinal === window.dataFinal
    ) {
      return this.cursor.pagina + 1;
    }
    return 1;
  }

  /**
  * Record a completed page
  */
  withPageCompleted(window: DateWindow, pagina: number, now: Date = new Date()): SyncWatermark {
    return new SyncWatermark(
      this.modalidade,
      this.lastSyncedDate,
      { dataInicial: window.dataInicial, dataFinal: window.dataFinal, pagina },
      now
    );
  }

  /**
  * Record a completed window: advance the date (never backwards) and drop the cursor
  */
  withWindowCompleted(window: DateWindow, now: Date = new Date()): SyncWatermark {
    const next = this.lastSyncedDate !== null && this.lastSyncedDate > window.dataFinal
      ? this.lastSyncedDate
      : window.dataFinal;
    return new SyncWatermark(this.modalidade, next, null, now);
  }

  /**
  * Drop the cursor without advancing the date, so the window is fetched again
  */
  withCursorCleared(now: Date = new Date()): SyncWatermark {
    return new SyncWatermark(this.modalidade, this.lastSyncedDate, null, now);
  }

  toJSON(): { modalidade: number; lastSyncedDate: string | null; cursor: SyncCursor | null; updatedAt: string } {
    return {
      modalidade: this.modalidade,
      lastSyncedDate: this.lastSyncedDate,
      cursor: this.cursor,
      updatedAt: this.updatedAt.toISOString(),
    };
  }
}
