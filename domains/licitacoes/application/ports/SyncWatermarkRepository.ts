import type { SyncWatermark } from '../../domain/entities/SyncWatermark';

/**
* Persistence of per-modality sync progress, read and written only by the
* sync orchestrator.
*/
export interface SyncWatermarkRepository {
  /**
  * @returns The stored watermark, or null for a modality never synchronized
  */
  get(modalidade: number): Promise<SyncWatermark | null>;

  save(watermark: SyncWatermark): Promise<void>;
}
