import type { ScanResult, SimulationData } from "@shared/schema";
import type { ScanResultResponse, SimulationStatusResponse } from "@shared/routes";
import { canTransition, getSimulationProgress } from "@shared/simulation";
import { CACHE_TTL, cache as defaultCache, cacheKeys, type CacheService } from "./cache-service";
import type { BlobStore } from "./blob-storage";
import type { IStorage } from "./storage";

export interface SimulationUpdateOptions {
  // Regenerate is the only caller allowed to move a record backwards
  force?: boolean;
}

/**
 * Targeted writes to scan records. Only the simulation block is ever
 * rewritten here. Every write drops the cached status response for that
 * scan so pollers see it on their next request.
 */
export class ScanRecords {
  constructor(
    private readonly storage: IStorage,
    private readonly blobs: BlobStore,
    private readonly statusCache: CacheService = defaultCache,
  ) {}

  get(scanId: string): Promise<ScanResult | undefined> {
    return this.storage.getScanResult(scanId);
  }

  invalidate(scanId: string): void {
    this.statusCache.delete(cacheKeys.simulationStatus(scanId));
  }

  /**
   * Re-reads the simulation block, applies the change and writes the whole block back.
   * A change that would move the status backwards is dropped.
   */
  async updateSimulation(
    scanId: string,
    change: (current: SimulationData) => SimulationData,
    options: SimulationUpdateOptions = {},
  ): Promise<ScanResult | undefined> {
    const current = await this.storage.getScanResult(scanId);
    if (!current) return undefined;

    const next = change(current.simulationData);
    if (!options.force && !canTransition(current.simulationData.status, next.status)) {
      console.warn(`[ScanRecords] Ignoring simulation move ${current.simulationData.status} -> ${next.status} for ${scanId}`);
      return undefined;
    }

    const updated = await this.storage.updateScanResult(scanId, { simulationData: next });
    this.invalidate(scanId);
    return updated;
  }

  async delete(scanId: string): Promise<boolean> {
    const deleted = await this.storage.deleteScanResult(scanId);
    this.invalidate(scanId);
    return deleted;
  }

  toResponse(record: ScanResult): ScanResultResponse {
    const sim = record.simulationData;
    return {
      scan_id: record.scanId,
      breed: record.breed,
      confidence: record.confidence,
      top_predictions: record.topPredictions,
      verification_status: record.verificationStatus,
      prediction_method: record.predictionMethod,
      description: record.description,
      origin_history: record.originHistory,
      health_risks: record.healthRisks,
      image: record.imagePath ? this.blobs.publicUrl(record.imagePath) : null,
      simulation: {
        status: sim.status,
        '1_years': this.urlOrNull(sim['1_years']),
        '3_years': this.urlOrNull(sim['3_years']),
        breed_profile: sim.breed_profile,
        error: sim.error,
      },
      created_at: record.createdAt.toISOString(),
    };
  }

  /**
   * Polling payload, cached for a few seconds per scan
   */
  async getSimulationStatus(scanId: string): Promise<SimulationStatusResponse | undefined> {
    const key = cacheKeys.simulationStatus(scanId);
    const cached = this.statusCache.get<SimulationStatusResponse>(key);
    if (cached) return cached;

    const record = await this.storage.getScanResult(scanId);
    if (!record) return undefined;

    const sim = record.simulationData;
    const status: SimulationStatusResponse = {
      status: sim.status,
      simulations: {
        '1_years': this.urlOrNull(sim['1_years']),
        '3_years': this.urlOrNull(sim['3_years']),
      },
      original_image: record.imagePath ? this.blobs.publicUrl(record.imagePath) : null,
      breed: record.breed,
      scan_id: record.scanId,
      timestamp: Date.now(),
      progress: getSimulationProgress(sim),
      breed_profile: sim.breed_profile,
      error: sim.error,
    };
    this.statusCache.set(key, status, CACHE_TTL.simulationStatus);
    return status;
  }

  private urlOrNull(path: string | null): string | null {
    return path ? this.blobs.publicUrl(path) : null;
  }
}
