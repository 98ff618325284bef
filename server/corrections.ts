import type { BreedCorrection, InsertNotification, ScanResult, TeachingStatus } from "@shared/schema";
import { AppError, ErrorCode, toAppError } from "./error-handling";
import { bestEffort } from "./policies";
import { CACHE_TTL, cache, cacheKeys } from "./cache-service";
import { toAnalysisJpeg } from "./image-validation";
import type { BlobStore } from "./blob-storage";
import type { BreedClassifier } from "./classifier-client";
import type { IStorage } from "./storage";
import type { ScanRecords } from "./scan-records";

export const TRAINING_QUEUE_SIZE = 6;

export interface TeachingReport {
  status: TeachingStatus;
  message: string;
  failed: boolean;
}

export interface CorrectionOutcome {
  correction: BreedCorrection;
  scan: ScanResult;
  teaching: TeachingReport;
  message: string;
}

export interface TrainingQueue {
  scans: ScanResult[];
  corrections: BreedCorrection[];
  stats: {
    pending: number;
    added: number;
  };
}

function correctionNotification(scan: ScanResult, correctedBreed: string): InsertNotification | null {
  if (scan.userId === null) return null;
  return {
    userId: scan.userId,
    type: 'scan_verified',
    title: 'Your scan was verified',
    message: `A reviewer confirmed the breed in your scan as ${correctedBreed}.`,
    data: { scanId: scan.scanId, breed: correctedBreed },
  };
}

function outcomeMessage(teaching: TeachingReport): string {
  if (teaching.failed) {
    return 'Correction saved, but the classifier could not learn from it. Retry teaching from the corrections list.';
  }
  if (teaching.status === 'skipped') {
    return 'Correction saved. The classifier already knew this image.';
  }
  return 'Correction saved and the classifier learned from it.';
}

/**
 * Human breed corrections. Saving a correction and teaching the classifier
 * are separate steps: the first is transactional, the second best-effort.
 */
export class CorrectionService {
  constructor(
    private readonly storage: IStorage,
    private readonly records: ScanRecords,
    private readonly blobs: BlobStore,
    private readonly classifier: BreedClassifier,
  ) {}

  findCorrection(imageHash: string): Promise<BreedCorrection | undefined> {
    return this.storage.getLatestCorrectionByImageHash(imageHash);
  }

  async correctBreed(scanId: string, correctedBreed: string): Promise<CorrectionOutcome> {
    const scan = await this.storage.getScanResult(scanId);
    if (!scan) {
      throw new AppError(ErrorCode.SCAN_NOT_FOUND, undefined, { scanId });
    }

    const breed = correctedBreed.trim();
    const written = await this.storage.applyCorrection({
      correction: {
        scanId: scan.scanId,
        imagePath: scan.imagePath,
        imageHash: scan.imageHash,
        originalBreed: scan.breed,
        correctedBreed: breed,
        confidence: scan.confidence,
        status: 'pending',
        teachingMessage: null,
      },
      notification: correctionNotification(scan, breed),
    });
    // Deleted between the read and the write
    if (!written) {
      throw new AppError(ErrorCode.SCAN_NOT_FOUND, undefined, { scanId });
    }
    this.records.invalidate(scanId);
    console.log(`[Corrections] ${scanId}: ${scan.breed} -> ${breed}`);

    const teaching = await this.teach(written.correction);
    return {
      correction: { ...written.correction, status: teaching.status, teachingMessage: teaching.message },
      scan: written.scan,
      teaching,
      message: outcomeMessage(teaching),
    };
  }

  /**
   * Submit a correction to the classifier and record how it went
   */
  async teach(correction: BreedCorrection): Promise<TeachingReport> {
    const outcome = await bestEffort(`Teaching ${correction.correctedBreed} from ${correction.scanId}`, async () => {
      const original = await this.blobs.get(correction.imagePath);
      const image = await toAnalysisJpeg(original);
      return this.classifier.learn(image, correction.correctedBreed, `${correction.scanId}.jpg`);
    });

    const report: TeachingReport = outcome.ok
      ? { status: outcome.value.status, message: outcome.value.message, failed: false }
      : { status: 'error', message: toAppError(outcome.error).message, failed: true };

    // The correction itself is already committed
    await bestEffort(
      `Recording teaching status for correction ${correction.id}`,
      () => this.storage.updateCorrectionTeaching(correction.id, report.status, report.message),
    );
    return report;
  }

  async reteach(id: number): Promise<{ correction: BreedCorrection; teaching: TeachingReport }> {
    const correction = await this.storage.getCorrection(id);
    if (!correction) {
      throw new AppError(ErrorCode.CORRECTION_NOT_FOUND, undefined, { id });
    }
    const teaching = await this.teach(correction);
    return {
      correction: { ...correction, status: teaching.status, teachingMessage: teaching.message },
      teaching,
    };
  }

  list(): Promise<BreedCorrection[]> {
    return this.storage.getCorrections();
  }

  // The scan stays verified
  async delete(id: number): Promise<void> {
    const deleted = await this.storage.deleteCorrection(id);
    if (!deleted) {
      throw new AppError(ErrorCode.CORRECTION_NOT_FOUND, undefined, { id });
    }
  }

  async trainingQueue(): Promise<TrainingQueue> {
    const [scans, corrections, pending, added] = await Promise.all([
      this.storage.getUncorrectedScans(TRAINING_QUEUE_SIZE),
      this.storage.getCorrections(),
      this.storage.countUncorrectedScans(),
      this.storage.countCorrections(),
    ]);
    return { scans, corrections, stats: { pending, added } };
  }

  async classifierStats(): Promise<Record<string, unknown>> {
    const { data } = await cache.getOrFetch(
      cacheKeys.classifierStats(),
      () => this.classifier.getMemoryStats(),
      CACHE_TTL.classifierStats,
    );
    return data;
  }
}
