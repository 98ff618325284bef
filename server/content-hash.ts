import crypto from "crypto";
import { PredictionMethod, type ScanResult } from "@shared/schema";
import type { IStorage } from "./storage";

// A reused answer must either come from the full engine or be confident
export const REUSE_CONFIDENCE_THRESHOLD = 85;

// Classifier-only answers and records with no method tag
const LOW_QUALITY_METHODS = new Set<string | null>([
  PredictionMethod.MODEL,
  PredictionMethod.MEMORY,
  null,
]);

export function computeImageDigest(bytes: Buffer): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

export function isReusable(record: Pick<ScanResult, 'predictionMethod' | 'confidence' | 'verificationStatus'>): boolean {
  if (record.verificationStatus === 'verified') return true;
  return !LOW_QUALITY_METHODS.has(record.predictionMethod) || record.confidence >= REUSE_CONFIDENCE_THRESHOLD;
}

export class ContentHashCache {
  constructor(private readonly storage: IStorage) {}

  lookup(digest: string): Promise<ScanResult | undefined> {
    return this.storage.getLatestScanByImageHash(digest);
  }

  /**
   * Latest record for the digest, only when it may be reused as-is
   */
  async findReusable(digest: string): Promise<ScanResult | undefined> {
    const record = await this.lookup(digest);
    if (!record) return undefined;
    if (!isReusable(record)) {
      console.log(`[ContentHash] Low-quality match for ${digest.slice(0, 8)}... (${record.predictionMethod ?? 'unknown'}, ${record.confidence}%), re-running analysis`);
      return undefined;
    }
    return record;
  }
}
