/**
 * Scan Analysis Pipeline
 *
 * validate -> digest -> correction override -> reusable match -> dog gate
 * -> consensus -> store -> persist -> enqueue age simulation
 */

import crypto from "crypto";
import {
  PredictionMethod,
  emptySimulationData,
  type BreedCorrection,
  type InsertScanResult,
  type ScanResult,
  type SimulationData,
} from "@shared/schema";
import { AppError, ErrorCode, NotADogError } from "./error-handling";
import { bestEffort, failOpen } from "./policies";
import { computeImageDigest, type ContentHashCache } from "./content-hash";
import { toAnalysisJpeg, validateUpload, type ValidatedImage } from "./image-validation";
import { scanImagePath, type BlobStore } from "./blob-storage";
import type { BreedConsensusEngine } from "./breed-consensus";
import type { BreedIdentifier, IdentifierHint } from "./breed-identifier";
import type { CorrectionService } from "./corrections";
import type { AgeSimulationQueue } from "./age-simulation-queue";
import type { ScanRecords } from "./scan-records";
import type { IStorage } from "./storage";

export type AnalysisSource = 'correction' | 'cache' | 'analysis';

export interface AnalyzeRequest {
  buffer: Buffer;
  fileName?: string;
  userId: number | null;
}

export interface AnalyzeOutcome {
  record: ScanResult;
  source: AnalysisSource;
}

export interface ScanPipelineDeps {
  storage: IStorage;
  records: ScanRecords;
  blobs: BlobStore;
  hashCache: ContentHashCache;
  corrections: CorrectionService;
  consensus: BreedConsensusEngine;
  identifier: BreedIdentifier;
  queue: AgeSimulationQueue;
  newScanId?: () => string;
}

/**
 * A finished simulation is shared with the new record; anything else is redone
 */
function inheritedSimulation(prior: ScanResult | undefined): SimulationData | null {
  if (!prior || prior.simulationData.status !== 'complete') return null;
  return structuredClone(prior.simulationData);
}

export class ScanPipeline {
  private readonly newScanId: () => string;

  constructor(private readonly deps: ScanPipelineDeps) {
    this.newScanId = deps.newScanId ?? (() => crypto.randomUUID());
  }

  async analyze(request: AnalyzeRequest): Promise<AnalyzeOutcome> {
    const image = await validateUpload(request.buffer);
    const digest = computeImageDigest(image.buffer);

    const correction = await this.deps.corrections.findCorrection(digest);
    if (correction) {
      return { record: await this.fromCorrection(request, image, digest, correction), source: 'correction' };
    }

    const reusable = await this.deps.hashCache.findReusable(digest);
    if (reusable) {
      return { record: await this.fromExactMatch(request, image, digest, reusable), source: 'cache' };
    }

    return { record: await this.runAnalysis(request, image, digest), source: 'analysis' };
  }

  // Idempotent per digest; the rewrite restores a file a concurrent delete removed
  private async store(image: ValidatedImage, digest: string): Promise<string> {
    const path = scanImagePath(digest, image.contentType);
    await this.deps.blobs.put(path, image.stored, image.contentType);
    return path;
  }

  private async persist(scan: InsertScanResult, simulationInherited: boolean): Promise<ScanResult> {
    const record = await this.deps.storage.createScanResult(scan);
    if (!simulationInherited) {
      this.deps.queue.enqueue(record.scanId);
    }
    return record;
  }

  // Human answer wins; no model is consulted
  private async fromCorrection(
    request: AnalyzeRequest,
    image: ValidatedImage,
    digest: string,
    correction: BreedCorrection,
  ): Promise<ScanResult> {
    const prior = await this.deps.storage.getScanResult(correction.scanId)
      ?? await this.deps.hashCache.lookup(digest);
    const imagePath = await this.store(image, digest);
    const simulation = inheritedSimulation(prior);

    console.log(`[ScanPipeline] Correction match for ${digest.slice(0, 8)}...: ${correction.correctedBreed}`);
    return this.persist({
      scanId: this.newScanId(),
      userId: request.userId,
      imagePath,
      imageHash: digest,
      breed: correction.correctedBreed,
      confidence: 100,
      topPredictions: prior?.topPredictions ?? [],
      verificationStatus: 'verified',
      predictionMethod: PredictionMethod.ADMIN_CORRECTED,
      description: prior?.description ?? null,
      originHistory: prior?.originHistory ?? null,
      healthRisks: prior?.healthRisks ?? null,
      simulationData: simulation ?? { ...emptySimulationData('queued'), dog_features: prior?.simulationData.dog_features },
    }, simulation !== null);
  }

  private async fromExactMatch(
    request: AnalyzeRequest,
    image: ValidatedImage,
    digest: string,
    match: ScanResult,
  ): Promise<ScanResult> {
    const imagePath = await this.store(image, digest);
    const simulation = inheritedSimulation(match);

    console.log(`[ScanPipeline] Exact match for ${digest.slice(0, 8)}...: ${match.breed} (${match.confidence}%)`);
    return this.persist({
      scanId: this.newScanId(),
      userId: request.userId,
      imagePath,
      imageHash: digest,
      breed: match.breed,
      confidence: match.verificationStatus === 'verified' ? 100 : match.confidence,
      topPredictions: match.topPredictions,
      verificationStatus: match.verificationStatus,
      predictionMethod: PredictionMethod.EXACT_MATCH,
      description: match.description,
      originHistory: match.originHistory,
      healthRisks: match.healthRisks,
      simulationData: simulation ?? { ...emptySimulationData('queued'), dog_features: match.simulationData.dog_features },
    }, simulation !== null);
  }

  private async runAnalysis(request: AnalyzeRequest, image: ValidatedImage, digest: string): Promise<ScanResult> {
    const analysisImage = await toAnalysisJpeg(image.buffer);

    const isDog = await failOpen('Dog check', () => this.deps.identifier.isDog(analysisImage), true);
    if (!isDog) {
      console.log(`[ScanPipeline] No dog in ${digest.slice(0, 8)}..., rejecting`);
      throw new NotADogError();
    }

    // A low-quality earlier answer still helps when the classifier is down
    const earlier = await this.deps.hashCache.lookup(digest);
    const hint: IdentifierHint | null = earlier ? { breed: earlier.breed, confidence: earlier.confidence } : null;

    const result = await this.deps.consensus.analyze({ image: analysisImage, fileName: request.fileName, hint });
    const imagePath = await this.store(image, digest);

    return this.persist({
      scanId: this.newScanId(),
      userId: request.userId,
      imagePath,
      imageHash: digest,
      breed: result.breed,
      confidence: result.confidence,
      topPredictions: result.topPredictions,
      verificationStatus: 'pending',
      predictionMethod: result.method,
      description: result.description,
      originHistory: result.originHistory,
      healthRisks: result.healthRisks,
      simulationData: { ...emptySimulationData('queued'), dog_features: result.dogFeatures },
    }, false);
  }

  /**
   * Unconditional reset to queued. A job still running for this scan is
   * superseded by the queue and writes no final status.
   */
  async regenerateSimulation(scanId: string): Promise<SimulationData> {
    const record = await this.deps.records.get(scanId);
    if (!record) {
      throw new AppError(ErrorCode.SCAN_NOT_FOUND, undefined, { scanId });
    }

    const previous = [record.simulationData['1_years'], record.simulationData['3_years']]
      .filter((path): path is string => Boolean(path));

    const updated = await this.deps.records.updateSimulation(scanId, (current) => ({
      ...current,
      status: 'queued',
      '1_years': null,
      '3_years': null,
      error: null,
    }), { force: true });
    if (!updated) {
      throw new AppError(ErrorCode.SCAN_NOT_FOUND, undefined, { scanId });
    }

    await this.removeUnreferenced(previous);
    this.deps.queue.enqueue(scanId);
    console.log(`[ScanPipeline] Regenerating simulation for ${scanId}`);
    return updated.simulationData;
  }

  async deleteScan(scanId: string): Promise<void> {
    const record = await this.deps.records.get(scanId);
    if (!record) {
      throw new AppError(ErrorCode.SCAN_NOT_FOUND, undefined, { scanId });
    }
    await this.deps.records.delete(scanId);
    const paths = [record.imagePath, record.simulationData['1_years'], record.simulationData['3_years']]
      .filter((path): path is string => Boolean(path));
    await this.removeUnreferenced(Array.from(new Set(paths)));
  }

  // Only paths no remaining record points at
  private async removeUnreferenced(paths: string[]): Promise<void> {
    for (const path of paths) {
      if (await this.deps.storage.countScansReferencingPath(path) > 0) continue;
      await bestEffort(`Deleting ${path}`, () => this.deps.blobs.delete(path));
    }
  }
}
