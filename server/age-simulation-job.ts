/**
 * Age Simulation Job
 *
 * Generates the 1-year and 3-year variants of one scan. Both variants are
 * requested together and joined with allSettled, so one failing never
 * cancels the other. Failed variants are retried alone. Finished variants
 * are saved as they land, and a rerun after a timeout starts from them.
 */

import { ageTargets, type AgeTarget, type ScanResult, type SimulationData } from "@shared/schema";
import { getBreedProfile } from "@shared/breedProfiles";
import { CACHE_TTL, cache as defaultCache, cacheKeys, type CacheService } from "./cache-service";
import { errorMessage } from "./error-handling";
import { openImage } from "./image-validation";
import { simulationImagePath, type BlobStore } from "./blob-storage";
import { buildAgeInstruction, currentAgeFromFeatures, renderAgePrompt } from "./age-prompts";
import { sleep as defaultSleep, type Sleep } from "./retry-strategy";
import type { ImageGenerator } from "./image-generator";
import type { ScanRecords } from "./scan-records";

export const VARIANT_ATTEMPTS = 3;
export const PAYLOAD_MAX_DIMENSION = 1024;
export const NO_VARIANTS_ERROR = 'We couldn\'t generate the age simulation images. You can regenerate them from the results page.';

export type JobOutcome = 'complete' | 'failed' | 'skipped';

export interface AgeSimulationJobDeps {
  records: ScanRecords;
  blobs: BlobStore;
  generator: ImageGenerator;
  sleep?: Sleep;
  payloadCache?: CacheService;
}

// 2s before the second attempt, 4s before the third
export function variantRetryDelayMs(attempt: number): number {
  return Math.pow(2, attempt - 1) * 1000;
}

/**
 * Worst case for one variant: every attempt runs to the generation timeout.
 */
export function variantBudgetMs(generationTimeoutMs: number): number {
  let budget = VARIANT_ATTEMPTS * generationTimeoutMs;
  for (let attempt = 2; attempt <= VARIANT_ATTEMPTS; attempt++) {
    budget += variantRetryDelayMs(attempt);
  }
  return budget;
}

export class AgeSimulationJob {
  private readonly sleep: Sleep;
  private readonly payloadCache: CacheService;

  constructor(private readonly deps: AgeSimulationJobDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.payloadCache = deps.payloadCache ?? defaultCache;
  }

  /**
   * Normalized JPEG sent to generation, shared by every record with the same bytes
   */
  async preparePayload(record: Pick<ScanResult, 'imageHash' | 'imagePath'>): Promise<Buffer> {
    const { data } = await this.payloadCache.getOrFetch(
      cacheKeys.simulationPayload(record.imageHash),
      async () => {
        const original = await this.deps.blobs.get(record.imagePath);
        return openImage(original)
          .rotate()
          .resize(PAYLOAD_MAX_DIMENSION, PAYLOAD_MAX_DIMENSION, { fit: 'inside', withoutEnlargement: true })
          .flatten({ background: '#ffffff' })
          .jpeg({ quality: 90 })
          .toBuffer();
      },
      CACHE_TTL.simulationPayload,
    );
    return data;
  }

  private async generateVariant(target: AgeTarget, payload: Buffer, prompt: string, signal?: AbortSignal): Promise<string> {
    const png = await this.deps.generator.generate(payload, prompt, signal);
    signal?.throwIfAborted();
    const path = simulationImagePath(target);
    await this.deps.blobs.put(path, png, 'image/png');
    return path;
  }

  // Variants saved by an earlier, interrupted run of this job
  private async savedVariants(data: SimulationData): Promise<Record<AgeTarget, string | null>> {
    const paths: Record<AgeTarget, string | null> = { '1_years': null, '3_years': null };
    for (const target of ageTargets) {
      const path = data[target];
      if (path && await this.deps.blobs.exists(path)) {
        paths[target] = path;
      }
    }
    return paths;
  }

  /**
   * Errors from payload preparation or storage propagate; the queue records them.
   */
  async run(scanId: string, signal?: AbortSignal): Promise<JobOutcome> {
    signal?.throwIfAborted();
    const record = await this.deps.records.get(scanId);
    if (!record) {
      console.warn(`[AgeSimulation] ${scanId} no longer exists, skipping`);
      return 'skipped';
    }

    const features = record.simulationData.dog_features;
    const profile = getBreedProfile(record.breed, currentAgeFromFeatures(features));

    const started = await this.deps.records.updateSimulation(scanId, (current) => ({
      ...current,
      status: 'generating',
      breed_profile: profile,
      error: null,
    }));
    if (!started) {
      console.warn(`[AgeSimulation] ${scanId} is ${record.simulationData.status}, skipping`);
      return 'skipped';
    }

    const payload = await this.preparePayload(record);
    const prompts: Record<AgeTarget, string> = {
      '1_years': renderAgePrompt(buildAgeInstruction(record.breed, profile, '1_years', features)),
      '3_years': renderAgePrompt(buildAgeInstruction(record.breed, profile, '3_years', features)),
    };

    const paths = await this.savedVariants(record.simulationData);

    // Each variant is written as soon as it lands; writes are serialized
    // because each one rewrites the whole block
    let saving: Promise<unknown> = Promise.resolve();
    const saveVariant = (target: AgeTarget, path: string) => {
      const write = saving.then(() => this.deps.records.updateSimulation(scanId, (current) => {
        const next = { ...current };
        next[target] = path;
        return next;
      }));
      saving = write.catch(() => undefined);
      return write;
    };

    for (let attempt = 1; attempt <= VARIANT_ATTEMPTS; attempt++) {
      const missing = ageTargets.filter(target => paths[target] === null);
      if (missing.length === 0) break;

      if (attempt > 1) {
        const delay = variantRetryDelayMs(attempt);
        console.log(`[AgeSimulation] ${scanId}: retrying ${missing.join(', ')} in ${delay}ms (attempt ${attempt}/${VARIANT_ATTEMPTS})`);
        await this.sleep(delay);
      }
      signal?.throwIfAborted();

      const settled = await Promise.allSettled(
        missing.map(async (target) => {
          const path = await this.generateVariant(target, payload, prompts[target], signal);
          await saveVariant(target, path);
          return path;
        }),
      );
      settled.forEach((result, index) => {
        const target = missing[index];
        if (result.status === 'fulfilled') {
          paths[target] = result.value;
        } else {
          console.warn(`[AgeSimulation] ${scanId}: ${target} attempt ${attempt} failed: ${errorMessage(result.reason)}`);
        }
      });
    }

    signal?.throwIfAborted();
    const succeeded = ageTargets.filter(target => paths[target] !== null).length;
    const status = succeeded > 0 ? 'complete' : 'failed';

    await this.deps.records.updateSimulation(scanId, (current): SimulationData => ({
      ...current,
      status,
      '1_years': paths['1_years'],
      '3_years': paths['3_years'],
      breed_profile: profile,
      error: succeeded > 0 ? null : NO_VARIANTS_ERROR,
    }));

    console.log(`[AgeSimulation] ${scanId}: ${status} with ${succeeded}/${ageTargets.length} variants`);
    return status;
  }
}
