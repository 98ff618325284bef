/**
 * Fast breed classifier client
 *
 * The classifier is a separate HTTP service with its own memory of taught
 * examples. A memory hit means the image (or a near copy) was taught before.
 */

import { z } from "zod";
import type { BreedPrediction } from "@shared/schema";
import { ExternalServiceError, ParseError, classifyFailure } from "./error-handling";
import { trackApiCall } from "./monitoring";

export type ClassifierMethod = 'model' | 'memory';

export interface ClassifierPrediction {
  breed: string;
  confidence: number; // 0-100
  topPredictions: BreedPrediction[];
  method: ClassifierMethod;
  isHybridProne: boolean;
}

export const teachingOutcomes = ['added', 'updated', 'skipped'] as const;
export type TeachingOutcome = typeof teachingOutcomes[number];

export interface TeachingResult {
  status: TeachingOutcome;
  message: string;
}

export interface BreedClassifier {
  predict(image: Buffer, fileName?: string): Promise<ClassifierPrediction>;
  learn(image: Buffer, breed: string, fileName?: string): Promise<TeachingResult>;
  getMemoryStats(): Promise<Record<string, unknown>>;
  isHealthy(): Promise<boolean>;
}

export const TOP_PREDICTION_COUNT = 5;
export const FILLER_BREED = 'Other Breeds';

// Breeds commonly crossed into designer hybrids
const HYBRID_PRONE_BREEDS = new Set([
  'poodle',
  'toy poodle',
  'miniature poodle',
  'standard poodle',
  'labrador retriever',
  'golden retriever',
  'bichon frise',
  'maltese',
  'shih tzu',
  'cocker spaniel',
  'cavalier king charles spaniel',
  'yorkshire terrier',
  'miniature schnauzer',
  'pomeranian',
  'chihuahua',
  'beagle',
  'siberian husky',
  'pug',
]);

export function isHybridProneBreed(breed: string): boolean {
  return HYBRID_PRONE_BREEDS.has(breed.trim().toLowerCase());
}

/**
 * Services report either a 0-1 fraction or a 0-100 percentage
 */
export function normalizeConfidence(value: number): number {
  const percent = value <= 1 ? value * 100 : value;
  return Math.round(Math.min(Math.max(percent, 0), 100) * 100) / 100;
}

const predictionSchema = z.object({
  breed: z.string(),
  confidence: z.number(),
});

const predictResponseSchema = z.object({
  breed: z.string().min(1),
  confidence: z.number(),
  top_5: z.array(predictionSchema).default([]),
  is_memory_match: z.boolean().default(false),
  is_hybrid_prone: z.boolean().optional(),
});

const learnResponseSchema = z.object({
  status: z.enum(teachingOutcomes),
  message: z.string().default(''),
});

function padTopPredictions(predictions: BreedPrediction[]): BreedPrediction[] {
  const padded = predictions.slice(0, TOP_PREDICTION_COUNT);
  while (padded.length < TOP_PREDICTION_COUNT) {
    padded.push({ breed: FILLER_BREED, confidence: 0 });
  }
  return padded;
}

export class HttpBreedClassifier implements BreedClassifier {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  private async request(path: string, init: RequestInit, timeoutMs = this.timeoutMs): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        ...init,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw new ExternalServiceError('classifier', classifyFailure(error), error instanceof Error ? error : undefined);
    }

    if (!response.ok) {
      throw new ExternalServiceError('classifier', 'unavailable', new Error(`Classifier returned ${response.status} for ${path}`));
    }

    try {
      return await response.json();
    } catch {
      throw new ParseError('classifier', `Classifier returned a non-JSON body for ${path}`);
    }
  }

  private imageForm(image: Buffer, fileName: string): FormData {
    const form = new FormData();
    form.append('file', new Blob([image]), fileName);
    return form;
  }

  async predict(image: Buffer, fileName = 'upload.jpg'): Promise<ClassifierPrediction> {
    return trackApiCall('classifier', async () => {
      const body = await this.request('/predict', { method: 'POST', body: this.imageForm(image, fileName) });
      const parsed = predictResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ParseError('classifier', `Unexpected /predict payload: ${parsed.error.message}`);
      }

      const data = parsed.data;
      const method: ClassifierMethod = data.is_memory_match ? 'memory' : 'model';
      console.log(`[Classifier] ${data.breed} (${normalizeConfidence(data.confidence)}%, ${method})`);

      return {
        breed: data.breed,
        confidence: normalizeConfidence(data.confidence),
        topPredictions: padTopPredictions(data.top_5.map(p => ({
          breed: p.breed,
          confidence: normalizeConfidence(p.confidence),
        }))),
        method,
        isHybridProne: data.is_hybrid_prone ?? isHybridProneBreed(data.breed),
      };
    });
  }

  async learn(image: Buffer, breed: string, fileName = 'correction.jpg'): Promise<TeachingResult> {
    return trackApiCall('classifier', async () => {
      const form = this.imageForm(image, fileName);
      form.append('breed', breed);
      const body = await this.request('/learn', { method: 'POST', body: form });
      const parsed = learnResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ParseError('classifier', `Unexpected /learn payload: ${parsed.error.message}`);
      }
      console.log(`[Classifier] Learned ${breed}: ${parsed.data.status}`);
      return parsed.data;
    });
  }

  async getMemoryStats(): Promise<Record<string, unknown>> {
    const body = await this.request('/memory/stats', { method: 'GET' }, 10_000);
    return z.record(z.unknown()).parse(body);
  }

  async isHealthy(): Promise<boolean> {
    try {
      const body = await this.request('/', { method: 'GET' }, 5_000);
      const parsed = z.object({ status: z.string(), model_loaded: z.boolean() }).safeParse(body);
      return parsed.success && parsed.data.status === 'healthy' && parsed.data.model_loaded;
    } catch (error) {
      console.warn('[Classifier] Health check failed:', error instanceof Error ? error.message : String(error));
      return false;
    }
  }
}
