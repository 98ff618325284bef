/**
 * In-process stand-ins for the external model services, shared by the tests.
 */

import sharp from "sharp";
import { PredictionMethod, emptySimulationData, type InsertScanResult } from "@shared/schema";
import { ExternalServiceError } from "./error-handling";
import type { BreedClassifier, ClassifierPrediction, TeachingResult } from "./classifier-client";
import type { BreedIdentifier, IdentifierHint, IdentifierResult } from "./breed-identifier";
import type { ImageGenerator } from "./image-generator";
import { buildServices, type ServiceOverrides } from "./app";
import { loadConfig } from "./config";
import { MemStorage } from "./mem-storage";
import { MemoryBlobStore } from "./blob-storage";

export function makePng(width = 32, height = 32, color = { r: 200, g: 150, b: 100 }): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: color } }).png().toBuffer();
}

export function scanRecord(overrides: Partial<InsertScanResult> = {}): InsertScanResult {
  return {
    scanId: 'scan-1',
    userId: null,
    imagePath: 'scans/abc.png',
    imageHash: 'abc',
    breed: 'Labrador Retriever',
    confidence: 91,
    topPredictions: [{ breed: 'Golden Retriever', confidence: 40 }],
    verificationStatus: 'pending',
    predictionMethod: PredictionMethod.CONFIRMED,
    description: null,
    originHistory: null,
    healthRisks: null,
    simulationData: emptySimulationData('queued'),
    ...overrides,
  };
}

export function classifierPrediction(overrides: Partial<ClassifierPrediction> = {}): ClassifierPrediction {
  return {
    breed: 'Labrador Retriever',
    confidence: 91,
    topPredictions: [
      { breed: 'Labrador Retriever', confidence: 91 },
      { breed: 'Golden Retriever', confidence: 5 },
      { breed: 'Other Breeds', confidence: 0 },
      { breed: 'Other Breeds', confidence: 0 },
      { breed: 'Other Breeds', confidence: 0 },
    ],
    method: 'model',
    isHybridProne: false,
    ...overrides,
  };
}

export function identifierResult(overrides: Partial<IdentifierResult> = {}): IdentifierResult {
  return {
    category: 'purebred',
    breed: 'Labrador Retriever',
    rawBreed: 'Labrador Retriever',
    confidence: 88,
    alternatives: [{ breed: 'Golden Retriever', confidence: 40 }],
    description: 'A friendly, outgoing retriever.',
    originHistory: { summary: 'Bred as a fishing companion.', region: 'Newfoundland' },
    healthRisks: { concerns: [{ name: 'Hip dysplasia', riskLevel: 'moderate' }], lifespan: '10-12 years' },
    dogFeatures: { coatColor: 'yellow', coatLength: 'short', estimatedAge: 'young adult' },
    ...overrides,
  };
}

export class FakeClassifier implements BreedClassifier {
  predictCalls = 0;
  learned: Array<{ breed: string; fileName?: string }> = [];
  prediction: ClassifierPrediction | Error = classifierPrediction();
  teaching: TeachingResult | Error = { status: 'added', message: 'Example added to memory' };
  stats: Record<string, unknown> = { total_examples: 3 };
  healthy = true;

  async predict(): Promise<ClassifierPrediction> {
    this.predictCalls++;
    if (this.prediction instanceof Error) throw this.prediction;
    return this.prediction;
  }

  async learn(_image: Buffer, breed: string, fileName?: string): Promise<TeachingResult> {
    if (this.teaching instanceof Error) throw this.teaching;
    this.learned.push({ breed, fileName });
    return this.teaching;
  }

  async getMemoryStats(): Promise<Record<string, unknown>> {
    return this.stats;
  }

  async isHealthy(): Promise<boolean> {
    return this.healthy;
  }
}

export class FakeIdentifier implements BreedIdentifier {
  identifyCalls: Array<IdentifierHint | null> = [];
  dogChecks = 0;
  result: IdentifierResult | Error = identifierResult();
  dog: boolean | Error = true;

  async identify(_image: Buffer, hint?: IdentifierHint | null): Promise<IdentifierResult> {
    this.identifyCalls.push(hint ?? null);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }

  async isDog(): Promise<boolean> {
    this.dogChecks++;
    if (this.dog instanceof Error) throw this.dog;
    return this.dog;
  }
}

export function generationFailure(): ExternalServiceError {
  return new ExternalServiceError('image_generation', 'unavailable', new Error('upstream 500'));
}

/**
 * Answers by prompt: `respond` sees each prompt and returns bytes or an error
 */
export class FakeGenerator implements ImageGenerator {
  prompts: string[] = [];

  constructor(private readonly respond: (prompt: string) => Buffer | Error = () => Buffer.from('png-bytes')) {}

  async generate(_source: Buffer, prompt: string): Promise<Buffer> {
    this.prompts.push(prompt);
    const response = this.respond(prompt);
    if (response instanceof Error) throw response;
    return response;
  }
}

export const noSleep = async (): Promise<void> => {};

let harnessCount = 0;

/**
 * Fully wired services over in-memory storage and fake model services.
 * Scan ids are unique across harnesses so shared caches never collide.
 */
export function createTestServices(options: { generator?: FakeGenerator; env?: NodeJS.ProcessEnv } = {}) {
  const prefix = `t${++harnessCount}`;
  let scans = 0;
  const storage = new MemStorage();
  const blobs = new MemoryBlobStore();
  const classifier = new FakeClassifier();
  const identifier = new FakeIdentifier();
  const generator = options.generator ?? new FakeGenerator();

  const overrides: ServiceOverrides = {
    storage,
    blobs,
    classifier,
    identifier,
    generator,
    random: () => 0.5,
    sleep: noSleep,
    newScanId: () => `${prefix}-scan-${++scans}`,
  };
  const services = buildServices(loadConfig(options.env ?? {}), overrides);

  return { ...services, storage, blobs, classifier, identifier, generator };
}
