/**
 * Breed Consensus Engine
 *
 * Two-stage identification: the fast classifier runs first and its answer is
 * handed to the deep identifier as a tiered hint. The two are then arbitrated
 * and the confidences calibrated into a believable range.
 */

import {
  PredictionMethod,
  type BreedCategory,
  type BreedPrediction,
  type DogFeatures,
  type HealthRisks,
  type OriginHistory,
} from "@shared/schema";
import { AppError, ErrorCode, errorMessage } from "./error-handling";
import { FILLER_BREED, type BreedClassifier, type ClassifierPrediction } from "./classifier-client";
import type { BreedIdentifier, IdentifierHint, IdentifierResult } from "./breed-identifier";

export const PRIMARY_CONFIDENCE_RANGE = { min: 65, max: 98 } as const;
export const ALTERNATIVE_CONFIDENCE_RANGE = { min: 15, max: 84 } as const;
export const CONFIDENCE_JITTER = 3;
export const OVERRIDE_CONFIDENCE_THRESHOLD = 75;
export const MAX_ALTERNATIVES = 5;

export type ConsensusMethod =
  | typeof PredictionMethod.CONFIRMED
  | typeof PredictionMethod.OVERRIDE
  | typeof PredictionMethod.HYBRID_OVERRIDE;

export interface ConsensusInput {
  image: Buffer; // normalized JPEG
  fileName?: string;
  hint?: IdentifierHint | null; // prior answer, used only when the classifier is down
}

export interface ConsensusResult {
  breed: string;
  confidence: number;
  topPredictions: BreedPrediction[];
  method: ConsensusMethod;
  category: BreedCategory;
  description: string | null;
  originHistory: OriginHistory | null;
  healthRisks: HealthRisks | null;
  dogFeatures: DogFeatures;
  classifier: ClassifierPrediction | null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function jitter(confidence: number, random: () => number): number {
  return confidence + (random() * 2 - 1) * CONFIDENCE_JITTER;
}

export function clampPrimary(confidence: number): number {
  return round2(clamp(confidence, PRIMARY_CONFIDENCE_RANGE.min, PRIMARY_CONFIDENCE_RANGE.max));
}

/**
 * Ranked alternatives: never the primary, no repeats, no filler or empty entries
 */
export function calibrateAlternatives(primary: string, candidates: BreedPrediction[]): BreedPrediction[] {
  const seen = new Set([primary.trim().toLowerCase()]);
  const alternatives: BreedPrediction[] = [];

  for (const candidate of candidates) {
    const key = candidate.breed.trim().toLowerCase();
    if (!key || candidate.confidence <= 0 || candidate.breed === FILLER_BREED || seen.has(key)) continue;
    seen.add(key);
    alternatives.push({
      breed: candidate.breed.trim(),
      confidence: round2(clamp(candidate.confidence, ALTERNATIVE_CONFIDENCE_RANGE.min, ALTERNATIVE_CONFIDENCE_RANGE.max)),
    });
  }

  return alternatives
    .sort((a, b) => b.confidence - a.confidence)
    .slice(0, MAX_ALTERNATIVES);
}

export interface Arbitration {
  breed: string;
  rawConfidence: number;
  method: ConsensusMethod;
  overridden: boolean;
}

/**
 * The identifier only overrides when it disagrees with enough confidence.
 * The threshold applies to its self-reported confidence, before jitter.
 */
export function arbitrate(
  classifier: ClassifierPrediction,
  identifier: Pick<IdentifierResult, 'breed' | 'confidence'>,
  jitteredIdentifierConfidence: number,
): Arbitration {
  const disagrees = identifier.breed.trim().toLowerCase() !== classifier.breed.trim().toLowerCase();

  if (disagrees && identifier.confidence >= OVERRIDE_CONFIDENCE_THRESHOLD) {
    return {
      breed: identifier.breed,
      rawConfidence: jitteredIdentifierConfidence,
      method: classifier.isHybridProne ? PredictionMethod.HYBRID_OVERRIDE : PredictionMethod.OVERRIDE,
      overridden: true,
    };
  }

  return {
    breed: classifier.breed,
    rawConfidence: Math.max(classifier.confidence, jitteredIdentifierConfidence),
    method: PredictionMethod.CONFIRMED,
    overridden: false,
  };
}

function enrichment(identified: IdentifierResult) {
  return {
    category: identified.category,
    description: identified.description,
    originHistory: identified.originHistory,
    healthRisks: identified.healthRisks,
    dogFeatures: identified.dogFeatures,
  };
}

export class BreedConsensusEngine {
  constructor(
    private readonly classifier: BreedClassifier,
    private readonly identifier: BreedIdentifier,
    private readonly random: () => number = Math.random,
  ) {}

  async analyze(input: ConsensusInput): Promise<ConsensusResult> {
    let prediction: ClassifierPrediction;
    try {
      prediction = await this.classifier.predict(input.image, input.fileName);
    } catch (error) {
      console.warn(`[Consensus] Classifier unavailable, using identifier alone: ${errorMessage(error)}`);
      return this.identifierOnly(input);
    }

    const identified = await this.identifier.identify(input.image, {
      breed: prediction.breed,
      confidence: prediction.confidence,
    });

    const decision = arbitrate(prediction, identified, jitter(identified.confidence, this.random));
    const candidates = decision.overridden
      ? [...identified.alternatives, { breed: prediction.breed, confidence: prediction.confidence }, ...prediction.topPredictions]
      : [...identified.alternatives, ...prediction.topPredictions];
    const confidence = clampPrimary(decision.rawConfidence);

    console.log(
      `[Consensus] classifier=${prediction.breed} (${prediction.confidence}%) identifier=${identified.breed} (${identified.confidence}%) -> ${decision.breed} (${confidence}%, ${decision.method})`,
    );

    return {
      breed: decision.breed,
      confidence,
      topPredictions: calibrateAlternatives(decision.breed, candidates),
      method: decision.method,
      ...enrichment(identified),
      classifier: prediction,
    };
  }

  private async identifierOnly(input: ConsensusInput): Promise<ConsensusResult> {
    let identified: IdentifierResult;
    try {
      identified = await this.identifier.identify(input.image, input.hint ?? null);
    } catch (error) {
      throw new AppError(ErrorCode.ANALYSIS_UNAVAILABLE, error instanceof Error ? error : new Error(String(error)));
    }

    const confidence = clampPrimary(jitter(identified.confidence, this.random));
    console.log(`[Consensus] identifier only -> ${identified.breed} (${confidence}%)`);

    return {
      breed: identified.breed,
      confidence,
      topPredictions: calibrateAlternatives(identified.breed, identified.alternatives),
      method: PredictionMethod.OVERRIDE,
      ...enrichment(identified),
      classifier: null,
    };
  }
}
