/**
 * Deep breed identifier
 *
 * A vision-language model reached through the OpenAI SDK. By default the
 * client points at Gemini's OpenAI-compatible endpoint; any compatible
 * endpoint and model can be configured.
 */

import OpenAI from "openai";
import { z } from "zod";
import {
  estimatedAges,
  type BreedCategory,
  type BreedPrediction,
  type DogFeatures,
  type HealthRisks,
  type OriginHistory,
} from "@shared/schema";
import { ExternalServiceError, ParseError, classifyFailure } from "./error-handling";
import { trackApiCall } from "./monitoring";
import { callIdentifierWithRetry, type RetryOptions } from "./retry-strategy";
import { normalizeConfidence } from "./classifier-client";

export interface IdentifierHint {
  breed: string;
  confidence: number; // 0-100
}

export interface IdentifierResult {
  category: BreedCategory;
  breed: string; // cleaned per category
  rawBreed: string;
  confidence: number; // self-reported, 0-100, before calibration
  alternatives: BreedPrediction[];
  description: string | null;
  originHistory: OriginHistory | null;
  healthRisks: HealthRisks | null;
  dogFeatures: DogFeatures;
}

export interface BreedIdentifier {
  identify(imageJpeg: Buffer, hint?: IdentifierHint | null): Promise<IdentifierResult>;
  isDog(imageJpeg: Buffer): Promise<boolean>;
}

// ============ HINT TIERING ============

export const STRONG_HINT_THRESHOLD = 98;
export const WEAK_HINT_THRESHOLD = 75;

export type HintTier = 'strong' | 'weak' | 'suppressed';

// An overconfident wrong hint does more harm than no hint at all
export function hintTier(confidence: number): HintTier {
  if (confidence >= STRONG_HINT_THRESHOLD) return 'strong';
  if (confidence >= WEAK_HINT_THRESHOLD) return 'weak';
  return 'suppressed';
}

export function buildHintText(hint: IdentifierHint | null | undefined): string | null {
  if (!hint) return null;
  switch (hintTier(hint.confidence)) {
    case 'strong':
      return `A fast classifier identified this dog as "${hint.breed}" (${hint.confidence}% confidence). Treat this as a strong starting point, but verify it against what you see.`;
    case 'weak':
      return `A fast classifier suggested "${hint.breed}" (${hint.confidence}% confidence). This is a weak signal that is often wrong. Do not anchor on it; identify the dog independently.`;
    case 'suppressed':
      return null;
  }
}

export function buildIdentificationPrompt(hint?: IdentifierHint | null): string {
  const hintText = buildHintText(hint);
  return `DOG BREED IDENTIFICATION

Identify the breed of the dog in this photo. Decide which ONE category applies, checking them in this order:
1. native_landrace: a regional village or street dog population (for example Aspin, Indian Pariah, Africanis), recognized by lean build, wedge head, short coat and upright ears
2. designer_hybrid: a recognized designer cross with its own name (for example Goldendoodle, Cockapoo, Airedoodle)
3. purebred: a single recognized breed
4. mixed: an unnamed mix of two or more breeds; name the dominant breed
${hintText ? `\n${hintText}\n` : ''}
Return JSON only:
{
  "category": "purebred",
  "is_native_landrace": false,
  "is_designer_hybrid": false,
  "is_purebred": true,
  "is_mixed": false,
  "breed": "Golden Retriever",
  "confidence": 88,
  "alternatives": [{ "breed": "Labrador Retriever", "confidence": 40 }],
  "description": "Two or three sentences about this breed's temperament and appearance.",
  "origin_history": { "summary": "...", "region": "...", "era": "...", "original_purpose": "..." },
  "health_risks": {
    "concerns": [{ "name": "Hip dysplasia", "risk_level": "moderate", "description": "..." }],
    "lifespan": "10-12 years",
    "notes": "..."
  },
  "dog_features": {
    "coat_color": "golden",
    "coat_pattern": "solid",
    "coat_length": "long",
    "build": "athletic",
    "estimated_age": "young adult"
  }
}

Rules:
- "confidence" is 0-100.
- Up to 5 alternatives, never repeating the primary breed.
- "estimated_age" is one of: ${estimatedAges.join(', ')}.`;
}

export const DOG_CHECK_PROMPT = `Is there a real dog clearly visible in this photo? Drawings, toys and other animals do not count.
Return JSON only: { "is_dog": true, "confidence": 95 }`;

// ============ RESPONSE PARSING ============

/**
 * Models wrap JSON in prose or code fences often enough that a plain parse is only the first try
 */
export function extractJson(text: string): unknown {
  const trimmed = text.trim();
  try {
    return JSON.parse(trimmed);
  } catch {
    // fall through to fenced and embedded JSON
  }

  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced) {
    try {
      return JSON.parse(fenced[1]);
    } catch {
      // fall through to the outermost braces
    }
  }

  const braces = trimmed.match(/\{[\s\S]*\}/);
  if (braces) {
    try {
      return JSON.parse(braces[0]);
    } catch {
      throw new ParseError('identifier', 'Embedded JSON object is malformed');
    }
  }

  throw new ParseError('identifier', 'No JSON object in identifier response');
}

const riskLevelSchema = z.enum(['low', 'moderate', 'high']).catch('moderate');

const identifierResponseSchema = z.object({
  category: z.string().optional(),
  is_native_landrace: z.boolean().optional(),
  is_designer_hybrid: z.boolean().optional(),
  is_purebred: z.boolean().optional(),
  is_mixed: z.boolean().optional(),
  breed: z.string().trim().min(1),
  confidence: z.coerce.number(),
  alternatives: z.array(z.object({
    breed: z.string(),
    confidence: z.coerce.number(),
  })).default([]),
  description: z.string().nullish(),
  origin_history: z.object({
    summary: z.string().optional(),
    region: z.string().optional(),
    era: z.string().optional(),
    original_purpose: z.string().optional(),
  }).nullish(),
  health_risks: z.object({
    concerns: z.array(z.object({
      name: z.string(),
      risk_level: riskLevelSchema,
      description: z.string().optional(),
    })).default([]),
    lifespan: z.string().optional(),
    notes: z.string().optional(),
  }).nullish(),
  dog_features: z.object({
    coat_color: z.string().optional(),
    coat_pattern: z.string().optional(),
    coat_length: z.string().optional(),
    build: z.string().optional(),
    estimated_age: z.enum(estimatedAges).optional().catch(undefined),
  }).nullish(),
});

export type IdentifierResponse = z.infer<typeof identifierResponseSchema>;

const dogCheckSchema = z.object({
  is_dog: z.boolean(),
});

type CategoryFlags = Pick<IdentifierResponse, 'category' | 'is_native_landrace' | 'is_designer_hybrid' | 'is_purebred' | 'is_mixed'>;

/**
 * Flags win over the free-text category, checked landrace first
 */
export function resolveCategory(raw: CategoryFlags): BreedCategory {
  if (raw.is_native_landrace) return 'native_landrace';
  if (raw.is_designer_hybrid) return 'designer_hybrid';
  if (raw.is_purebred) return 'purebred';
  if (raw.is_mixed) return 'mixed';

  const category = raw.category?.trim().toLowerCase().replace(/[\s-]+/g, '_');
  switch (category) {
    case 'native_landrace':
    case 'landrace':
      return 'native_landrace';
    case 'designer_hybrid':
    case 'hybrid':
      return 'designer_hybrid';
    case 'mixed':
    case 'mixed_breed':
      return 'mixed';
    default:
      return 'purebred';
  }
}

/**
 * Hybrid names are the breed; everything else keeps only the first named breed
 */
export function cleanBreedName(name: string, category: BreedCategory): string {
  const trimmed = name.trim();
  if (category === 'designer_hybrid') return trimmed;

  const cleaned = trimmed
    .split('/')[0]
    .replace(/\s+x\s+.*$/i, '')
    .replace(/[\s-]*(mix(ed)?|cross(breed)?)\s*$/i, '')
    .trim();
  return cleaned || trimmed;
}

export function parseIdentifierResponse(text: string): IdentifierResult {
  const parsed = identifierResponseSchema.safeParse(extractJson(text));
  if (!parsed.success) {
    throw new ParseError('identifier', `Identifier response has the wrong shape: ${parsed.error.message}`);
  }

  const data = parsed.data;
  const category = resolveCategory(data);
  const features = data.dog_features ?? {};
  const origin = data.origin_history;
  const health = data.health_risks;

  return {
    category,
    breed: cleanBreedName(data.breed, category),
    rawBreed: data.breed,
    confidence: normalizeConfidence(data.confidence),
    alternatives: data.alternatives.map(alt => ({
      breed: cleanBreedName(alt.breed, category),
      confidence: normalizeConfidence(alt.confidence),
    })),
    description: data.description ?? null,
    originHistory: origin ? {
      summary: origin.summary,
      region: origin.region,
      era: origin.era,
      originalPurpose: origin.original_purpose,
    } : null,
    healthRisks: health ? {
      concerns: health.concerns.map(concern => ({
        name: concern.name,
        riskLevel: concern.risk_level,
        description: concern.description,
      })),
      lifespan: health.lifespan,
      notes: health.notes,
    } : null,
    dogFeatures: {
      coatColor: features.coat_color,
      coatPattern: features.coat_pattern,
      coatLength: features.coat_length,
      build: features.build,
      estimatedAge: features.estimated_age,
    },
  };
}

export function parseDogCheck(text: string): boolean {
  const parsed = dogCheckSchema.safeParse(extractJson(text));
  if (!parsed.success) {
    throw new ParseError('identifier', 'Dog check response has the wrong shape');
  }
  return parsed.data.is_dog;
}

// ============ CLIENT ============

export interface OpenAiIdentifierOptions {
  model: string;
  timeoutMs: number;
  retry?: Partial<RetryOptions>;
}

export class OpenAiBreedIdentifier implements BreedIdentifier {
  constructor(
    private readonly client: OpenAI,
    private readonly options: OpenAiIdentifierOptions,
  ) {}

  private async complete(prompt: string, imageJpeg: Buffer, maxTokens: number): Promise<string> {
    const imageUrl = `data:image/jpeg;base64,${imageJpeg.toString('base64')}`;

    return trackApiCall('identifier', () => callIdentifierWithRetry(async () => {
      let response: OpenAI.Chat.Completions.ChatCompletion;
      try {
        response = await this.client.chat.completions.create({
          model: this.options.model,
          max_tokens: maxTokens,
          temperature: 0.2,
          response_format: { type: 'json_object' },
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: prompt },
                { type: 'image_url', image_url: { url: imageUrl } },
              ],
            },
          ],
        }, { timeout: this.options.timeoutMs });
      } catch (error) {
        throw new ExternalServiceError('identifier', classifyFailure(error), error instanceof Error ? error : undefined);
      }

      const choice = response.choices[0];
      if (choice?.finish_reason === 'content_filter') {
        throw new ExternalServiceError('identifier', 'blocked', new Error('Identifier response was filtered'));
      }
      const content = choice?.message?.content ?? '';
      if (!content.trim()) {
        throw new ParseError('identifier', 'Identifier returned an empty response');
      }
      return content;
    }, this.options.retry));
  }

  async identify(imageJpeg: Buffer, hint?: IdentifierHint | null): Promise<IdentifierResult> {
    const tier = hint ? hintTier(hint.confidence) : 'suppressed';
    console.log(`[Identifier] Identifying with ${tier} hint${hint && tier !== 'suppressed' ? ` (${hint.breed})` : ''}`);

    const content = await this.complete(buildIdentificationPrompt(hint), imageJpeg, 1500);
    const result = parseIdentifierResponse(content);
    console.log(`[Identifier] ${result.breed} (${result.category}, ${result.confidence}%)`);
    return result;
  }

  async isDog(imageJpeg: Buffer): Promise<boolean> {
    const content = await this.complete(DOG_CHECK_PROMPT, imageJpeg, 100);
    return parseDogCheck(content);
  }
}
