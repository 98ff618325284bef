import type { AgeTarget, BreedProfile, DogFeatures } from "@shared/schema";
import { AGE_TARGET_YEARS, DEFAULT_CURRENT_AGE_YEARS, ESTIMATED_AGE_YEARS, describeAgeTarget } from "@shared/breedProfiles";

export interface AgeInstruction {
  target: AgeTarget;
  breed: string;
  targetAgeYears: number;
  yearsAhead: number;
  subject: string;
  changes: {
    size: string;
    body: string;
    face: string;
    coat: string;
    graying: string;
  };
  preserve: string[];
}

const ALWAYS_PRESERVE = [
  'the same individual dog, not a different dog of the same breed',
  'the exact markings and their placement',
  'eye color and ear set',
  'the pose, camera angle, lighting and background',
];

export function currentAgeFromFeatures(features?: DogFeatures | null): number {
  return features?.estimatedAge ? ESTIMATED_AGE_YEARS[features.estimatedAge] : DEFAULT_CURRENT_AGE_YEARS;
}

function describeSubject(breed: string, features?: DogFeatures | null): string {
  const coat = [features?.coatColor, features?.coatPattern, features?.coatLength]
    .filter((part): part is string => Boolean(part && part.trim()))
    .join(' ');
  return coat ? `${breed} with a ${coat} coat` : breed;
}

/**
 * Structured instruction for one age variant
 */
export function buildAgeInstruction(
  breed: string,
  profile: BreedProfile,
  target: AgeTarget,
  features?: DogFeatures | null,
): AgeInstruction {
  const description = describeAgeTarget(profile, target, currentAgeFromFeatures(features));
  const preserve = features?.coatColor
    ? [...ALWAYS_PRESERVE, `the ${features.coatColor} coat color`]
    : ALWAYS_PRESERVE;

  return {
    target,
    breed,
    targetAgeYears: description.targetAgeYears,
    yearsAhead: AGE_TARGET_YEARS[target],
    subject: describeSubject(breed, features),
    changes: {
      size: description.size,
      body: description.body,
      face: description.face,
      coat: description.coat,
      graying: description.graying,
    },
    preserve,
  };
}

function formatYears(years: number): string {
  const rounded = Math.round(years * 10) / 10;
  return `${rounded} ${rounded === 1 ? 'year' : 'years'}`;
}

export function renderAgePrompt(instruction: AgeInstruction): string {
  const { changes } = instruction;
  return [
    `Show this exact dog, a ${instruction.subject}, ${formatYears(instruction.yearsAhead)} older, at about ${formatYears(instruction.targetAgeYears)} of age.`,
    `Size: ${changes.size}.`,
    `Body: ${changes.body}.`,
    `Face: ${changes.face}.`,
    `Coat: ${changes.coat}.`,
    `Graying: ${changes.graying}.`,
    `Keep ${instruction.preserve.join('; ')}.`,
    'Photorealistic result, no text, no borders, no extra animals.',
  ].join('\n');
}
