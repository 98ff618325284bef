/**
 * Breed Profile Knowledge Base
 *
 * Maps a breed name to the physical traits that drive age-progression prompts.
 * Rules live in data/breed-profile-rules.json, ordered most specific first.
 * The first rule with a matching substring wins; unknown names get a generic
 * moderate-growth profile so the simulation never fails on a breed name.
 */

import { z } from 'zod';
import rawRules from './data/breed-profile-rules.json';
import {
  bodyShapes,
  coatTypes,
  grayingPatterns,
  growthCurves,
  sizeCategories,
  type AgeNotes,
  type AgeTarget,
  type BodyShape,
  type BreedProfile,
  type CoatType,
  type GrayingPattern,
  type EstimatedAge,
} from './schema';

const breedProfileRuleSchema = z.object({
  id: z.string(),
  match: z.array(z.string().min(1)).min(1),
  sizeCategory: z.enum(sizeCategories),
  bodyShape: z.enum(bodyShapes),
  coatType: z.enum(coatTypes),
  grayingPattern: z.enum(grayingPatterns),
  growthCurve: z.enum(growthCurves),
  brachycephalic: z.boolean(),
  growsSignificantly: z.boolean(),
  faceTrait: z.string(),
});

export type BreedProfileRule = z.infer<typeof breedProfileRuleSchema>;

export const BREED_PROFILE_RULES: readonly BreedProfileRule[] = z.array(breedProfileRuleSchema).parse(rawRules);

const GENERIC_RULE: BreedProfileRule = {
  id: 'generic',
  match: [],
  sizeCategory: 'medium',
  bodyShape: 'athletic',
  coatType: 'medium',
  grayingPattern: 'gradual',
  growthCurve: 'moderate',
  brachycephalic: false,
  growsSignificantly: true,
  faceTrait: 'the same head shape and ear set as in the photo',
};

// Used when the identifier could not estimate the dog's age
export const DEFAULT_CURRENT_AGE_YEARS = 2;

export const ESTIMATED_AGE_YEARS: Record<EstimatedAge, number> = {
  'puppy': 0.5,
  'young adult': 2,
  'adult': 4,
  'mature': 6,
  'senior': 9,
};

export const AGE_TARGET_YEARS: Record<AgeTarget, number> = {
  '1_years': 1,
  '3_years': 3,
};

// Age at which graying first shows, per pattern
const GRAY_ONSET_YEARS: Record<GrayingPattern, number> = {
  early_muzzle: 5,
  coat_fading: 6,
  gradual: 7,
  minimal: 9,
};

const LIGHT_GRAYING: Record<GrayingPattern, string> = {
  early_muzzle: 'Light graying on the muzzle and chin',
  coat_fading: 'Coat color starting to fade and lighten',
  gradual: 'A few gray hairs around the muzzle',
  minimal: 'Barely any graying',
};

const HEAVY_GRAYING: Record<GrayingPattern, string> = {
  early_muzzle: 'Noticeable gray muzzle spreading around the eyes',
  coat_fading: 'Clearly faded coat with a lighter face',
  gradual: 'Gray muzzle and eyebrows',
  minimal: 'Slight graying on the muzzle',
};

const COAT_TEXT: Record<CoatType, string> = {
  short: 'short sleek coat',
  medium: 'medium-length coat',
  long: 'long flowing coat',
  double: 'thick double coat',
  curly: 'dense curly coat',
  wire: 'coarse wiry coat',
  hairless: 'mostly hairless skin',
};

const BODY_TEXT: Record<BodyShape, string> = {
  compact: 'compact',
  athletic: 'athletic',
  stocky: 'stocky',
  elongated: 'long low',
  slender: 'slender',
  muscular: 'muscular',
};

export interface AgeTargetDescription extends AgeNotes {
  targetAgeYears: number;
  coat: string;
  graying: string;
}

function normalizeBreedName(breedName: string): string {
  return ` ${breedName.toLowerCase().replace(/[^a-z.]+/g, ' ').trim()} `;
}

export function findBreedRule(breedName: string): BreedProfileRule {
  const normalized = normalizeBreedName(breedName);
  for (const rule of BREED_PROFILE_RULES) {
    if (rule.match.some(fragment => normalized.includes(fragment))) {
      return rule;
    }
  }
  return GENERIC_RULE;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function describeAgeTarget(
  profile: Omit<BreedProfile, 'notes'>,
  target: AgeTarget,
  currentAgeYears: number,
): AgeTargetDescription {
  const futureAge = currentAgeYears + AGE_TARGET_YEARS[target];
  const isPuppy = currentAgeYears < 1;
  const shape = BODY_TEXT[profile.bodyShape];

  let size: string;
  if (isPuppy && profile.growsSignificantly) {
    size = target === '1_years'
      ? `Grown to near full ${profile.sizeCategory} adult size, clearly larger than in the photo`
      : `Full ${profile.sizeCategory} adult size, clearly larger than in the photo`;
  } else if (isPuppy) {
    size = `Slightly larger, settling at a ${profile.sizeCategory} adult size`;
  } else {
    size = `Same ${profile.sizeCategory} adult size as in the photo`;
  }

  let body: string;
  if (futureAge < 2) {
    body = profile.growthCurve === 'rapid'
      ? `${capitalize(shape)} frame still filling out, lean and slightly leggy`
      : `${capitalize(shape)} frame close to its adult shape`;
  } else if (futureAge < 7) {
    body = `Fully matured ${shape} build with a deeper chest`;
  } else {
    body = `${capitalize(shape)} build softening with age, thicker waist and less muscle tone`;
  }

  const face = [
    profile.brachycephalic ? 'Keep the short flat muzzle' : null,
    capitalize(profile.faceTrait),
    isPuppy ? 'puppy roundness replaced by adult head proportions' : 'same adult head proportions',
  ].filter((part): part is string => part !== null).join('; ');

  const coatText = COAT_TEXT[profile.coatType];
  let coat = isPuppy ? `Puppy fluff replaced by the adult ${coatText}` : `Same ${coatText}`;
  if (futureAge >= 7) {
    coat += ', slightly coarser and less glossy';
  }

  // Giant breeds age about a year faster
  const onset = GRAY_ONSET_YEARS[profile.grayingPattern] - (profile.sizeCategory === 'giant' ? 1 : 0);
  let graying: string;
  if (futureAge < onset) {
    graying = 'No graying';
  } else if (futureAge < onset + 3) {
    graying = LIGHT_GRAYING[profile.grayingPattern];
  } else {
    graying = HEAVY_GRAYING[profile.grayingPattern];
  }

  return { targetAgeYears: futureAge, body, face, size, coat, graying };
}

export function getBreedProfile(breedName: string, currentAgeYears: number = DEFAULT_CURRENT_AGE_YEARS): BreedProfile {
  const rule = findBreedRule(breedName);
  const base: Omit<BreedProfile, 'notes'> = {
    matchedRule: rule.id,
    sizeCategory: rule.sizeCategory,
    bodyShape: rule.bodyShape,
    coatType: rule.coatType,
    grayingPattern: rule.grayingPattern,
    growthCurve: rule.growthCurve,
    brachycephalic: rule.brachycephalic,
    growsSignificantly: rule.growsSignificantly,
    faceTrait: rule.faceTrait,
  };

  const notesFor = (target: AgeTarget): AgeNotes => {
    const { body, face, size } = describeAgeTarget(base, target, currentAgeYears);
    return { body, face, size };
  };

  return {
    ...base,
    notes: {
      '1_years': notesFor('1_years'),
      '3_years': notesFor('3_years'),
    },
  };
}
