import { PredictionMethod } from '@shared/schema';
import { AppError, ErrorCode, ExternalServiceError } from './error-handling';
import {
  ALTERNATIVE_CONFIDENCE_RANGE,
  BreedConsensusEngine,
  PRIMARY_CONFIDENCE_RANGE,
  arbitrate,
  calibrateAlternatives,
  clampPrimary,
  jitter,
} from './breed-consensus';
import { FakeClassifier, FakeIdentifier, classifierPrediction, identifierResult } from './test-fakes';

const image = Buffer.from('jpeg-bytes');
const noJitter = () => 0.5;

function engineWith(classifier: FakeClassifier, identifier: FakeIdentifier, random: () => number = noJitter) {
  return new BreedConsensusEngine(classifier, identifier, random);
}

describe('BreedConsensusEngine - arbitration', () => {
  it('confirms the classifier when both agree and keeps the higher confidence', async () => {
    const classifier = new FakeClassifier();
    classifier.prediction = classifierPrediction({
      breed: 'Labrador',
      confidence: 91,
      topPredictions: [
        { breed: 'Labrador', confidence: 91 },
        { breed: 'Golden Retriever', confidence: 5 },
        { breed: 'Other Breeds', confidence: 0 },
        { breed: 'Other Breeds', confidence: 0 },
        { breed: 'Other Breeds', confidence: 0 },
      ],
    });
    const identifier = new FakeIdentifier();
    identifier.result = identifierResult({ breed: 'Labrador', confidence: 88 });

    const result = await engineWith(classifier, identifier).analyze({ image });

    expect(result.method).toBe(PredictionMethod.CONFIRMED);
    expect(result.breed).toBe('Labrador');
    expect(result.confidence).toBe(91);
    expect(result.topPredictions).toEqual([{ breed: 'Golden Retriever', confidence: 40 }]);
  });

  it('keeps 91 whichever way the identifier confidence is jittered', async () => {
    for (const random of [() => 0, () => 0.999999]) {
      const classifier = new FakeClassifier();
      classifier.prediction = classifierPrediction({ breed: 'Labrador', confidence: 91 });
      const identifier = new FakeIdentifier();
      identifier.result = identifierResult({ breed: 'Labrador', confidence: 88 });

      const result = await engineWith(classifier, identifier, random).analyze({ image });
      expect(result.confidence).toBe(91);
    }
  });

  it('lets a confident identifier override a different classifier breed', async () => {
    const classifier = new FakeClassifier();
    const identifier = new FakeIdentifier();
    identifier.result = identifierResult({
      breed: 'Golden Retriever',
      confidence: 80,
      alternatives: [{ breed: 'Labrador Retriever', confidence: 30 }],
    });

    const result = await engineWith(classifier, identifier).analyze({ image });

    expect(result.method).toBe(PredictionMethod.OVERRIDE);
    expect(result.breed).toBe('Golden Retriever');
    expect(result.confidence).toBe(80);
    expect(result.topPredictions).toEqual([{ breed: 'Labrador Retriever', confidence: 30 }]);
  });

  it('tags overrides of hybrid-prone classifier breeds separately', async () => {
    const classifier = new FakeClassifier();
    classifier.prediction = classifierPrediction({ breed: 'Poodle', confidence: 70, isHybridProne: true });
    const identifier = new FakeIdentifier();
    identifier.result = identifierResult({ category: 'designer_hybrid', breed: 'Goldendoodle', confidence: 90, alternatives: [] });

    const result = await engineWith(classifier, identifier).analyze({ image });

    expect(result.method).toBe(PredictionMethod.HYBRID_OVERRIDE);
    expect(result.breed).toBe('Goldendoodle');
    expect(result.category).toBe('designer_hybrid');
  });

  it('keeps the classifier breed when the identifier disagrees without confidence', async () => {
    const classifier = new FakeClassifier();
    const identifier = new FakeIdentifier();
    identifier.result = identifierResult({ breed: 'Beagle', confidence: 74, alternatives: [] });

    const result = await engineWith(classifier, identifier).analyze({ image });

    expect(result.method).toBe(PredictionMethod.CONFIRMED);
    expect(result.breed).toBe('Labrador Retriever');
    expect(result.confidence).toBe(91);
  });

  it('compares breed names case-insensitively', async () => {
    const classifier = new FakeClassifier();
    const identifier = new FakeIdentifier();
    identifier.result = identifierResult({ breed: 'labrador retriever', confidence: 95, alternatives: [] });

    const result = await engineWith(classifier, identifier).analyze({ image });

    expect(result.method).toBe(PredictionMethod.CONFIRMED);
    expect(result.breed).toBe('Labrador Retriever');
    expect(result.confidence).toBe(95);
  });

  it('passes the classifier answer to the identifier as the hint', async () => {
    const classifier = new FakeClassifier();
    const identifier = new FakeIdentifier();

    await engineWith(classifier, identifier).analyze({ image, hint: { breed: 'Beagle', confidence: 99 } });

    expect(identifier.identifyCalls).toEqual([{ breed: 'Labrador Retriever', confidence: 91 }]);
  });
});

describe('arbitrate - override threshold uses the self-reported confidence', () => {
  const classifier = classifierPrediction();

  it('overrides at exactly 75 even when jitter pushes it below', () => {
    const decision = arbitrate(classifier, { breed: 'Beagle', confidence: 75 }, 72);
    expect(decision.method).toBe(PredictionMethod.OVERRIDE);
    expect(decision.rawConfidence).toBe(72);
  });

  it('does not override at 74 even when jitter pushes it above', () => {
    const decision = arbitrate(classifier, { breed: 'Beagle', confidence: 74 }, 77);
    expect(decision.method).toBe(PredictionMethod.CONFIRMED);
    expect(decision.breed).toBe('Labrador Retriever');
  });
});

describe('BreedConsensusEngine - degraded paths', () => {
  it('uses the identifier alone when the classifier is down', async () => {
    const classifier = new FakeClassifier();
    classifier.prediction = new ExternalServiceError('classifier', 'network');
    const identifier = new FakeIdentifier();
    identifier.result = identifierResult({ breed: 'Beagle', confidence: 82, alternatives: [] });

    const result = await engineWith(classifier, identifier).analyze({ image, hint: { breed: 'Beagle', confidence: 60 } });

    expect(result.method).toBe(PredictionMethod.OVERRIDE);
    expect(result.breed).toBe('Beagle');
    expect(result.confidence).toBe(82);
    expect(result.classifier).toBeNull();
    expect(identifier.identifyCalls).toEqual([{ breed: 'Beagle', confidence: 60 }]);
  });

  it('fails with a user-safe error when both services are down', async () => {
    const classifier = new FakeClassifier();
    classifier.prediction = new ExternalServiceError('classifier', 'network');
    const identifier = new FakeIdentifier();
    identifier.result = new ExternalServiceError('identifier', 'unavailable');

    const error = await engineWith(classifier, identifier).analyze({ image }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error instanceof AppError && error.code).toBe(ErrorCode.ANALYSIS_UNAVAILABLE);
    expect(error instanceof AppError && error.toJSON().message).toBe('Breed analysis is temporarily unavailable.');
  });

  it('surfaces the identifier error when only the identifier fails', async () => {
    const classifier = new FakeClassifier();
    const identifier = new FakeIdentifier();
    const failure = new ExternalServiceError('identifier', 'quota');
    identifier.result = failure;

    await expect(engineWith(classifier, identifier).analyze({ image })).rejects.toBe(failure);
  });
});

describe('confidence calibration', () => {
  it('clamps the primary into the believable range', () => {
    expect(clampPrimary(100)).toBe(98);
    expect(clampPrimary(40)).toBe(65);
    expect(clampPrimary(83.456)).toBe(83.46);
  });

  it('jitters by at most three points', () => {
    expect(jitter(80, () => 0)).toBe(77);
    expect(jitter(80, () => 0.5)).toBe(80);
    expect(jitter(80, () => 1)).toBe(83);
  });

  it('clamps, de-duplicates and ranks alternatives without the primary', () => {
    const alternatives = calibrateAlternatives('Beagle', [
      { breed: 'Basset Hound', confidence: 95 },
      { breed: 'beagle', confidence: 60 },
      { breed: 'Harrier', confidence: 2 },
      { breed: 'basset hound', confidence: 50 },
      { breed: 'Other Breeds', confidence: 10 },
      { breed: 'Foxhound', confidence: 0 },
      { breed: 'Dachshund', confidence: 40 },
    ]);

    expect(alternatives).toEqual([
      { breed: 'Basset Hound', confidence: 84 },
      { breed: 'Dachshund', confidence: 40 },
      { breed: 'Harrier', confidence: 15 },
    ]);
  });

  it('caps alternatives at five', () => {
    const candidates = ['A', 'B', 'C', 'D', 'E', 'F', 'G'].map((breed, i) => ({ breed, confidence: 70 - i * 5 }));
    const alternatives = calibrateAlternatives('Primary', candidates);
    expect(alternatives.map(a => a.breed)).toEqual(['A', 'B', 'C', 'D', 'E']);
  });

  it('keeps every output inside its range across random inputs', async () => {
    let seed = 7;
    const random = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };

    for (let i = 0; i < 100; i++) {
      const classifier = new FakeClassifier();
      classifier.prediction = classifierPrediction({ confidence: Math.round(random() * 100) });
      const identifier = new FakeIdentifier();
      identifier.result = identifierResult({
        breed: random() > 0.5 ? 'Labrador Retriever' : 'Beagle',
        confidence: Math.round(random() * 100),
        alternatives: [
          { breed: 'Beagle', confidence: Math.round(random() * 100) },
          { breed: 'Harrier', confidence: Math.round(random() * 100) },
          { breed: 'LABRADOR RETRIEVER', confidence: Math.round(random() * 100) },
        ],
      });

      const result = await engineWith(classifier, identifier, random).analyze({ image });

      expect(result.confidence).toBeGreaterThanOrEqual(PRIMARY_CONFIDENCE_RANGE.min);
      expect(result.confidence).toBeLessThanOrEqual(PRIMARY_CONFIDENCE_RANGE.max);
      for (const alt of result.topPredictions) {
        expect(alt.confidence).toBeGreaterThanOrEqual(ALTERNATIVE_CONFIDENCE_RANGE.min);
        expect(alt.confidence).toBeLessThanOrEqual(ALTERNATIVE_CONFIDENCE_RANGE.max);
        expect(alt.breed.toLowerCase()).not.toBe(result.breed.toLowerCase());
      }
    }
  });
});
