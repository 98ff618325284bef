/**
 * Scan Pipeline Tests
 *
 * Runs the full flow over in-memory storage with fake model services.
 */

import { PredictionMethod } from '@shared/schema';
import { AppError, ErrorCode, ExternalServiceError, NotADogError, ValidationError } from './error-handling';
import { computeImageDigest } from './content-hash';
import { classifierPrediction, createTestServices, makePng, scanRecord } from './test-fakes';

async function recordOf(services: ReturnType<typeof createTestServices>, scanId: string) {
  const record = await services.storage.getScanResult(scanId);
  if (!record) throw new Error(`${scanId} not found`);
  return record;
}

describe('ScanPipeline.analyze - fresh analysis', () => {
  it('identifies, stores and queues the age simulation', async () => {
    const services = createTestServices();
    const png = await makePng();

    const { record, source } = await services.pipeline.analyze({ buffer: png, fileName: 'rex.png', userId: null });

    expect(source).toBe('analysis');
    expect(record.breed).toBe('Labrador Retriever');
    expect(record.confidence).toBe(91);
    expect(record.predictionMethod).toBe(PredictionMethod.CONFIRMED);
    expect(record.verificationStatus).toBe('pending');
    expect(record.imagePath).toBe(`scans/${computeImageDigest(png)}.png`);
    expect(record.topPredictions).toEqual([{ breed: 'Golden Retriever', confidence: 40 }]);
    expect(record.simulationData.status).toBe('queued');
    expect(record.simulationData.dog_features?.coatColor).toBe('yellow');
    expect(await services.blobs.exists(record.imagePath)).toBe(true);

    await services.queue.onIdle();
    const finished = await recordOf(services, record.scanId);
    expect(finished.simulationData.status).toBe('complete');
    expect(finished.simulationData['1_years']).not.toBeNull();
  });

  it('rejects photos without a dog before consulting the models', async () => {
    const services = createTestServices();
    services.identifier.dog = false;

    await expect(services.pipeline.analyze({ buffer: await makePng(), userId: null })).rejects.toBeInstanceOf(NotADogError);

    expect(services.classifier.predictCalls).toBe(0);
    expect(services.blobs.paths()).toEqual([]);
    expect(await services.storage.getScanResults(null)).toEqual([]);
  });

  it('lets the request through when the dog check itself fails', async () => {
    const services = createTestServices();
    services.identifier.dog = new ExternalServiceError('identifier', 'timeout');

    const { source } = await services.pipeline.analyze({ buffer: await makePng(), userId: null });

    expect(source).toBe('analysis');
    await services.queue.onIdle();
  });

  it('rejects invalid uploads without storing anything', async () => {
    const services = createTestServices();

    await expect(services.pipeline.analyze({ buffer: Buffer.from('not an image'), userId: null })).rejects.toBeInstanceOf(ValidationError);
    expect(services.blobs.paths()).toEqual([]);
  });

  it('stores nothing when both models are down', async () => {
    const services = createTestServices();
    services.classifier.prediction = new ExternalServiceError('classifier', 'network');
    services.identifier.result = new ExternalServiceError('identifier', 'unavailable');

    const error = await services.pipeline.analyze({ buffer: await makePng(), userId: null }).catch((e: unknown) => e);

    expect(error instanceof AppError && error.code).toBe(ErrorCode.ANALYSIS_UNAVAILABLE);
    expect(services.blobs.paths()).toEqual([]);
  });
});

describe('ScanPipeline.analyze - reuse by content', () => {
  it('reuses a good earlier answer without calling the models', async () => {
    const services = createTestServices();
    const png = await makePng();
    const first = await services.pipeline.analyze({ buffer: png, userId: null });
    await services.queue.onIdle();
    const firstSim = (await recordOf(services, first.record.scanId)).simulationData;

    const second = await services.pipeline.analyze({ buffer: png, userId: null });

    expect(second.source).toBe('cache');
    expect(second.record.scanId).not.toBe(first.record.scanId);
    expect(second.record.breed).toBe('Labrador Retriever');
    expect(second.record.confidence).toBe(91);
    expect(second.record.predictionMethod).toBe(PredictionMethod.EXACT_MATCH);
    expect(second.record.imagePath).toBe(first.record.imagePath);
    expect(second.record.simulationData).toEqual(firstSim);
    expect(services.classifier.predictCalls).toBe(1);
    expect(services.identifier.dogChecks).toBe(1);
    expect(services.generator.prompts).toHaveLength(2);
  });

  it('writes the image again when its file went missing', async () => {
    const services = createTestServices();
    const png = await makePng();
    const first = await services.pipeline.analyze({ buffer: png, userId: null });
    await services.queue.onIdle();
    await services.blobs.delete(first.record.imagePath);

    const second = await services.pipeline.analyze({ buffer: png, userId: null });

    expect(second.record.imagePath).toBe(first.record.imagePath);
    expect(await services.blobs.exists(first.record.imagePath)).toBe(true);
    expect(await services.blobs.get(first.record.imagePath)).toEqual(png);
  });

  it('re-runs analysis over a low-quality answer and hints with it when the classifier is down', async () => {
    const services = createTestServices();
    const png = await makePng();
    await services.storage.createScanResult(scanRecord({
      scanId: 'weak-1',
      imageHash: computeImageDigest(png),
      breed: 'Beagle',
      confidence: 60,
      predictionMethod: PredictionMethod.MODEL,
    }));
    services.classifier.prediction = new ExternalServiceError('classifier', 'network');

    const { source, record } = await services.pipeline.analyze({ buffer: png, userId: null });

    expect(source).toBe('analysis');
    expect(services.identifier.identifyCalls).toEqual([{ breed: 'Beagle', confidence: 60 }]);
    expect(record.predictionMethod).toBe(PredictionMethod.OVERRIDE);
    await services.queue.onIdle();
  });
});

describe('ScanPipeline.analyze - human corrections', () => {
  it('answers with the corrected breed for the same bytes', async () => {
    const services = createTestServices();
    const png = await makePng();
    const first = await services.pipeline.analyze({ buffer: png, userId: null });
    await services.queue.onIdle();
    await services.corrections.correctBreed(first.record.scanId, 'Golden Retriever');

    const again = await services.pipeline.analyze({ buffer: png, userId: null });

    expect(again.source).toBe('correction');
    expect(again.record.breed).toBe('Golden Retriever');
    expect(again.record.confidence).toBe(100);
    expect(again.record.verificationStatus).toBe('verified');
    expect(again.record.predictionMethod).toBe(PredictionMethod.ADMIN_CORRECTED);
    expect(again.record.simulationData.status).toBe('complete');
    expect(services.classifier.predictCalls).toBe(1);
    expect(services.identifier.dogChecks).toBe(1);
  });

  it('keeps the verified answer after its correction is deleted', async () => {
    const services = createTestServices();
    const png = await makePng();
    const first = await services.pipeline.analyze({ buffer: png, userId: null });
    await services.queue.onIdle();
    const { correction } = await services.corrections.correctBreed(first.record.scanId, 'Golden Retriever');
    await services.corrections.delete(correction.id);
    services.classifier.prediction = classifierPrediction({ breed: 'Beagle', confidence: 97 });

    const again = await services.pipeline.analyze({ buffer: png, userId: null });

    expect(again.source).toBe('cache');
    expect(again.record.breed).toBe('Golden Retriever');
    expect(again.record.confidence).toBe(100);
    expect(again.record.verificationStatus).toBe('verified');
    expect(services.classifier.predictCalls).toBe(1);
    const original = await recordOf(services, first.record.scanId);
    expect(original.breed).toBe('Golden Retriever');
    expect(original.verificationStatus).toBe('verified');
  });

  it('leaves the verified breed alone when the simulation is regenerated', async () => {
    const services = createTestServices();
    const first = await services.pipeline.analyze({ buffer: await makePng(), userId: null });
    await services.queue.onIdle();
    await services.corrections.correctBreed(first.record.scanId, 'Golden Retriever');

    await services.pipeline.regenerateSimulation(first.record.scanId);
    await services.queue.onIdle();

    const record = await recordOf(services, first.record.scanId);
    expect(record.breed).toBe('Golden Retriever');
    expect(record.confidence).toBe(100);
    expect(record.verificationStatus).toBe('verified');
    expect(record.simulationData.status).toBe('complete');
  });
});

describe('ScanPipeline.regenerateSimulation', () => {
  it('resets to queued, drops the old variants and generates new ones', async () => {
    const services = createTestServices();
    const { record } = await services.pipeline.analyze({ buffer: await makePng(), userId: null });
    await services.queue.onIdle();
    const before = (await recordOf(services, record.scanId)).simulationData;

    const reset = await services.pipeline.regenerateSimulation(record.scanId);

    expect(reset.status).toBe('queued');
    expect(reset['1_years']).toBeNull();
    expect(reset.error).toBeNull();
    expect(await services.blobs.exists(before['1_years'] ?? '')).toBe(false);

    await services.queue.onIdle();
    const after = (await recordOf(services, record.scanId)).simulationData;
    expect(after.status).toBe('complete');
    expect(after['1_years']).not.toBe(before['1_years']);
  });

  it('keeps variants another record still shows', async () => {
    const services = createTestServices();
    const png = await makePng();
    const first = await services.pipeline.analyze({ buffer: png, userId: null });
    await services.queue.onIdle();
    const shared = (await recordOf(services, first.record.scanId)).simulationData;
    const second = await services.pipeline.analyze({ buffer: png, userId: null });

    await services.pipeline.regenerateSimulation(second.record.scanId);
    await services.queue.onIdle();

    expect(await services.blobs.exists(shared['1_years'] ?? '')).toBe(true);
    expect(await services.blobs.exists(shared['3_years'] ?? '')).toBe(true);
  });

  it('fails for unknown scans', async () => {
    const services = createTestServices();
    await expect(services.pipeline.regenerateSimulation('nope')).rejects.toMatchObject({ code: ErrorCode.SCAN_NOT_FOUND });
  });
});

describe('ScanPipeline.deleteScan', () => {
  it('removes files only once nothing references them', async () => {
    const services = createTestServices();
    const png = await makePng();
    const first = await services.pipeline.analyze({ buffer: png, userId: null });
    await services.queue.onIdle();
    const second = await services.pipeline.analyze({ buffer: png, userId: null });
    const files = services.blobs.paths();
    expect(files).toHaveLength(3);

    await services.pipeline.deleteScan(first.record.scanId);
    expect(services.blobs.paths()).toEqual(files);

    await services.pipeline.deleteScan(second.record.scanId);
    expect(services.blobs.paths()).toEqual([]);
    expect(await services.storage.getScanResult(second.record.scanId)).toBeUndefined();
  });
});
