import { ErrorCode, ExternalServiceError } from './error-handling';
import { createTestServices, makePng } from './test-fakes';

const OWNER = { id: 7, username: 'owner', email: 'owner@example.test' };

async function analyzedScan(services: ReturnType<typeof createTestServices>, userId: number | null = null, color = { r: 10, g: 20, b: 30 }) {
  const { record } = await services.pipeline.analyze({ buffer: await makePng(32, 32, color), userId });
  await services.queue.onIdle();
  return record;
}

describe('CorrectionService.correctBreed', () => {
  it('verifies the scan, teaches the classifier and notifies the owner', async () => {
    const services = createTestServices();
    services.storage.addUser(OWNER);
    const scan = await analyzedScan(services, OWNER.id);

    const outcome = await services.corrections.correctBreed(scan.scanId, '  Golden Retriever ');

    expect(outcome.scan.breed).toBe('Golden Retriever');
    expect(outcome.scan.verificationStatus).toBe('verified');
    expect(outcome.correction.originalBreed).toBe('Labrador Retriever');
    expect(outcome.correction.imageHash).toBe(scan.imageHash);
    expect(outcome.correction.status).toBe('added');
    expect(outcome.teaching).toEqual({ status: 'added', message: 'Example added to memory', failed: false });
    expect(outcome.message).toBe('Correction saved and the classifier learned from it.');
    expect(services.classifier.learned).toEqual([{ breed: 'Golden Retriever', fileName: `${scan.scanId}.jpg` }]);

    const notifications = await services.storage.getNotifications(OWNER.id);
    expect(notifications).toHaveLength(1);
    expect(notifications[0].type).toBe('scan_verified');
    expect(notifications[0].message).toBe('A reviewer confirmed the breed in your scan as Golden Retriever.');
    expect(notifications[0].data).toEqual({ scanId: scan.scanId, breed: 'Golden Retriever' });
  });

  it('keeps the correction when teaching fails', async () => {
    const services = createTestServices();
    const scan = await analyzedScan(services);
    services.classifier.teaching = new ExternalServiceError('classifier', 'network');

    const outcome = await services.corrections.correctBreed(scan.scanId, 'Beagle');

    expect(outcome.teaching.failed).toBe(true);
    expect(outcome.teaching.status).toBe('error');
    expect(outcome.teaching.message).toBe('Our quick breed scanner is temporarily unavailable.');
    expect(outcome.message).toBe('Correction saved, but the classifier could not learn from it. Retry teaching from the corrections list.');
    const stored = await services.storage.getCorrection(outcome.correction.id);
    expect(stored?.status).toBe('error');
    expect((await services.storage.getScanResult(scan.scanId))?.breed).toBe('Beagle');
  });

  it('reports an image the classifier already knew', async () => {
    const services = createTestServices();
    const scan = await analyzedScan(services);
    services.classifier.teaching = { status: 'skipped', message: 'Already in memory' };

    const outcome = await services.corrections.correctBreed(scan.scanId, 'Beagle');

    expect(outcome.message).toBe('Correction saved. The classifier already knew this image.');
  });

  it('still resolves when the teaching status cannot be recorded', async () => {
    const services = createTestServices();
    const scan = await analyzedScan(services);
    vi.spyOn(services.storage, 'updateCorrectionTeaching').mockRejectedValue(new Error('db down'));

    const outcome = await services.corrections.correctBreed(scan.scanId, 'Beagle');

    expect(outcome.scan.verificationStatus).toBe('verified');
    expect(outcome.teaching).toEqual({ status: 'added', message: 'Example added to memory', failed: false });
    expect((await services.storage.getCorrection(outcome.correction.id))?.status).toBe('pending');
  });

  it('fails for unknown scans', async () => {
    const services = createTestServices();
    await expect(services.corrections.correctBreed('nope', 'Beagle')).rejects.toMatchObject({ code: ErrorCode.SCAN_NOT_FOUND });
  });
});

describe('CorrectionService.reteach', () => {
  it('retries teaching and records the new status', async () => {
    const services = createTestServices();
    const scan = await analyzedScan(services);
    services.classifier.teaching = new ExternalServiceError('classifier', 'network');
    const { correction } = await services.corrections.correctBreed(scan.scanId, 'Beagle');
    services.classifier.teaching = { status: 'updated', message: 'Example updated' };

    const retried = await services.corrections.reteach(correction.id);

    expect(retried.teaching).toEqual({ status: 'updated', message: 'Example updated', failed: false });
    expect(retried.correction.status).toBe('updated');
    expect((await services.storage.getCorrection(correction.id))?.teachingMessage).toBe('Example updated');
  });

  it('fails for unknown corrections', async () => {
    const services = createTestServices();
    await expect(services.corrections.reteach(999)).rejects.toMatchObject({ code: ErrorCode.CORRECTION_NOT_FOUND });
  });
});

describe('CorrectionService listing and cleanup', () => {
  it('summarizes the training queue', async () => {
    const services = createTestServices();
    const corrected = await analyzedScan(services, null, { r: 10, g: 20, b: 30 });
    const open = await analyzedScan(services, null, { r: 200, g: 20, b: 30 });
    await services.corrections.correctBreed(corrected.scanId, 'Beagle');

    const queue = await services.corrections.trainingQueue();

    expect(queue.stats).toEqual({ pending: 1, added: 1 });
    expect(queue.scans.map(scan => scan.scanId)).toEqual([open.scanId]);
    expect(queue.corrections.map(c => c.correctedBreed)).toEqual(['Beagle']);
  });

  it('deletes a correction but leaves the scan verified', async () => {
    const services = createTestServices();
    const scan = await analyzedScan(services);
    const { correction } = await services.corrections.correctBreed(scan.scanId, 'Beagle');

    await services.corrections.delete(correction.id);

    expect(await services.corrections.list()).toEqual([]);
    expect((await services.storage.getScanResult(scan.scanId))?.verificationStatus).toBe('verified');
    await expect(services.corrections.delete(correction.id)).rejects.toMatchObject({ code: ErrorCode.CORRECTION_NOT_FOUND });
  });

  it('passes classifier memory stats through', async () => {
    const services = createTestServices();
    expect(await services.corrections.classifierStats()).toEqual({ total_examples: 3 });
  });
});
