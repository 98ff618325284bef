import { emptySimulationData } from '@shared/schema';
import { CacheService } from './cache-service';
import { MemStorage } from './mem-storage';
import { MemoryBlobStore } from './blob-storage';
import { ScanRecords } from './scan-records';
import { scanRecord } from './test-fakes';

async function setup() {
  const storage = new MemStorage(() => new Date('2026-03-01T12:00:00Z'));
  const records = new ScanRecords(storage, new MemoryBlobStore(), new CacheService());
  await storage.createScanResult(scanRecord());
  return { storage, records };
}

describe('ScanRecords.toResponse', () => {
  it('shapes a record for the API', async () => {
    const { records } = await setup();
    const record = await records.get('scan-1');
    if (!record) throw new Error('scan-1 missing');

    const response = records.toResponse({
      ...record,
      simulationData: { ...record.simulationData, '1_years': 'simulations/a.png' },
    });

    expect(response.scan_id).toBe('scan-1');
    expect(response.image).toBe('/api/files/scans/abc.png');
    expect(response.simulation['1_years']).toBe('/api/files/simulations/a.png');
    expect(response.simulation['3_years']).toBeNull();
    expect(response.created_at).toBe('2026-03-01T12:00:00.000Z');
  });
});

describe('ScanRecords.updateSimulation', () => {
  it('drops a move backwards', async () => {
    const { records } = await setup();
    await records.updateSimulation('scan-1', () => emptySimulationData('complete'));

    const moved = await records.updateSimulation('scan-1', () => emptySimulationData('generating'));

    expect(moved).toBeUndefined();
    expect((await records.get('scan-1'))?.simulationData.status).toBe('complete');
  });

  it('allows it when forced', async () => {
    const { records } = await setup();
    await records.updateSimulation('scan-1', () => emptySimulationData('complete'));

    const moved = await records.updateSimulation('scan-1', () => emptySimulationData('queued'), { force: true });

    expect(moved?.simulationData.status).toBe('queued');
  });
});

describe('ScanRecords.getSimulationStatus', () => {
  it('serves the cached payload until a write invalidates it', async () => {
    const { storage, records } = await setup();
    const first = await records.getSimulationStatus('scan-1');
    expect(first?.status).toBe('queued');

    // Written behind the records layer: the cache still answers
    await storage.updateScanResult('scan-1', { simulationData: emptySimulationData('generating') });
    expect((await records.getSimulationStatus('scan-1'))?.status).toBe('queued');

    await records.updateSimulation('scan-1', () => emptySimulationData('complete'));
    const latest = await records.getSimulationStatus('scan-1');
    expect(latest?.status).toBe('complete');
    expect(latest?.progress).toEqual({ completed: 0, total: 2, percentage: 0 });
  });

  it('returns undefined for unknown scans', async () => {
    const { records } = await setup();
    expect(await records.getSimulationStatus('nope')).toBeUndefined();
  });
});
