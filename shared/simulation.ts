import type { SimulationData, SimulationStatus } from './schema';

/**
 * Forward-only order of the age simulation lifecycle.
 * complete and failed are both terminal and share a rank.
 */
const STATUS_RANK: Record<SimulationStatus, number> = {
  pending: 0,
  queued: 1,
  generating: 2,
  complete: 3,
  failed: 3,
};

/**
 * Whether a job may move a record from one status to another.
 * Regenerate bypasses this check on purpose, it is the only backwards move.
 */
export function canTransition(from: SimulationStatus, to: SimulationStatus): boolean {
  if (from === to) return from !== 'complete' && from !== 'failed';
  return STATUS_RANK[to] > STATUS_RANK[from];
}

export function isTerminal(status: SimulationStatus): boolean {
  return status === 'complete' || status === 'failed';
}

export interface SimulationProgress {
  completed: number;
  total: number;
  percentage: number;
}

export function getSimulationProgress(data: Pick<SimulationData, '1_years' | '3_years'>): SimulationProgress {
  const completed = [data['1_years'], data['3_years']].filter(Boolean).length;
  return {
    completed,
    total: 2,
    percentage: (completed / 2) * 100,
  };
}
