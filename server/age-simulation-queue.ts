import { getSimulationProgress } from "@shared/simulation";
import { AppError, ErrorCode, JobTimeoutError, errorMessage, toAppError } from "./error-handling";
import { retryWithBackoff, withTimeout, type Sleep } from "./retry-strategy";
import type { AgeSimulationJob, JobOutcome } from "./age-simulation-job";
import type { ScanRecords } from "./scan-records";

export interface AgeSimulationQueueOptions {
  concurrency: number;
  jobTimeoutMs: number;
  jobAttempts: number;
  retryDelayMs?: number;
  sleep?: Sleep;
}

/**
 * In-process worker queue for age simulations. Enqueueing never waits on
 * the job; at most `concurrency` jobs run at once, and never two for the
 * same scan. A request for a scan that is already waiting is dropped; one
 * for a running scan aborts that run and queues a fresh one.
 */
export class AgeSimulationQueue {
  private readonly pending: string[] = [];
  private readonly running = new Map<string, AbortController>();
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly job: AgeSimulationJob,
    private readonly records: ScanRecords,
    private readonly options: AgeSimulationQueueOptions,
  ) {}

  enqueue(scanId: string): void {
    if (this.pending.includes(scanId)) {
      console.log(`[AgeSimulationQueue] ${scanId} is already waiting`);
      return;
    }
    const current = this.running.get(scanId);
    if (current) {
      console.log(`[AgeSimulationQueue] Superseding the running job for ${scanId}`);
      current.abort(new AppError(ErrorCode.SIMULATION_SUPERSEDED, undefined, { scanId }));
    }

    this.pending.push(scanId);
    console.log(`[AgeSimulationQueue] Queued ${scanId} (${this.pending.length} waiting, ${this.running.size} running)`);
    this.drain();
  }

  get size(): { waiting: number; running: number } {
    return { waiting: this.pending.length, running: this.running.size };
  }

  /**
   * Resolves once nothing is waiting or running
   */
  onIdle(): Promise<void> {
    if (this.running.size === 0 && this.pending.length === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.running.size < this.options.concurrency) {
      // A superseded run still winding down holds its scan back
      const index = this.pending.findIndex(scanId => !this.running.has(scanId));
      if (index === -1) break;
      const [scanId] = this.pending.splice(index, 1);
      const superseded = new AbortController();
      this.running.set(scanId, superseded);
      void this.process(scanId, superseded.signal).finally(() => {
        this.running.delete(scanId);
        this.drain();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (this.running.size > 0 || this.pending.length > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    waiters.forEach(resolve => resolve());
  }

  private async runOnce(scanId: string, superseded: AbortSignal): Promise<JobOutcome> {
    superseded.throwIfAborted();
    const controller = new AbortController();
    const forward = () => controller.abort(superseded.reason);
    superseded.addEventListener('abort', forward, { once: true });
    try {
      return await withTimeout(
        this.job.run(scanId, controller.signal),
        this.options.jobTimeoutMs,
        (ms) => new JobTimeoutError(ms),
        () => controller.abort(new JobTimeoutError(this.options.jobTimeoutMs)),
      );
    } finally {
      superseded.removeEventListener('abort', forward);
    }
  }

  // Never rejects: the final failure is written to the record
  private async process(scanId: string, superseded: AbortSignal): Promise<void> {
    try {
      await retryWithBackoff(
        () => this.runOnce(scanId, superseded),
        {
          maxRetries: this.options.jobAttempts - 1,
          initialDelayMs: this.options.retryDelayMs ?? 5000,
          jitter: false,
          ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
          onRetry: (attempt, delay, error) => {
            console.warn(`[AgeSimulationQueue] ${scanId} attempt ${attempt} failed, retrying in ${delay}ms: ${error.message}`);
          },
        },
      );
    } catch (error) {
      if (superseded.aborted) {
        console.log(`[AgeSimulationQueue] ${scanId} run superseded, leaving the record to the next run`);
        return;
      }
      const appError = toAppError(error);
      console.error(`[AgeSimulationQueue] ${scanId} failed: ${errorMessage(appError.originalError ?? appError)}`);
      try {
        await this.records.updateSimulation(scanId, (current) => {
          // Partial success is success, even when the job ran out of time
          if (getSimulationProgress(current).completed > 0) {
            console.warn(`[AgeSimulationQueue] ${scanId} keeps its saved variants`);
            return { ...current, status: 'complete', error: null };
          }
          return { ...current, status: 'failed', error: appError.message };
        });
      } catch (writeError) {
        console.error(`[AgeSimulationQueue] Could not record failure for ${scanId}: ${errorMessage(writeError)}`);
      }
    }
  }
}
