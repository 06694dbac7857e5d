import { randomUUID } from 'node:crypto';
import type { RawEnvelope } from '../../domain/index.js';
import { processEnvelope } from '../../application/index.js';
import type {
  ExecutionBoundary,
  FinalTrackingStatus,
  ProcessingDeps,
  TrackingHandle,
  TrackingStatus,
} from '../../application/index.js';
import { createLimiter } from '../../shared/limiter.js';
import type { Limiter } from '../../shared/limiter.js';

/**
 * Execution boundary that reconciles inside the current process on a
 * bounded worker pool. Used for `EXECUTION_MODE=inline` and in tests.
 *
 * Handles live in memory only; there is no redelivery, so an unexpected
 * error fails the handle with `InternalError` instead of leaving it pending.
 */
export class InProcessExecutionBoundary implements ExecutionBoundary {
  private readonly handles = new Map<string, TrackingStatus>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly limit: Limiter;

  constructor(
    private readonly deps: ProcessingDeps,
    concurrency: number,
  ) {
    this.limit = createLimiter(concurrency);
  }

  async submit(envelope: RawEnvelope): Promise<TrackingHandle> {
    const id = randomUUID();
    this.handles.set(id, { state: 'pending' });

    const task = this.limit(() => this.run(id, envelope));
    this.inFlight.add(task);
    void task.finally(() => this.inFlight.delete(task));

    return { id };
  }

  async poll(handleId: string): Promise<TrackingStatus | null> {
    return this.handles.get(handleId) ?? null;
  }

  /** Resolves once every submitted envelope has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private async run(id: string, envelope: RawEnvelope): Promise<void> {
    let status: FinalTrackingStatus;
    try {
      status = await processEnvelope(this.deps, envelope, id);
    } catch (err: unknown) {
      this.deps.log.error({ err, handle_id: id }, 'Unexpected failure while reconciling');
      status = {
        state: 'failed',
        reason: 'InternalError',
        message: err instanceof Error ? err.message : String(err),
      };
    }

    if (this.handles.get(id)?.state === 'pending') {
      this.handles.set(id, status);
    }
  }
}
