import { RecomputeJob } from './stats-recomputer';

type JobHandler = (job: RecomputeJob) => Promise<void>;

/**
 * Runs statistics recomputes off the request path. A job that is already
 * waiting for the same user and day is not queued twice.
 */
export class RecomputeQueue {
  private scheduled = new Set<string>();
  private inFlight = new Set<Promise<void>>();

  constructor(private handler: JobHandler) {}

  enqueue(job: RecomputeJob): void {
    const key = `${job.userId}:${job.day}`;
    if (this.scheduled.has(key)) return;
    this.scheduled.add(key);

    const run: Promise<void> = new Promise<void>(resolve => setImmediate(resolve))
      .then(() => {
        this.scheduled.delete(key);
        return this.handler(job);
      })
      .catch(error => {
        console.error(`[recompute] Job ${key} failed:`, error);
      })
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  /** Resolves once every queued job, including ones queued meanwhile, has run. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get size(): number {
    return this.inFlight.size;
  }
}
