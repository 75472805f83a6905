/**
 * Scheduler Service
 * Runs background jobs on fixed intervals. A job whose previous run is
 * still in flight is skipped rather than overlapped.
 */
import { errorMessage } from '@cloud-prospector/lib';
import type { ApiLogger } from '../logger';

/** A job resolves to a summary that is logged on completion */
export type JobTask = () => Promise<Record<string, unknown>>;

interface JobState {
  name: string;
  task: JobTask;
  interval: ReturnType<typeof setInterval> | null;
  isRunning: boolean;
}

export class Scheduler {
  private jobs = new Map<string, JobState>();

  constructor(private log: ApiLogger) {}

  /**
   * Register a job and start its interval
   */
  every(name: string, intervalMs: number, task: JobTask): void {
    if (this.jobs.has(name)) {
      throw new Error(`Job ${name} is already scheduled`);
    }

    const job: JobState = { name, task, interval: null, isRunning: false };
    job.interval = setInterval(() => {
      void this.run(job);
    }, intervalMs);
    this.jobs.set(name, job);
  }

  /**
   * Run a registered job now. Resolves to false when it was skipped
   * because a previous run has not finished.
   */
  async runNow(name: string): Promise<boolean> {
    const job = this.jobs.get(name);
    if (!job) {
      throw new Error(`Unknown job ${name}`);
    }
    return this.run(job);
  }

  private async run(job: JobState): Promise<boolean> {
    if (job.isRunning) {
      this.log.jobSkipped({ job: job.name, reason: 'still_running' });
      return false;
    }

    job.isRunning = true;
    const startTime = Date.now();
    try {
      const result = await job.task();
      this.log.jobCompleted({ job: job.name, duration_ms: Date.now() - startTime, result });
    } catch (error) {
      this.log.jobFailed({ job: job.name, error_message: errorMessage(error) });
    } finally {
      job.isRunning = false;
    }
    return true;
  }

  names(): string[] {
    return [...this.jobs.keys()];
  }

  /**
   * Clear every interval. Runs already in flight finish on their own.
   */
  stop(): void {
    for (const job of this.jobs.values()) {
      if (job.interval) {
        clearInterval(job.interval);
        job.interval = null;
      }
    }
    this.jobs.clear();
  }
}
