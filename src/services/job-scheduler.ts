/**
 * Check Job Scheduler
 *
 * Keeps recurring check jobs in memory and re-triggers each one on a fixed
 * interval until it is deleted. A job's request travels as the same encoded
 * payload an external trigger would deliver.
 */
import { encodeCheckRequest, type CheckPayload, type CheckRequest } from "../request";
import { JobConflictError, JobNotFoundError, describeError } from "../errors";
import { logger } from "../logger";

// Default: check every 5 minutes
const DEFAULT_INTERVAL_MS = 5 * 60 * 1000;

/**
 * A recurring check job
 */
export interface CheckJob {
  name: string;
  request: CheckRequest;
  createdAt: Date;
  createdBy?: string; // Discord user ID
  lastRunAt: Date | null;
  runCount: number;
  lastOutcome: string | null;
}

/**
 * Deletes a recurring job once its stay has been found
 */
export interface JobCanceller {
  deleteJob(name: string): Promise<void>;
}

/**
 * Invoked on every tick with the job's encoded request.
 * Resolves to a short outcome label for status displays.
 */
export type JobTrigger = (payload: CheckPayload) => Promise<string>;

export interface CheckJobSchedulerConfig {
  intervalMs?: number;
  onTrigger: JobTrigger;
}

/**
 * Scheduler class that manages recurring check timers
 */
export class CheckJobScheduler implements JobCanceller {
  private jobs = new Map<string, CheckJob>();
  private timers = new Map<string, ReturnType<typeof setInterval>>();
  private inFlight = new Set<CheckJob>();
  private intervalMs: number;
  private onTrigger: JobTrigger;

  constructor(config: CheckJobSchedulerConfig) {
    this.intervalMs = config.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.onTrigger = config.onTrigger;
  }

  /**
   * Register a job and start its timer
   */
  createJob(request: CheckRequest, createdBy?: string): CheckJob {
    if (this.jobs.has(request.name)) {
      throw new JobConflictError(request.name);
    }

    const job: CheckJob = {
      name: request.name,
      request: { ...request },
      createdAt: new Date(),
      createdBy,
      lastRunAt: null,
      runCount: 0,
      lastOutcome: null,
    };
    this.jobs.set(job.name, job);

    const timer = setInterval(() => {
      this.runJob(job.name).catch((error: unknown) => {
        logger.error({ job: job.name, error: describeError(error) }, "Check job tick failed");
      });
    }, this.intervalMs);
    this.timers.set(job.name, timer);

    logger.info(
      {
        job: job.name,
        campground: request.campground,
        arrival: request.arrival,
        departure: request.departure,
        intervalMs: this.intervalMs,
      },
      "Scheduled check job"
    );

    return { ...job };
  }

  /**
   * Stop and remove a job
   */
  async deleteJob(name: string): Promise<void> {
    if (!this.jobs.has(name)) {
      throw new JobNotFoundError(name);
    }

    const timer = this.timers.get(name);
    if (timer) {
      clearInterval(timer);
      this.timers.delete(name);
    }
    this.jobs.delete(name);

    logger.info({ job: name }, "Deleted check job");
  }

  /**
   * Snapshot of all jobs, sorted by name
   */
  listJobs(): CheckJob[] {
    return Array.from(this.jobs.values())
      .map((job) => ({ ...job }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  getJob(name: string): CheckJob | undefined {
    const job = this.jobs.get(name);
    return job ? { ...job } : undefined;
  }

  /**
   * Run one check for a job now. Skipped while the previous run of the
   * same job is still in flight; a job re-created under a deleted job's
   * name does not wait on the old run. Trigger failures are logged and recorded
   * on the job, then resolved.
   */
  async runJob(name: string): Promise<void> {
    const job = this.jobs.get(name);
    if (!job) {
      throw new JobNotFoundError(name);
    }

    if (this.inFlight.has(job)) {
      logger.debug({ job: name }, "Previous check still running - skipping tick");
      return;
    }

    this.inFlight.add(job);
    job.lastRunAt = new Date();
    job.runCount += 1;

    try {
      job.lastOutcome = await this.onTrigger(encodeCheckRequest(job.request));
    } catch (error) {
      job.lastOutcome = `failed: ${describeError(error)}`;
      logger.error(
        {
          job: name,
          errorName: error instanceof Error ? error.name : undefined,
          error: describeError(error),
        },
        "Check job run failed"
      );
    } finally {
      this.inFlight.delete(job);
    }
  }

  /**
   * Log every scheduled job (diagnostic only)
   */
  logJobs(): void {
    const jobs = this.listJobs();
    logger.info(
      {
        jobCount: jobs.length,
        jobs: jobs.map((j) => ({
          name: j.name,
          campground: j.request.campground,
          stay: `${j.request.arrival} -> ${j.request.departure}`,
          runs: j.runCount,
          lastOutcome: j.lastOutcome,
        })),
      },
      "Scheduled check jobs"
    );
  }

  /**
   * Stop every timer; jobs are kept so status can still be read
   */
  stop(): void {
    for (const [name, timer] of this.timers) {
      clearInterval(timer);
      this.timers.delete(name);
    }
    logger.info("Check job scheduler stopped");
  }

  getStatus(): { jobCount: number; activeTimers: number; inFlight: number } {
    return {
      jobCount: this.jobs.size,
      activeTimers: this.timers.size,
      inFlight: this.inFlight.size,
    };
  }
}
