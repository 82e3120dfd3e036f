/**
 * Error kinds raised while handling a check request.
 *
 * Each class restores its prototype so `instanceof` survives transpilation.
 */

/**
 * The inbound payload could not be turned into a usable check request
 * (bad JSON, missing fields, empty name, unparseable dates)
 */
export class MalformedRequestError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "MalformedRequestError";
    this.issues = issues;

    Object.setPrototypeOf(this, MalformedRequestError.prototype);
  }
}

/**
 * Month availability could not be retrieved or decoded
 */
export class FetchError extends Error {
  public readonly campground: string;

  constructor(message: string, campground: string, cause?: unknown) {
    super(message, { cause });
    this.name = "FetchError";
    this.campground = campground;

    Object.setPrototypeOf(this, FetchError.prototype);
  }
}

/**
 * One or more notification channels failed to deliver
 */
export class NotificationError extends Error {
  public readonly failures: unknown[];

  constructor(message: string, failures: unknown[] = []) {
    super(message);
    this.name = "NotificationError";
    this.failures = failures;

    Object.setPrototypeOf(this, NotificationError.prototype);
  }
}

/**
 * The recurring job could not be deleted after a match.
 * The job stays active and will check again on its next tick.
 */
export class CancellationError extends Error {
  public readonly jobName: string;
  public readonly sites: string[];

  constructor(message: string, jobName: string, sites: string[], cause?: unknown) {
    super(message, { cause });
    this.name = "CancellationError";
    this.jobName = jobName;
    this.sites = sites;

    Object.setPrototypeOf(this, CancellationError.prototype);
  }
}

export class JobNotFoundError extends Error {
  public readonly jobName: string;

  constructor(jobName: string) {
    super(`No check job named "${jobName}"`);
    this.name = "JobNotFoundError";
    this.jobName = jobName;

    Object.setPrototypeOf(this, JobNotFoundError.prototype);
  }
}

export class JobConflictError extends Error {
  public readonly jobName: string;

  constructor(jobName: string) {
    super(`A check job named "${jobName}" already exists`);
    this.name = "JobConflictError";
    this.jobName = jobName;

    Object.setPrototypeOf(this, JobConflictError.prototype);
  }
}

/**
 * Render an unknown thrown value for logs and user replies
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
