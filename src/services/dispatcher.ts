/**
 * Request Dispatcher
 *
 * Handles one check request end to end:
 * 1. Decode the payload into a CheckRequest
 * 2. Parse the stay, build the nights, derive the month anchor
 * 3. Fetch the arrival month's availability
 * 4. Match sites free for every night
 * 5. On a match, notify, then delete the recurring job
 *
 * Every call is a fresh one-shot attempt. Failures are thrown to the
 * caller; nothing is retried here. The job is deleted after a match even
 * when the notification failed, so a match never runs twice.
 */
import type { DateTime } from "luxon";
import { decodeCheckRequest, type CheckPayload, type CheckRequest } from "../request";
import { buildNights, formatStayDate, monthAnchor, parseStay, spansMonths } from "../stay";
import { findFullyAvailableSites, type MonthlyAvailability } from "../matcher";
import {
  CancellationError,
  FetchError,
  NotificationError,
  describeError,
} from "../errors";
import type { AvailabilitySource } from "../sdk";
import type { NotificationSender } from "../discord/notifications";
import type { JobCanceller } from "./job-scheduler";
import { logger } from "../logger";

export type CheckOutcome =
  | {
      status: "no-match";
      request: CheckRequest;
      nightCount: number;
    }
  | {
      status: "notified";
      request: CheckRequest;
      nightCount: number;
      sites: string[];
    };

export interface RequestDispatcherConfig {
  source: AvailabilitySource;
  notifier: NotificationSender;
  jobs: JobCanceller;
}

export class RequestDispatcher {
  private source: AvailabilitySource;
  private notifier: NotificationSender;
  private jobs: JobCanceller;

  constructor(config: RequestDispatcherConfig) {
    this.source = config.source;
    this.notifier = config.notifier;
    this.jobs = config.jobs;
  }

  /**
   * Run one availability check for an encoded request
   */
  async handleCheckRequest(payload: CheckPayload): Promise<CheckOutcome> {
    const request = decodeCheckRequest(payload);
    const stay = parseStay(request);

    // A departure on or before arrival gives no nights, and no nights
    // matches no sites: the job stays scheduled and nobody is notified.
    const nights = buildNights(stay.arrival, stay.departure);
    const anchor = monthAnchor(stay.arrival);

    if (nights.length === 0) {
      logger.warn(
        { job: request.name, arrival: request.arrival, departure: request.departure },
        "Stay has no nights - nothing can match"
      );
      return { status: "no-match", request, nightCount: 0 };
    }

    if (spansMonths(stay)) {
      logger.warn(
        { job: request.name, arrival: request.arrival, departure: request.departure },
        "Stay crosses into the next month - only the arrival month is checked"
      );
    }

    const availability = await this.fetchMonth(request.campground, anchor);

    const sites = findFullyAvailableSites(availability, nights);

    logger.info(
      {
        job: request.name,
        campground: request.campground,
        nights: nights.length,
        sitesChecked: availability.size,
        sitesAvailable: sites.length,
      },
      "Availability check complete"
    );

    if (sites.length === 0) {
      return { status: "no-match", request, nightCount: nights.length };
    }

    const notifyFailure = await this.notify(request, sites, stay.arrival, stay.departure);

    try {
      await this.cancelJob(request.name, sites);
    } catch (cancelError) {
      if (!notifyFailure) throw cancelError;
      throw new NotificationError(
        `${notifyFailure.message}; ${describeError(cancelError)}`,
        [...notifyFailure.failures, cancelError]
      );
    }

    if (notifyFailure) throw notifyFailure;

    return { status: "notified", request, nightCount: nights.length, sites };
  }

  private async fetchMonth(campground: string, anchor: DateTime): Promise<MonthlyAvailability> {
    try {
      return await this.source.getMonthAvailability(campground, anchor);
    } catch (error) {
      throw new FetchError(
        `Failed to fetch availability for campground ${campground}: ${describeError(error)}`,
        campground,
        error
      );
    }
  }

  /**
   * Resolves to the failure instead of throwing, so the job is still deleted
   */
  private async notify(
    request: CheckRequest,
    sites: string[],
    arrival: DateTime,
    departure: DateTime
  ): Promise<NotificationError | undefined> {
    try {
      await this.notifier.send({
        campground: request.campground,
        sites,
        arrival: formatStayDate(arrival),
        departure: formatStayDate(departure),
      });
    } catch (error) {
      const failure =
        error instanceof NotificationError
          ? error
          : new NotificationError(
              `Failed to send notification for ${request.name}: ${describeError(error)}`,
              [error]
            );
      logger.error(
        { job: request.name, campground: request.campground, sites, error: failure.message },
        "Notification failed - deleting the job anyway"
      );
      return failure;
    }

    logger.info(
      { job: request.name, campground: request.campground, sites },
      "Notified about available sites"
    );
    return undefined;
  }

  private async cancelJob(jobName: string, sites: string[]): Promise<void> {
    try {
      await this.jobs.deleteJob(jobName);
    } catch (error) {
      throw new CancellationError(
        `Failed to delete job ${jobName} after a match: ${describeError(error)}`,
        jobName,
        sites,
        error
      );
    }
  }
}

/**
 * Short label for an outcome, shown in job status
 */
export function describeOutcome(outcome: CheckOutcome): string {
  switch (outcome.status) {
    case "no-match":
      return "no sites available";
    case "notified":
      return `notified: ${outcome.sites.join(",")}`;
  }
}
