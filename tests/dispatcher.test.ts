/**
 * Request Dispatcher Tests
 *
 * Runs the full check flow against in-process fakes for the availability
 * source, the notifier and the job canceller.
 */
import { test, expect, describe, vi, beforeEach, type Mock } from "vitest";

vi.mock("../src/logger", () => ({
  logger: {
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
  },
}));

import { RequestDispatcher, describeOutcome } from "../src/services/dispatcher";
import { encodeCheckRequest, type CheckRequest } from "../src/request";
import {
  CancellationError,
  FetchError,
  MalformedRequestError,
  NotificationError,
} from "../src/errors";
import { RecreationAPIError } from "../src/sdk/errors";
import type { AvailabilitySource } from "../src/sdk";
import type { AvailabilityNotification, NotificationSender } from "../src/discord/notifications";
import type { JobCanceller } from "../src/services/job-scheduler";
import type { MonthlyAvailability, SiteAvailability } from "../src/matcher";

// ============ Test Data ============

const request: CheckRequest = {
  name: "pines-march",
  campground: "232447",
  arrival: "2024-3-5",
  departure: "2024-3-8",
};

function site(siteId: string, statuses: Record<string, string>): SiteAvailability {
  return { siteId, availabilities: new Map(Object.entries(statuses)) };
}

const marchAvailability: MonthlyAvailability = new Map([
  ["A", site("A", { "2024-03-05": "Available", "2024-03-06": "Available", "2024-03-07": "Available" })],
  ["B", site("B", { "2024-03-05": "Available", "2024-03-06": "Reserved", "2024-03-07": "Available" })],
]);

const payload = (value: unknown) => new TextEncoder().encode(JSON.stringify(value));

// ============ Fakes ============

let calls: string[];
let getMonthAvailability: Mock<AvailabilitySource["getMonthAvailability"]>;
let send: Mock<NotificationSender["send"]>;
let deleteJob: Mock<JobCanceller["deleteJob"]>;
let dispatcher: RequestDispatcher;

beforeEach(() => {
  calls = [];

  getMonthAvailability = vi.fn<AvailabilitySource["getMonthAvailability"]>(async (campgroundId) => {
    calls.push(`fetch:${campgroundId}`);
    return marchAvailability;
  });
  send = vi.fn<NotificationSender["send"]>(async (notification: AvailabilityNotification) => {
    calls.push(`notify:${notification.sites.join(",")}`);
  });
  deleteJob = vi.fn<JobCanceller["deleteJob"]>(async (name) => {
    calls.push(`cancel:${name}`);
  });

  const source: AvailabilitySource = { getMonthAvailability };
  const notifier: NotificationSender = { channel: "test", send };
  const jobs: JobCanceller = { deleteJob };

  dispatcher = new RequestDispatcher({ source, notifier, jobs });
});

// ============ Tests ============

describe("RequestDispatcher", () => {
  describe("successful match", () => {
    test("notifies once, then cancels the job once", async () => {
      const outcome = await dispatcher.handleCheckRequest(encodeCheckRequest(request));

      expect(outcome).toEqual({ status: "notified", request, nightCount: 3, sites: ["A"] });
      expect(send).toHaveBeenCalledTimes(1);
      expect(send).toHaveBeenCalledWith({
        campground: "232447",
        sites: ["A"],
        arrival: "Tue Mar 5",
        departure: "Fri Mar 8",
      });
      expect(deleteJob).toHaveBeenCalledTimes(1);
      expect(deleteJob).toHaveBeenCalledWith("pines-march");
      expect(calls).toEqual(["fetch:232447", "notify:A", "cancel:pines-march"]);
    });

    test("fetches the month containing the arrival", async () => {
      await dispatcher.handleCheckRequest(payload({ ...request, arrival: "2024-3-17", departure: "2024-3-19" }));

      expect(getMonthAvailability).toHaveBeenCalledTimes(1);
      const [campgroundId, anchor] = getMonthAvailability.mock.calls[0];
      expect(campgroundId).toBe("232447");
      expect(anchor.toISODate()).toBe("2024-03-01");
    });

    test("accepts a string payload", async () => {
      const outcome = await dispatcher.handleCheckRequest(JSON.stringify(request));
      expect(outcome.status).toBe("notified");
    });
  });

  describe("no match", () => {
    test("leaves the job scheduled and sends nothing", async () => {
      const outcome = await dispatcher.handleCheckRequest(
        payload({ ...request, arrival: "2024-3-4", departure: "2024-3-6" })
      );

      expect(outcome).toEqual({
        status: "no-match",
        request: { ...request, arrival: "2024-3-4", departure: "2024-3-6" },
        nightCount: 2,
      });
      expect(send).not.toHaveBeenCalled();
      expect(deleteJob).not.toHaveBeenCalled();
    });

    test("a stay with no nights matches nothing and fetches nothing", async () => {
      const outcome = await dispatcher.handleCheckRequest(
        payload({ ...request, arrival: "2024-3-8", departure: "2024-3-5" })
      );

      expect(outcome.status).toBe("no-match");
      expect(outcome.nightCount).toBe(0);
      expect(getMonthAvailability).not.toHaveBeenCalled();
      expect(send).not.toHaveBeenCalled();
    });

    test("nights in the next month never match", async () => {
      const outcome = await dispatcher.handleCheckRequest(
        payload({ ...request, arrival: "2024-3-7", departure: "2024-3-9" })
      );

      expect(outcome.status).toBe("no-match");
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe("malformed requests", () => {
    test("empty name aborts before any collaborator runs", async () => {
      await expect(
        dispatcher.handleCheckRequest(payload({ ...request, name: "" }))
      ).rejects.toBeInstanceOf(MalformedRequestError);

      expect(getMonthAvailability).not.toHaveBeenCalled();
      expect(send).not.toHaveBeenCalled();
      expect(deleteJob).not.toHaveBeenCalled();
    });

    test("undecodable payload aborts", async () => {
      await expect(dispatcher.handleCheckRequest("not json")).rejects.toBeInstanceOf(
        MalformedRequestError
      );
      expect(getMonthAvailability).not.toHaveBeenCalled();
    });

    test("unparseable date aborts instead of using a zero date", async () => {
      await expect(
        dispatcher.handleCheckRequest(payload({ ...request, arrival: "March 5" }))
      ).rejects.toThrow('Invalid arrival "March 5"');
      expect(getMonthAvailability).not.toHaveBeenCalled();
    });
  });

  describe("collaborator failures", () => {
    test("fetch failure becomes FetchError and stops the flow", async () => {
      const upstream = new RecreationAPIError("Availability request failed: 503", 503);
      getMonthAvailability.mockRejectedValueOnce(upstream);

      const error = await dispatcher.handleCheckRequest(encodeCheckRequest(request)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FetchError);
      if (error instanceof FetchError) {
        expect(error.campground).toBe("232447");
        expect(error.cause).toBe(upstream);
      }
      expect(send).not.toHaveBeenCalled();
      expect(deleteJob).not.toHaveBeenCalled();
    });

    test("notification failure still deletes the job", async () => {
      send.mockRejectedValueOnce(new Error("webhook unreachable"));

      await expect(
        dispatcher.handleCheckRequest(encodeCheckRequest(request))
      ).rejects.toBeInstanceOf(NotificationError);

      expect(calls).toEqual(["fetch:232447", "cancel:pines-march"]);
      expect(deleteJob).toHaveBeenCalledTimes(1);
    });

    test("NotificationError from the notifier is passed through", async () => {
      const failure = new NotificationError("1 of 2 notifications did not send");
      send.mockRejectedValueOnce(failure);

      await expect(dispatcher.handleCheckRequest(encodeCheckRequest(request))).rejects.toBe(failure);
      expect(deleteJob).toHaveBeenCalledWith("pines-march");
    });

    test("notification and cancellation failures are reported together", async () => {
      const webhookDown = new Error("webhook unreachable");
      send.mockRejectedValueOnce(webhookDown);
      deleteJob.mockRejectedValueOnce(new Error("scheduler unavailable"));

      const error = await dispatcher.handleCheckRequest(encodeCheckRequest(request)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotificationError);
      if (error instanceof NotificationError) {
        expect(error.message).toBe(
          "Failed to send notification for pines-march: webhook unreachable; " +
            "Failed to delete job pines-march after a match: scheduler unavailable"
        );
        expect(error.failures).toHaveLength(2);
        expect(error.failures[0]).toBe(webhookDown);
        expect(error.failures[1]).toBeInstanceOf(CancellationError);
      }
    });

    test("cancellation failure is reported after the notification was sent", async () => {
      deleteJob.mockRejectedValueOnce(new Error("scheduler unavailable"));

      const error = await dispatcher.handleCheckRequest(encodeCheckRequest(request)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CancellationError);
      if (error instanceof CancellationError) {
        expect(error.jobName).toBe("pines-march");
        expect(error.sites).toEqual(["A"]);
      }
      expect(send).toHaveBeenCalledTimes(1);
      expect(getMonthAvailability).toHaveBeenCalledTimes(1);
    });
  });
});

describe("describeOutcome", () => {
  test("labels both outcomes", () => {
    expect(describeOutcome({ status: "no-match", request, nightCount: 3 })).toBe("no sites available");
    expect(
      describeOutcome({ status: "notified", request, nightCount: 3, sites: ["A", "C"] })
    ).toBe("notified: A,C");
  });
});
