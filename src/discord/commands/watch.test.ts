import { test, expect, describe } from "vitest";
import { buildWatchCreatedEmbed } from "./watch";
import type { CheckRequest } from "../../request";

const request: CheckRequest = {
  name: "pines-march",
  campground: "232447",
  arrival: "2024-3-5",
  departure: "2024-3-8",
};

describe("buildWatchCreatedEmbed", () => {
  test("describes the watch and its first check", () => {
    const embed = buildWatchCreatedEmbed({
      request,
      stayLabel: "Tue Mar 5 - Fri Mar 8",
      crossesMonth: false,
      firstCheck: "no sites available",
      checkIntervalMs: 300000,
    });

    expect(embed.data.description).toBe("Watching campground **232447** as **pines-march**");
    expect(embed.data.fields?.map((f) => [f.name, f.value])).toEqual([
      ["Stay", "Tue Mar 5 - Fri Mar 8"],
      ["Check Interval", "5 minutes"],
      ["First Check", "no sites available"],
    ]);
  });

  test("warns when the stay crosses into the next month", () => {
    const embed = buildWatchCreatedEmbed({
      request: { ...request, arrival: "2024-3-30", departure: "2024-4-2" },
      stayLabel: "Sat Mar 30 - Tue Apr 2",
      crossesMonth: true,
      firstCheck: "no sites available",
      checkIntervalMs: 300000,
    });

    const warning = embed.data.fields?.find((f) => f.name === "Warning");
    expect(warning?.value).toBe(
      "This stay crosses into the next month. Only the arrival month is checked, so this watch cannot find a match."
    );
    expect(embed.data.color).toBe(0xf39c12);
  });
});
