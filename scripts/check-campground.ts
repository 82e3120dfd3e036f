/**
 * Check a Campground Once
 *
 * Fetches the arrival month for a campground and prints the sites that are
 * free for every night of the stay. Sends no alerts and touches no jobs.
 *
 * Run with: npm run check -- <campground_id> <arrival YYYY-M-D> <departure YYYY-M-D>
 */
import { RecreationClient } from "../src/sdk";
import { buildNights, monthAnchor, parseStay, spansMonths } from "../src/stay";
import { findFullyAvailableSites, toDateKey } from "../src/matcher";

async function main() {
  const [campground, arrival, departure] = process.argv.slice(2);

  if (!campground || !arrival || !departure) {
    console.error("Usage: npm run check -- <campground_id> <arrival YYYY-M-D> <departure YYYY-M-D>");
    console.error("\nExample: npm run check -- 232447 2024-6-14 2024-6-16");
    process.exit(1);
  }

  const stay = parseStay({ arrival, departure });
  const nights = buildNights(stay.arrival, stay.departure);

  console.log("=".repeat(60));
  console.log("CAMPGROUND CHECK");
  console.log("=".repeat(60));
  console.log(`Campground: ${campground}`);
  console.log(`Nights: ${nights.map(toDateKey).join(", ") || "none"}`);
  if (spansMonths(stay)) {
    console.log("Warning: stay crosses a month boundary - only the arrival month is fetched");
  }
  console.log("");

  const client = new RecreationClient({ debug: process.env.DEBUG_SCHEMAS === "true" });
  const availability = await client.getMonthAvailability(campground, monthAnchor(stay.arrival));
  const sites = findFullyAvailableSites(availability, nights);

  console.log(`Sites in month data: ${availability.size}`);
  if (sites.length === 0) {
    console.log("No site is available for every night.");
  } else {
    console.log(`Available for every night (${sites.length}):`);
    for (const siteId of sites) {
      const type = availability.get(siteId)?.campsiteType;
      console.log(`  ${siteId}${type ? ` (${type})` : ""}`);
    }
  }
}

main().catch((error: unknown) => {
  console.error("Check failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
