// Main client export
export {
    RecreationClient,
    formatMonthStart,
    toMonthlyAvailability,
    type AvailabilitySource,
    type RecreationClientConfig,
} from "./client";

// Error exports
export { RecreationAPIError } from "./errors";

// Schema exports
export * from "./schemas";

// Utility exports
export * from "./utils/schema-utils";
