import { z } from "zod";

/**
 * A single campsite's month of availability.
 * Keys of `availabilities` are timestamps like "2024-03-05T00:00:00Z".
 */
export const CampsiteMonthSchema = z.object({
    campsite_id: z.union([z.string(), z.number()]).transform(String),
    site: z.string().optional(),
    loop: z.string().optional(),
    campsite_type: z.string().optional(),
    campsite_reserve_type: z.string().optional(),
    availabilities: z.record(z.string(), z.string()).default({}),
});

/**
 * Response from GET /api/camps/availability/campground/{id}/month
 */
export const CampgroundMonthResponseSchema = z.object({
    campsites: z.record(z.string(), CampsiteMonthSchema).nullish().transform((val) => val ?? {}),
    count: z.number().optional(),
});

export type CampgroundMonthResponse = z.infer<typeof CampgroundMonthResponseSchema>;

/**
 * Request params for the month availability endpoint
 */
export interface MonthAvailabilityParams {
    campground_id: string;
    start_date: string; // yyyy-MM-01T00:00:00.000Z
}
