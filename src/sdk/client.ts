import { DateTime } from "luxon";
import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import { HttpsProxyAgent } from "https-proxy-agent";
import { CampgroundMonthResponseSchema } from "./schemas";
import type { CampgroundMonthResponse, MonthAvailabilityParams } from "./schemas";
import { parseWithUnknownFieldDetection } from "./utils/schema-utils";
import { RecreationAPIError } from "./errors";
import { toDateKey, type MonthlyAvailability, type SiteAvailability } from "../matcher";

export const RECREATION_API_BASE = "https://www.recreation.gov";

export interface RecreationClientConfig {
    baseUrl?: string;
    timeoutMs?: number;
    debug?: boolean;
    proxyUrl?: string;
}

/**
 * Where month availability comes from. The dispatcher only sees this.
 */
export interface AvailabilitySource {
    getMonthAvailability(campgroundId: string, anchor: DateTime): Promise<MonthlyAvailability>;
}

/**
 * Type-safe recreation.gov availability client using Axios
 */
export class RecreationClient implements AvailabilitySource {
    private baseUrl: string;
    private timeoutMs: number;
    private debug: boolean;
    private proxyUrl?: string;
    private axiosInstance: AxiosInstance;

    constructor(config: RecreationClientConfig = {}) {
        this.baseUrl = config.baseUrl ?? RECREATION_API_BASE;
        this.timeoutMs = config.timeoutMs ?? 30000;
        this.debug = config.debug ?? false;
        this.proxyUrl = config.proxyUrl;
        this.axiosInstance = this.createAxiosInstance();
    }

    /**
     * Create axios instance with proxy if configured
     */
    private createAxiosInstance(): AxiosInstance {
        const config: AxiosRequestConfig = {
            baseURL: this.baseUrl,
            timeout: this.timeoutMs,
            // Don't throw on non-2xx status codes - we handle them manually
            validateStatus: () => true,
        };

        if (this.proxyUrl) {
            const agent = new HttpsProxyAgent(this.proxyUrl);
            config.httpsAgent = agent;
            config.httpAgent = agent;
        }

        return axios.create(config);
    }

    private getHeaders(): Record<string, string> {
        return {
            "Accept": "application/json, text/plain, */*",
            "User-Agent": "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36",
        };
    }

    /**
     * Throw a typed error for non-2xx responses
     */
    private assertOk(status: number, data: unknown, errorMessage: string): void {
        if (status < 200 || status >= 300) {
            const rawBody = typeof data === "string" ? data : JSON.stringify(data);
            throw new RecreationAPIError(`${errorMessage}: ${status}`, status, rawBody);
        }
    }

    /**
     * Raw month availability for a campground
     * GET /api/camps/availability/campground/{id}/month
     */
    async getCampgroundMonth(params: MonthAvailabilityParams): Promise<CampgroundMonthResponse> {
        const response = await this.axiosInstance.get<unknown>(
            `/api/camps/availability/campground/${encodeURIComponent(params.campground_id)}/month`,
            {
                headers: this.getHeaders(),
                params: { start_date: params.start_date },
            }
        );

        this.assertOk(response.status, response.data, "Availability request failed");

        return this.debug
            ? parseWithUnknownFieldDetection(CampgroundMonthResponseSchema, response.data, "getCampgroundMonth")
            : CampgroundMonthResponseSchema.parse(response.data);
    }

    /**
     * Month availability keyed by site, for the month containing `anchor`
     */
    async getMonthAvailability(campgroundId: string, anchor: DateTime): Promise<MonthlyAvailability> {
        const response = await this.getCampgroundMonth({
            campground_id: campgroundId,
            start_date: formatMonthStart(anchor),
        });
        return toMonthlyAvailability(response);
    }
}

/**
 * The provider wants the first of the month as a UTC timestamp
 */
export function formatMonthStart(anchor: DateTime): string {
    return anchor.toUTC().startOf("month").toFormat("yyyy-MM-dd'T'HH:mm:ss.SSS'Z'");
}

/**
 * Convert a provider response into per-site status maps keyed by "yyyy-MM-dd"
 */
export function toMonthlyAvailability(response: CampgroundMonthResponse): MonthlyAvailability {
    const availability: MonthlyAvailability = new Map();

    for (const [siteId, campsite] of Object.entries(response.campsites)) {
        const statuses = new Map<string, string>();

        for (const [timestamp, status] of Object.entries(campsite.availabilities)) {
            const date = DateTime.fromISO(timestamp, { zone: "utc" });
            if (!date.isValid) {
                throw new RecreationAPIError(
                    `Unrecognized availability date "${timestamp}" for site ${siteId}`,
                    200
                );
            }
            statuses.set(toDateKey(date), status);
        }

        const site: SiteAvailability = {
            siteId,
            campsiteType: campsite.campsite_type,
            availabilities: statuses,
        };
        availability.set(siteId, site);
    }

    return availability;
}
