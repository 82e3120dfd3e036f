export class RecreationAPIError extends Error {
    public readonly status: number;
    public readonly rawBody?: string;  // Full response body for logging

    constructor(message: string, status: number, rawBody?: string) {
        super(message);
        this.name = "RecreationAPIError";
        this.status = status;
        this.rawBody = rawBody;

        // Ensure proper prototype chain for instanceOf checks
        Object.setPrototypeOf(this, RecreationAPIError.prototype);
    }
}
