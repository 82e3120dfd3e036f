import { z } from "zod";
import { logger } from "../../logger";

/**
 * Parse data with a schema and log any unknown top-level fields.
 * Helps discover undocumented provider fields that should be added to schemas.
 */
export function parseWithUnknownFieldDetection<T extends z.AnyZodObject>(
    schema: T,
    data: unknown,
    context?: string
): z.output<T> {
    const result: z.output<T> = schema.parse(data);

    if (typeof data === "object" && data !== null) {
        const unknownFields = findUnknownFields(schema, data);

        if (unknownFields.length > 0) {
            logger.warn(
                { context, unknownFields },
                "Unknown fields detected in provider response"
            );
        }
    }

    return result;
}

/**
 * List keys of `data` that the schema does not declare
 */
export function findUnknownFields<T extends z.AnyZodObject>(
    schema: T,
    data: object
): string[] {
    const knownKeys = new Set(Object.keys(schema.shape));
    return Object.keys(data).filter((key) => !knownKeys.has(key));
}
