/**
 * Check request payloads
 *
 * A recurring job carries its request as JSON bytes and hands them to the
 * dispatcher on every tick:
 *   {"name":"pines-june","campground":"232447","arrival":"2024-6-14","departure":"2024-6-16"}
 */
import { z } from "zod";
import { MalformedRequestError } from "./errors";

export const CheckRequestSchema = z.object({
  name: z.string().trim().min(1, "name must not be empty"),
  campground: z.string().trim().min(1, "campground must not be empty"),
  arrival: z.string().trim().min(1, "arrival must not be empty"),
  departure: z.string().trim().min(1, "departure must not be empty"),
});

export type CheckRequest = z.infer<typeof CheckRequestSchema>;

export type CheckPayload = Uint8Array | string;

const decoder = new TextDecoder("utf-8", { fatal: true });
const encoder = new TextEncoder();

/**
 * Decode and validate a check request payload
 */
export function decodeCheckRequest(payload: CheckPayload): CheckRequest {
  let raw: unknown;
  try {
    const text = typeof payload === "string" ? payload : decoder.decode(payload);
    raw = JSON.parse(text);
  } catch (error) {
    throw new MalformedRequestError("Check request is not valid JSON", [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const result = CheckRequestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new MalformedRequestError(`Invalid check request: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

/**
 * Encode a check request as UTF-8 JSON bytes
 */
export function encodeCheckRequest(request: CheckRequest): Uint8Array {
  const { name, campground, arrival, departure } = request;
  return encoder.encode(JSON.stringify({ name, campground, arrival, departure }));
}
