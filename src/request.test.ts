import { test, expect, describe } from "vitest";
import { decodeCheckRequest, encodeCheckRequest, type CheckRequest } from "./request";
import { MalformedRequestError } from "./errors";

const request: CheckRequest = {
  name: "pines-march",
  campground: "232447",
  arrival: "2024-3-5",
  departure: "2024-3-8",
};

const bytes = (value: unknown) => new TextEncoder().encode(JSON.stringify(value));

describe("decodeCheckRequest", () => {
  test("decodes a byte payload", () => {
    expect(decodeCheckRequest(bytes(request))).toEqual(request);
  });

  test("decodes a string payload", () => {
    expect(decodeCheckRequest(JSON.stringify(request))).toEqual(request);
  });

  test("round-trips through encodeCheckRequest", () => {
    expect(decodeCheckRequest(encodeCheckRequest(request))).toEqual(request);
  });

  test("drops unknown fields", () => {
    expect(decodeCheckRequest(bytes({ ...request, priority: 1 }))).toEqual(request);
  });

  test("rejects an empty name", () => {
    expect(() => decodeCheckRequest(bytes({ ...request, name: "" }))).toThrow(MalformedRequestError);
    expect(() => decodeCheckRequest(bytes({ ...request, name: "   " }))).toThrow(
      "name: name must not be empty"
    );
  });

  test("rejects missing fields", () => {
    const { campground: _campground, ...rest } = request;

    try {
      decodeCheckRequest(bytes(rest));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedRequestError);
      if (error instanceof MalformedRequestError) {
        expect(error.issues).toEqual(["campground: Required"]);
      }
    }
  });

  test("rejects invalid JSON instead of continuing with empty values", () => {
    expect(() => decodeCheckRequest("{not json")).toThrow("Check request is not valid JSON");
  });

  test("rejects non-object JSON", () => {
    expect(() => decodeCheckRequest("[]")).toThrow(MalformedRequestError);
    expect(() => decodeCheckRequest("null")).toThrow(MalformedRequestError);
  });

  test("rejects invalid UTF-8", () => {
    expect(() => decodeCheckRequest(new Uint8Array([0xff, 0xfe, 0x7b]))).toThrow(
      MalformedRequestError
    );
  });
});

describe("encodeCheckRequest", () => {
  test("writes only the request fields", () => {
    const text = new TextDecoder().decode(encodeCheckRequest(request));
    expect(text).toBe(
      '{"name":"pines-march","campground":"232447","arrival":"2024-3-5","departure":"2024-3-8"}'
    );
  });
});
