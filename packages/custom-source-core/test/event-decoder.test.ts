import { describe, expect, it } from "vitest";
import {
  decodeDataRequestParameters,
  decodeVideoEvent,
} from "../src/events/event-decoder.js";
import {
  toBufferedRanges,
  durationRangeToString,
} from "../src/events/duration-range.js";
import { CustomSourceError, isCustomSourceError } from "../src/types.js";

function decodeError(payload: unknown) {
  try {
    decodeVideoEvent(payload);
  } catch (error) {
    return error;
  }
  throw new Error("Payload decoded without error");
}

const validRequest = {
  id: "r1",
  url: "http://x/a",
  headers: { Range: "bytes=0-99" },
  finished: "false",
  canceled: "false",
  data_length: 100,
  data_offset: 0,
  data_request_all: "false",
};

describe("decodeVideoEvent", () => {
  it("decodes initialized events", () => {
    expect(
      decodeVideoEvent({
        event: "initialized",
        duration: 5000,
        width: 1920,
        height: 1080.5,
      }),
    ).toEqual({
      type: "initialized",
      duration: 5000,
      size: { width: 1920, height: 1080.5 },
    });
  });

  it("defaults width and height to 0 when absent or null", () => {
    expect(decodeVideoEvent({ event: "initialized", duration: 10 })).toEqual({
      type: "initialized",
      duration: 10,
      size: { width: 0, height: 0 },
    });
    expect(
      decodeVideoEvent({
        event: "initialized",
        duration: 10,
        width: null,
        height: 720,
      }),
    ).toEqual({
      type: "initialized",
      duration: 10,
      size: { width: 0, height: 720 },
    });
  });

  it("passes a negative duration through", () => {
    const event = decodeVideoEvent({ event: "initialized", duration: -1 });
    expect(event.type === "initialized" && event.duration).toBe(-1);
  });

  it("rejects an initialized event without an integer duration", () => {
    const error = decodeError({ event: "initialized", duration: "10" });
    expect(isCustomSourceError(error, "malformed-event")).toBe(true);
  });

  it("decodes events without fields", () => {
    expect(decodeVideoEvent({ event: "completed" })).toEqual({
      type: "completed",
    });
    expect(decodeVideoEvent({ event: "bufferingStart" })).toEqual({
      type: "bufferingStart",
    });
    expect(decodeVideoEvent({ event: "bufferingEnd" })).toEqual({
      type: "bufferingEnd",
    });
  });

  it("decodes buffering updates in order", () => {
    expect(
      decodeVideoEvent({
        event: "bufferingUpdate",
        values: [
          [0, 1000],
          [1000, 2500],
        ],
      }),
    ).toEqual({
      type: "bufferingUpdate",
      buffered: [
        { start: 0, end: 1000 },
        { start: 1000, end: 2500 },
      ],
    });
  });

  it("decodes unknown tags to the unknown event", () => {
    expect(decodeVideoEvent({ event: "heartbeat" })).toEqual({
      type: "unknown",
      event: "heartbeat",
    });
    expect(decodeVideoEvent({ duration: 10 })).toEqual({ type: "unknown" });
    expect(decodeVideoEvent({ event: 7 })).toEqual({ type: "unknown" });
    expect(decodeVideoEvent("initialized")).toEqual({ type: "unknown" });
    expect(decodeVideoEvent({ event: "toString" })).toEqual({
      type: "unknown",
      event: "toString",
    });
  });

  it("decodes fetch_data and cancel_fetch_data", () => {
    const request = {
      id: "r1",
      uri: "http://x/a",
      headers: { Range: "bytes=0-99" },
      finished: false,
      canceled: false,
      dataLength: 100,
      dataOffset: 0,
      requestsAllData: false,
    };
    expect(
      decodeVideoEvent({ event: "fetch_data", request: validRequest }),
    ).toEqual({ type: "fetchData", request });
    expect(
      decodeVideoEvent({
        event: "cancel_fetch_data",
        request: { ...validRequest, canceled: "true" },
      }),
    ).toEqual({
      type: "cancelFetchData",
      request: { ...request, canceled: true },
    });
  });

  it("rejects fetch_data without a request map", () => {
    const error = decodeError({ event: "fetch_data" });
    expect(error).toBeInstanceOf(CustomSourceError);
    expect(error).toHaveProperty("type", "malformed-event");
  });
});

describe("decodeDataRequestParameters", () => {
  it("decodes booleans only from the exact string true", () => {
    const decode = (value: unknown) =>
      decodeDataRequestParameters({ ...validRequest, finished: value })
        .finished;

    expect(decode("true")).toBe(true);
    expect(decode("True")).toBe(false);
    expect(decode("1")).toBe(false);
    expect(decode(true)).toBe(false);
    expect(decode(undefined)).toBe(false);

    const withoutFinished = Object.fromEntries(
      Object.entries(validRequest).filter(([key]) => key !== "finished"),
    );
    expect(decodeDataRequestParameters(withoutFinished).finished).toBe(false);
  });

  it("decodes data_request_all", () => {
    expect(
      decodeDataRequestParameters({
        ...validRequest,
        data_request_all: "true",
      }).requestsAllData,
    ).toBe(true);
  });

  it("keeps the redirect only when both redirect keys are present", () => {
    const redirected = decodeDataRequestParameters({
      ...validRequest,
      redirect_url: "http://y/b",
      redirect_headers: { Cookie: "k=v" },
    });
    expect(redirected.redirectUri).toBe("http://y/b");
    expect(redirected.redirectHeaders).toEqual({ Cookie: "k=v" });

    const urlOnly = decodeDataRequestParameters({
      ...validRequest,
      redirect_url: "http://y/b",
    });
    expect("redirectUri" in urlOnly).toBe(false);
    expect("redirectHeaders" in urlOnly).toBe(false);

    const headersOnly = decodeDataRequestParameters({
      ...validRequest,
      redirect_headers: {},
    });
    expect("redirectUri" in headersOnly).toBe(false);

    const plain = decodeDataRequestParameters(validRequest);
    expect("redirectUri" in plain).toBe(false);
  });

  it("keeps a negative data length as the unknown length sentinel", () => {
    expect(
      decodeDataRequestParameters({ ...validRequest, data_length: -1 })
        .dataLength,
    ).toBe(-1);
  });

  it.each([
    ["id", { id: undefined }],
    ["id", { id: 1 }],
    ["url", { url: undefined }],
    ["headers", { headers: undefined }],
    ["headers", { headers: { Range: 1 } }],
    ["data_length", { data_length: "100" }],
    ["data_length", { data_length: 1.5 }],
    ["data_offset", { data_offset: undefined }],
    ["data_offset", { data_offset: -1 }],
    ["redirect_url", { redirect_url: 5, redirect_headers: {} }],
  ])("rejects a malformed %s", (_field, override) => {
    expect(() =>
      decodeDataRequestParameters({ ...validRequest, ...override }),
    ).toThrow(CustomSourceError);
  });
});

describe("toBufferedRanges", () => {
  it("keeps order and overlap as reported", () => {
    const ranges = toBufferedRanges([
      [3000, 4000],
      [0, 1000],
      [500, 1500],
    ]);
    expect(ranges.map(durationRangeToString)).toEqual([
      "[3000, 4000]",
      "[0, 1000]",
      "[500, 1500]",
    ]);
  });

  it("converts an empty sequence", () => {
    expect(toBufferedRanges([])).toEqual([]);
  });

  it("rejects pairs that do not have two elements", () => {
    expect(() => toBufferedRanges([[0, 1000, 2000]])).toThrow(
      CustomSourceError,
    );
    expect(() => toBufferedRanges([[0]])).toThrow(CustomSourceError);
    expect(() => toBufferedRanges([["0", "1"]])).toThrow(CustomSourceError);
    expect(() => toBufferedRanges(undefined)).toThrow(CustomSourceError);
  });
});
