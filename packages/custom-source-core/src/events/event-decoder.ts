import {
  CustomSourceError,
  DataRequestParameters,
  HttpHeaders,
  VideoEvent,
} from "../types.js";
import { WirePayload } from "../internal-types.js";
import { isInteger, isRecord, isStringRecord } from "../utils/type-guards.js";
import { toBufferedRanges } from "./duration-range.js";

type EventOf<T extends VideoEvent["type"]> = Extract<VideoEvent, { type: T }>;

function malformed(message: string) {
  return new CustomSourceError("malformed-event", message);
}

function requireInteger(payload: WirePayload, key: string): number {
  const value = payload[key];
  if (!isInteger(value)) throw malformed(`"${key}" must be an integer`);
  return value;
}

function requireString(payload: WirePayload, key: string): string {
  const value = payload[key];
  if (typeof value !== "string") throw malformed(`"${key}" must be a string`);
  return value;
}

function requireHeaders(payload: WirePayload, key: string): HttpHeaders {
  const value = payload[key];
  if (!isStringRecord(value)) {
    throw malformed(`"${key}" must be a map of strings`);
  }
  return { ...value };
}

function optionalNumber(payload: WirePayload, key: string): number {
  const value = payload[key];
  if (value === undefined || value === null) return 0;
  if (typeof value !== "number") throw malformed(`"${key}" must be a number`);
  return value;
}

// The engine sends booleans as the strings "true" / "false".
function decodeWireBoolean(value: unknown): boolean {
  return value === "true";
}

function decodeInitialized(payload: WirePayload): EventOf<"initialized"> {
  return {
    type: "initialized",
    duration: requireInteger(payload, "duration"),
    size: {
      width: optionalNumber(payload, "width"),
      height: optionalNumber(payload, "height"),
    },
  };
}

function decodeBufferingUpdate(
  payload: WirePayload,
): EventOf<"bufferingUpdate"> {
  return {
    type: "bufferingUpdate",
    buffered: toBufferedRanges(payload.values),
  };
}

function decodeFetchData(payload: WirePayload): EventOf<"fetchData"> {
  return {
    type: "fetchData",
    request: decodeDataRequestParameters(payload.request),
  };
}

function decodeCancelFetchData(
  payload: WirePayload,
): EventOf<"cancelFetchData"> {
  return {
    type: "cancelFetchData",
    request: decodeDataRequestParameters(payload.request),
  };
}

/**
 * Decodes the nested `request` map of `fetch_data` and `cancel_fetch_data` events.
 * A redirect is only taken when both `redirect_url` and `redirect_headers` are present.
 */
export function decodeDataRequestParameters(
  request: unknown,
): DataRequestParameters {
  if (!isRecord(request)) throw malformed(`"request" must be a map`);

  const dataOffset = requireInteger(request, "data_offset");
  if (dataOffset < 0) throw malformed(`"data_offset" must not be negative`);

  const parameters: DataRequestParameters = {
    id: requireString(request, "id"),
    uri: requireString(request, "url"),
    headers: requireHeaders(request, "headers"),
    finished: decodeWireBoolean(request.finished),
    canceled: decodeWireBoolean(request.canceled),
    dataLength: requireInteger(request, "data_length"),
    dataOffset,
    requestsAllData: decodeWireBoolean(request.data_request_all),
  };

  if (
    !Object.hasOwn(request, "redirect_url") ||
    !Object.hasOwn(request, "redirect_headers")
  ) {
    return parameters;
  }

  return {
    ...parameters,
    redirectUri: requireString(request, "redirect_url"),
    redirectHeaders: requireHeaders(request, "redirect_headers"),
  };
}

/**
 * Turns one raw engine payload into a {@link VideoEvent}.
 *
 * Payloads without a recognized `event` tag decode to `unknown`, so engines may
 * introduce new event kinds. Recognized events with missing or mistyped fields
 * throw a `malformed-event` {@link CustomSourceError}.
 */
export function decodeVideoEvent(payload: unknown): VideoEvent {
  if (!isRecord(payload)) return { type: "unknown" };

  const { event } = payload;
  switch (event) {
    case "initialized":
      return decodeInitialized(payload);
    case "completed":
      return { type: "completed" };
    case "bufferingUpdate":
      return decodeBufferingUpdate(payload);
    case "bufferingStart":
      return { type: "bufferingStart" };
    case "bufferingEnd":
      return { type: "bufferingEnd" };
    case "fetch_data":
      return decodeFetchData(payload);
    case "cancel_fetch_data":
      return decodeCancelFetchData(payload);
    default:
      return typeof event === "string"
        ? { type: "unknown", event }
        : { type: "unknown" };
  }
}
