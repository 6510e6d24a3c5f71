import {
  DataRequestParameters,
  HttpHeaders,
  RequestedByteRange,
} from "../types.js";

/** Whether the engine supplied a redirect target for the request. */
export function isRedirected(
  request: DataRequestParameters,
): request is DataRequestParameters & {
  redirectUri: string;
  redirectHeaders: HttpHeaders;
} {
  return (
    request.redirectUri !== undefined && request.redirectHeaders !== undefined
  );
}

/** The URI an application should fetch: the redirect target when the engine supplied one. */
export function getEffectiveUri(request: DataRequestParameters): string {
  return isRedirected(request) ? request.redirectUri : request.uri;
}

/** Headers matching {@link getEffectiveUri}. */
export function getEffectiveHeaders(request: DataRequestParameters): HttpHeaders {
  return isRedirected(request) ? request.redirectHeaders : request.headers;
}

/**
 * Byte range the engine wants for the request. `requestsAllData` overrides
 * offset and length; a negative length yields an open-ended range.
 */
export function getRequestedByteRange(
  request: DataRequestParameters,
): RequestedByteRange {
  if (request.requestsAllData) return { type: "all" };
  return {
    type: "range",
    offset: request.dataOffset,
    length: request.dataLength < 0 ? undefined : request.dataLength,
  };
}
