import { DataRequestParameters, SessionId } from "../types.js";
import { getRequestedByteRange } from "../requests/data-request.js";

export function getSessionString(sessionId: SessionId) {
  return `session-${sessionId}`;
}

export function getRequestString(request: DataRequestParameters) {
  const range = getRequestedByteRange(request);
  if (range.type === "all") return `(${request.id} | all)`;
  const { offset, length } = range;
  return `(${request.id} | ${offset}+${length ?? "?"})`;
}
