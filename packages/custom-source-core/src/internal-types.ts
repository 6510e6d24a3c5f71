import { DataRequestParameters, SessionId } from "./types.js";

/** An in-flight data request tracked by the request registry. */
export type PendingRequest = {
  readonly id: string;
  readonly sessionId: SessionId;
  readonly parameters: DataRequestParameters;
  canceled: boolean;
};

/** Raw event payload as delivered by the engine event transport. */
export type WirePayload = Readonly<Record<string, unknown>>;
