import debug from "debug";
import { PendingRequest } from "../internal-types.js";
import { CustomSourceError, DataRequestParameters, SessionId } from "../types.js";
import * as LoggerUtils from "../utils/logger.js";

/** In-flight data requests keyed by session and request id. */
export class RequestRegistry {
  private readonly sessions = new Map<SessionId, Map<string, PendingRequest>>();
  private readonly logger = debug("custom-source-core:request-registry");

  /**
   * Inserts a pending request.
   * @throws {CustomSourceError} `duplicate-request` if the id is still pending in the session.
   */
  register(
    sessionId: SessionId,
    parameters: DataRequestParameters,
  ): PendingRequest {
    let requests = this.sessions.get(sessionId);
    if (!requests) {
      requests = new Map();
      this.sessions.set(sessionId, requests);
    }

    const { id } = parameters;
    if (requests.has(id)) {
      throw new CustomSourceError(
        "duplicate-request",
        `Request ${id} is already pending in ${LoggerUtils.getSessionString(sessionId)}`,
        { sessionId, requestId: id },
      );
    }

    const request: PendingRequest = {
      id,
      sessionId,
      parameters,
      canceled: false,
    };
    requests.set(id, request);
    this.logger(
      `${LoggerUtils.getSessionString(sessionId)} ${LoggerUtils.getRequestString(parameters)} registered`,
    );
    return request;
  }

  /**
   * Flags a pending request as canceled. Retired ids are ignored, since a
   * cancellation may race the delivery.
   * @returns The flagged request, or `undefined` when the id is not pending.
   */
  markCanceled(sessionId: SessionId, id: string): PendingRequest | undefined {
    const request = this.sessions.get(sessionId)?.get(id);
    if (!request) return undefined;
    request.canceled = true;
    this.logger(`${LoggerUtils.getSessionString(sessionId)} ${id} canceled`);
    return request;
  }

  /**
   * Removes and returns a pending request.
   * @throws {CustomSourceError} `unknown-request` if the id is not pending.
   */
  resolve(sessionId: SessionId, id: string): PendingRequest {
    const requests = this.sessions.get(sessionId);
    const request = requests?.get(id);
    if (!requests || !request) {
      throw new CustomSourceError(
        "unknown-request",
        `Request ${id} is not pending in ${LoggerUtils.getSessionString(sessionId)}`,
        { sessionId, requestId: id },
      );
    }

    requests.delete(id);
    if (requests.size === 0) this.sessions.delete(sessionId);
    this.logger(`${LoggerUtils.getSessionString(sessionId)} ${id} resolved`);
    return request;
  }

  /** Removes every pending request of the session, flagging each one as canceled. */
  drainSession(sessionId: SessionId): PendingRequest[] {
    const requests = this.sessions.get(sessionId);
    if (!requests) return [];

    this.sessions.delete(sessionId);
    const drained = [...requests.values()];
    for (const request of drained) request.canceled = true;
    this.logger(
      `${LoggerUtils.getSessionString(sessionId)} ${drained.length} requests drained`,
    );
    return drained;
  }

  get(sessionId: SessionId, id: string) {
    return this.sessions.get(sessionId)?.get(id);
  }

  has(sessionId: SessionId, id: string) {
    return this.sessions.get(sessionId)?.has(id) ?? false;
  }

  pendingCount(sessionId: SessionId) {
    return this.sessions.get(sessionId)?.size ?? 0;
  }

  *pendingRequests(sessionId: SessionId): Generator<PendingRequest, void> {
    const requests = this.sessions.get(sessionId);
    if (!requests) return;
    yield* requests.values();
  }
}
