import debug from "debug";
import { PendingRequest } from "../internal-types.js";
import {
  CustomSourceError,
  DataSink,
  HttpHeaders,
  SessionEventMap,
  SessionId,
  VideoEvent,
} from "../types.js";
import { EventTarget } from "../utils/event-target.js";
import * as LoggerUtils from "../utils/logger.js";
import { RequestRegistry } from "./request-registry.js";

/**
 * Matches the engine's data requests of one session with the application's deliveries.
 *
 * Request lifecycle: a `fetchData` event registers the request as pending, a
 * `cancelFetchData` event flags it as canceled, and a delivery or the session
 * disposal retires it. Cancellation is advisory: a canceled request still
 * accepts one delivery, and the engine decides whether to use the bytes.
 * Redirects are not followed here; the application fetches the redirect target
 * and delivers under the original request id.
 */
export class FetchCorrelator {
  private readonly logger = debug("custom-source-core:fetch-correlator");
  private readonly sessionString: string;
  private readonly onFetchData: SessionEventMap["onFetchData"];
  private readonly onCancelFetchData: SessionEventMap["onCancelFetchData"];
  private _isDisposed = false;

  constructor(
    readonly sessionId: SessionId,
    private readonly registry: RequestRegistry,
    private readonly sink: DataSink,
    private readonly eventTarget: EventTarget<SessionEventMap>,
  ) {
    this.sessionString = LoggerUtils.getSessionString(sessionId);
    this.onFetchData = eventTarget.getEventDispatcher("onFetchData");
    this.onCancelFetchData = eventTarget.getEventDispatcher("onCancelFetchData");
  }

  get isDisposed() {
    return this._isDisposed;
  }

  /**
   * Registers `fetchData` requests and flags `cancelFetchData` ones; other events are ignored.
   * @throws {CustomSourceError} `duplicate-request` for a fetch whose id is still pending.
   */
  onEngineEvent(event: VideoEvent) {
    if (this._isDisposed) {
      this.logger(`${this.sessionString} ${event.type} after disposal ignored`);
      return;
    }

    switch (event.type) {
      case "fetchData": {
        const { parameters } = this.registry.register(
          this.sessionId,
          event.request,
        );
        this.logger(
          `${this.sessionString} fetch ${LoggerUtils.getRequestString(parameters)}`,
        );
        if (this.eventTarget.listenerCount("onFetchData") === 0) {
          this.logger(
            `${this.sessionString} no onFetchData listener, ${parameters.id} stays pending`,
          );
        }
        this.onFetchData(parameters);
        break;
      }
      case "cancelFetchData": {
        const { request } = event;
        const pending = this.registry.markCanceled(this.sessionId, request.id);
        if (!pending) {
          this.logger(
            `${this.sessionString} cancel of not pending ${request.id} ignored`,
          );
          return;
        }
        this.onCancelFetchData(request);
        break;
      }
    }
  }

  /**
   * Retires the request and hands the bytes to the engine. The request is
   * retired before the engine write starts, so a second delivery for the same
   * id fails even while the first one is in flight.
   * @throws {CustomSourceError} `unknown-request` if the id is not pending.
   */
  async deliver(requestId: string, headers: HttpHeaders, data: Uint8Array) {
    if (this._isDisposed) {
      throw new CustomSourceError(
        "unknown-request",
        `${this.sessionString} is disposed, ${requestId} is not pending`,
        { sessionId: this.sessionId, requestId },
      );
    }
    const request = this.registry.resolve(this.sessionId, requestId);
    this.logger(
      `${this.sessionString} deliver ${LoggerUtils.getRequestString(request.parameters)} ${data.byteLength} bytes${request.canceled ? " (canceled)" : ""}`,
    );
    await this.sink.setData({
      sessionId: this.sessionId,
      requestId,
      headers,
      data,
    });
  }

  pendingRequests(): PendingRequest[] {
    return [...this.registry.pendingRequests(this.sessionId)];
  }

  /**
   * Cancels every pending request of the session and notifies the application
   * about each of them. Later deliveries fail with `unknown-request`.
   * @returns The drained requests.
   */
  dispose(): PendingRequest[] {
    if (this._isDisposed) return [];
    this._isDisposed = true;

    const drained = this.registry.drainSession(this.sessionId);
    for (const request of drained) {
      this.onCancelFetchData({ ...request.parameters, canceled: true });
    }
    this.logger(
      `${this.sessionString} disposed, ${drained.length} pending requests drained`,
    );
    return drained;
  }
}
