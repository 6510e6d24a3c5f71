import debug from "debug";
import { decodeVideoEvent } from "../events/event-decoder.js";
import { FetchCorrelator } from "../requests/fetch-correlator.js";
import { RequestRegistry } from "../requests/request-registry.js";
import {
  DataSink,
  HttpHeaders,
  SessionEventMap,
  SessionId,
  VideoEvent,
  isCustomSourceError,
} from "../types.js";
import { EventTarget } from "../utils/event-target.js";
import * as LoggerUtils from "../utils/logger.js";

/**
 * State of one playback session: its event target, its fetch correlator and
 * the registry of its data requests. A session reopened under the same id
 * starts with a fresh registry.
 */
export class Session {
  readonly eventTarget = new EventTarget<SessionEventMap>();
  private readonly registry = new RequestRegistry();
  private readonly correlator: FetchCorrelator;
  private readonly logger = debug("custom-source-core:session");
  private readonly sessionString: string;
  private readonly onVideoEvent: SessionEventMap["onVideoEvent"];
  private readonly onMalformedEvent: SessionEventMap["onMalformedEvent"];
  private readonly onProtocolError: SessionEventMap["onProtocolError"];
  private readonly onStreamEnd: SessionEventMap["onStreamEnd"];
  private readonly onStreamError: SessionEventMap["onStreamError"];
  private readonly onSessionDisposed: SessionEventMap["onSessionDisposed"];

  constructor(
    readonly sessionId: SessionId,
    sink: DataSink,
  ) {
    this.sessionString = LoggerUtils.getSessionString(sessionId);
    this.correlator = new FetchCorrelator(
      sessionId,
      this.registry,
      sink,
      this.eventTarget,
    );

    this.onVideoEvent = this.eventTarget.getEventDispatcher("onVideoEvent");
    this.onMalformedEvent =
      this.eventTarget.getEventDispatcher("onMalformedEvent");
    this.onProtocolError =
      this.eventTarget.getEventDispatcher("onProtocolError");
    this.onStreamEnd = this.eventTarget.getEventDispatcher("onStreamEnd");
    this.onStreamError = this.eventTarget.getEventDispatcher("onStreamError");
    this.onSessionDisposed =
      this.eventTarget.getEventDispatcher("onSessionDisposed");
  }

  get isDisposed() {
    return this.correlator.isDisposed;
  }

  get pendingRequests() {
    return this.correlator.pendingRequests();
  }

  handlePayload(payload: unknown) {
    if (this.isDisposed) return;

    let event: VideoEvent;
    try {
      event = decodeVideoEvent(payload);
    } catch (error) {
      if (!isCustomSourceError(error, "malformed-event")) throw error;
      this.logger(`${this.sessionString} malformed event: ${error.message}`);
      this.onMalformedEvent(error, payload);
      return;
    }

    if (event.type === "unknown") {
      this.logger(`${this.sessionString} unknown event ${event.event ?? "-"}`);
    }

    if (event.type === "fetchData" || event.type === "cancelFetchData") {
      try {
        this.correlator.onEngineEvent(event);
      } catch (error) {
        if (!isCustomSourceError(error, "duplicate-request")) {
          // Thrown by an application listener; the request is registered.
          this.onVideoEvent(event);
          throw error;
        }
        this.logger(`${this.sessionString} ${error.type}: ${error.message}`);
        this.onProtocolError(error);
        return;
      }
    }

    this.onVideoEvent(event);
  }

  handleStreamEnd() {
    this.logger(`${this.sessionString} stream ended`);
    this.onStreamEnd();
  }

  handleStreamError(error: unknown) {
    this.logger(`${this.sessionString} stream error`);
    this.onStreamError(error);
  }

  deliver(requestId: string, headers: HttpHeaders, data: Uint8Array) {
    return this.correlator.deliver(requestId, headers, data);
  }

  dispose() {
    if (this.isDisposed) return;
    const drained = this.correlator.dispose();
    this.onSessionDisposed({
      sessionId: this.sessionId,
      drainedRequestsCount: drained.length,
    });
  }
}
