/** Opaque handle the engine assigns to a playback session when it is created. */
export type SessionId = number;

/** Header map as supplied by the engine; key case is preserved. */
export type HttpHeaders = Readonly<Record<string, string>>;

/** A contiguous time interval of media data already available to the engine. */
export type DurationRange = {
  /** Start offset in milliseconds. */
  readonly start: number;
  /** End offset in milliseconds. */
  readonly end: number;
};

/** Video frame size reported on initialization. */
export type VideoSize = {
  readonly width: number;
  readonly height: number;
};

/** Describes an engine-originated request for bytes of a custom data source. */
export type DataRequestParameters = {
  /** Request identifier, unique among the outstanding requests of a session. */
  readonly id: string;

  /** The URI of the resource the engine wants. */
  readonly uri: string;

  /** Headers to send along with the fetch of `uri`. */
  readonly headers: HttpHeaders;

  /** True when the engine has nothing more to ask for on this request stream. */
  readonly finished: boolean;

  /** True when the engine has already given up on the request. */
  readonly canceled: boolean;

  /**
   * Alternate URI to fetch instead of `uri`. Only present together with `redirectHeaders`.
   */
  readonly redirectUri?: string;

  /** Headers to use with `redirectUri`. Only present together with `redirectUri`. */
  readonly redirectHeaders?: HttpHeaders;

  /** Number of bytes wanted. A negative value means the total length is unknown. */
  readonly dataLength: number;

  /** Byte offset the requested range starts at. */
  readonly dataOffset: number;

  /**
   * When true, `dataOffset` and `dataLength` must be ignored and the complete
   * resource delivered.
   */
  readonly requestsAllData: boolean;
};

/** Byte range an application should fetch to answer a data request. */
export type RequestedByteRange =
  | { readonly type: "all" }
  | {
      readonly type: "range";
      readonly offset: number;
      /** `undefined` when the engine does not know the total length. */
      readonly length: number | undefined;
    };

/** Closed set of video event kinds. */
export type VideoEventType = VideoEvent["type"];

/** A decoded event of a playback session. */
export type VideoEvent =
  | {
      readonly type: "initialized";
      /** Media duration in milliseconds. */
      readonly duration: number;
      readonly size: VideoSize;
    }
  | { readonly type: "completed" }
  | {
      readonly type: "bufferingUpdate";
      /** Buffered ranges in the order the engine reported them. */
      readonly buffered: readonly DurationRange[];
    }
  | { readonly type: "bufferingStart" }
  | { readonly type: "bufferingEnd" }
  | { readonly type: "fetchData"; readonly request: DataRequestParameters }
  | {
      readonly type: "cancelFetchData";
      readonly request: DataRequestParameters;
    }
  | {
      readonly type: "unknown";
      /** The raw event tag, when the payload carried one. */
      readonly event?: string;
    };

/** Data delivered to the engine in answer to a data request. */
export type DataMessage = {
  readonly sessionId: SessionId;
  readonly requestId: string;
  readonly headers: HttpHeaders;
  readonly data: Uint8Array;
};

/** The engine side that accepts delivered bytes. */
export interface DataSink {
  /**
   * Hands delivered bytes to the engine. Called once per request id.
   * @param message - The delivered data and its correlation keys.
   */
  setData(message: DataMessage): Promise<void>;
}

/** Callbacks an engine event channel invokes for one subscription. */
export type EngineEventHandlers = {
  /** A raw event payload as decoded by the transport. */
  onEvent: (payload: unknown) => void;
  /** The engine closed the stream. */
  onEnd: () => void;
  /** The transport reported an error; the stream stays open. */
  onError: (error: unknown) => void;
};

/** Source of per-session tagged event streams. */
export interface EngineEventChannel {
  /**
   * Subscribes to the named channel.
   * @param channelName - Channel of one playback session.
   * @param handlers - Callbacks for events, stream end and errors.
   * @returns A function that cancels the subscription.
   */
  listen(channelName: string, handlers: EngineEventHandlers): () => void;
}

/** Configuration of the session multiplexer and the player facade. */
export type CoreConfig = {
  /**
   * Prefix of the engine event channel names. The channel of session `n` is `${eventChannelPrefix}${n}`.
   *
   * @default
   * ```typescript
   * eventChannelPrefix: "video-player/video-events"
   * ```
   */
  eventChannelPrefix: string;

  /**
   * Whether a session is disposed when the engine ends its event stream.
   *
   * @default
   * ```typescript
   * disposeOnStreamEnd: true
   * ```
   */
  disposeOnStreamEnd: boolean;

  /**
   * When defined, applied through the playback control API once the player is initialized.
   *
   * @default
   * ```typescript
   * mixWithOthers: undefined
   * ```
   */
  mixWithOthers: boolean | undefined;
};

/** Details of a disposed session. */
export type SessionDisposedDetails = {
  sessionId: SessionId;
  /** Number of pending requests canceled by the disposal. */
  drainedRequestsCount: number;
};

/** Events dispatched for a single playback session. */
export type SessionEventMap = {
  /**
   * Invoked for every successfully decoded engine event, including unknown ones.
   * A `fetchData` event rejected as a duplicate request is reported through
   * `onProtocolError` instead.
   *
   * @param event - The decoded event.
   */
  onVideoEvent: (event: VideoEvent) => void;

  /**
   * Invoked when the engine asks for data. The application answers with a delivery
   * carrying the same request id. An exception thrown here is rethrown to the
   * event transport once `onVideoEvent` has been dispatched.
   *
   * @param request - Parameters of the registered request.
   */
  onFetchData: (request: DataRequestParameters) => void;

  /**
   * Invoked when a pending request is canceled, either by the engine or by session disposal.
   * Cancellation is advisory: a delivery for the request is still accepted.
   *
   * @param request - Parameters of the canceled request.
   */
  onCancelFetchData: (request: DataRequestParameters) => void;

  /**
   * Invoked when a payload could not be decoded. The payload is dropped and the stream continues.
   *
   * @param error - The decoding error.
   * @param payload - The raw payload.
   */
  onMalformedEvent: (
    error: CustomSourceError<"malformed-event">,
    payload: unknown,
  ) => void;

  /**
   * Invoked when a decoded event violates the request protocol, e.g. a fetch with an id that is still pending.
   *
   * @param error - The protocol error.
   */
  onProtocolError: (error: CustomSourceError) => void;

  /** Invoked when the engine ends the event stream of the session. */
  onStreamEnd: () => void;

  /**
   * Invoked when the event transport reports an error. The stream is not ended by it.
   *
   * @param error - The transport error.
   */
  onStreamError: (error: unknown) => void;

  /**
   * Invoked once the session is disposed.
   *
   * @param details - The session id and number of drained requests.
   */
  onSessionDisposed: (details: SessionDisposedDetails) => void;
};

/** Kinds of errors raised by the data source bridge. */
export type CustomSourceErrorType =
  | "malformed-event"
  | "duplicate-request"
  | "unknown-request"
  | "unknown-session";

/** Context attached to a {@link CustomSourceError}. */
export type CustomSourceErrorContext = {
  sessionId?: SessionId;
  requestId?: string;
};

/** Error raised by the event decoder, the request registry and the session multiplexer. */
export class CustomSourceError<
  T extends CustomSourceErrorType = CustomSourceErrorType,
> extends Error {
  /** Error timestamp. */
  readonly timestamp: number;

  /** Session the error relates to, if any. */
  readonly sessionId?: SessionId;

  /** Request the error relates to, if any. */
  readonly requestId?: string;

  /**
   * Constructs a new CustomSourceError.
   * @param type - The specific error type.
   * @param message - Optional message describing the error.
   * @param context - Optional session and request the error relates to.
   */
  constructor(
    readonly type: T,
    message?: string,
    context: CustomSourceErrorContext = {},
  ) {
    super(message);
    this.name = "CustomSourceError";
    this.timestamp = performance.now();
    this.sessionId = context.sessionId;
    this.requestId = context.requestId;
  }
}

export function isCustomSourceError<
  T extends CustomSourceErrorType = CustomSourceErrorType,
>(error: unknown, type?: T): error is CustomSourceError<T> {
  if (!(error instanceof CustomSourceError)) return false;
  return type === undefined || error.type === type;
}
