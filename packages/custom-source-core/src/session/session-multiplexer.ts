import debug from "debug";
import {
  CoreConfig,
  CustomSourceError,
  DataSink,
  EngineEventChannel,
  HttpHeaders,
  SessionEventMap,
  SessionId,
} from "../types.js";
import * as LoggerUtils from "../utils/logger.js";
import { deepCopy, mergeConfig } from "../utils/utils.js";
import { Session } from "./session.js";

type SessionContainerItem = {
  session: Session;
  unsubscribe?: () => void;
  loggerInfo: string;
};

/**
 * Owns the state of every open playback session and routes each session's
 * engine events and deliveries to that session only.
 */
export class SessionMultiplexer {
  /** Default configuration. */
  static readonly DEFAULT_CONFIG: CoreConfig = {
    eventChannelPrefix: "video-player/video-events",
    disposeOnStreamEnd: true,
    mixWithOthers: undefined,
  };

  private readonly sessions = new Map<SessionId, SessionContainerItem>();
  private readonly config: CoreConfig;
  private readonly logger = debug("custom-source-core:session-multiplexer");

  /**
   * @param channel - Source of the engine's per-session event streams.
   * @param sink - Engine side receiving delivered bytes.
   * @param config - Optional partial configuration over {@link SessionMultiplexer.DEFAULT_CONFIG}.
   *
   * @example
   * const multiplexer = new SessionMultiplexer(channel, engine, {
   *   eventChannelPrefix: "player/events-",
   * });
   */
  constructor(
    private readonly channel: EngineEventChannel,
    private readonly sink: DataSink,
    config?: Partial<CoreConfig>,
  ) {
    this.config = mergeConfig(SessionMultiplexer.DEFAULT_CONFIG, config);
  }

  getConfig(): CoreConfig {
    return deepCopy(this.config);
  }

  getChannelName(sessionId: SessionId) {
    return `${this.config.eventChannelPrefix}${sessionId}`;
  }

  /**
   * Creates the state of a session the engine has just created and subscribes
   * to its event stream.
   */
  openSession(sessionId: SessionId): Session {
    if (this.sessions.has(sessionId)) {
      throw new Error(
        `${LoggerUtils.getSessionString(sessionId)} is already open`,
      );
    }

    const session = new Session(sessionId, this.sink);
    const item: SessionContainerItem = {
      session,
      loggerInfo: LoggerUtils.getSessionString(sessionId),
    };
    this.sessions.set(sessionId, item);

    const channelName = this.getChannelName(sessionId);
    item.unsubscribe = this.channel.listen(channelName, {
      onEvent: (payload) => session.handlePayload(payload),
      onEnd: () => this.handleStreamEnd(item),
      onError: (error) => session.handleStreamError(error),
    });

    this.logger(`${item.loggerInfo} opened on ${channelName}`);
    return session;
  }

  hasSession(sessionId: SessionId) {
    return this.sessions.has(sessionId);
  }

  getSessionIds(): SessionId[] {
    return [...this.sessions.keys()];
  }

  /** @throws {CustomSourceError} `unknown-session` if the session is not open. */
  getSession(sessionId: SessionId): Session {
    return this.getItem(sessionId).session;
  }

  /**
   * @returns A function removing the listener.
   * @throws {CustomSourceError} `unknown-session` if the session is not open.
   */
  addEventListener<K extends keyof SessionEventMap>(
    sessionId: SessionId,
    eventName: K,
    listener: SessionEventMap[K],
  ): () => void {
    return this.getSession(sessionId).eventTarget.addEventListener(
      eventName,
      listener,
    );
  }

  removeEventListener<K extends keyof SessionEventMap>(
    sessionId: SessionId,
    eventName: K,
    listener: SessionEventMap[K],
  ) {
    this.sessions
      .get(sessionId)
      ?.session.eventTarget.removeEventListener(eventName, listener);
  }

  /**
   * Delivers the application's answer to a data request of the session.
   *
   * @throws {CustomSourceError} `unknown-session` if the session is not open,
   * `unknown-request` if the request is not pending. A delivery racing the
   * session disposal may fail with either; callers tearing down should treat
   * that as expected.
   */
  async deliver(
    sessionId: SessionId,
    requestId: string,
    headers: HttpHeaders,
    data: Uint8Array,
  ) {
    const { session } = this.getItem(sessionId);
    await session.deliver(requestId, headers, data);
  }

  /**
   * Disposes the session state: unsubscribes from its event stream and
   * cancels its pending requests.
   * @throws {CustomSourceError} `unknown-session` if the session is not open.
   */
  disposeSession(sessionId: SessionId) {
    const item = this.getItem(sessionId);
    this.sessions.delete(sessionId);
    item.unsubscribe?.();
    item.unsubscribe = undefined;
    item.session.dispose();
    this.logger(`${item.loggerInfo} disposed`);
  }

  destroy() {
    for (const sessionId of [...this.sessions.keys()]) {
      this.disposeSession(sessionId);
    }
  }

  private handleStreamEnd(item: SessionContainerItem) {
    const { session } = item;
    session.handleStreamEnd();
    if (!this.config.disposeOnStreamEnd) return;
    if (this.sessions.get(session.sessionId) !== item) return;
    this.disposeSession(session.sessionId);
  }

  private getItem(sessionId: SessionId): SessionContainerItem {
    const item = this.sessions.get(sessionId);
    if (!item) {
      throw new CustomSourceError(
        "unknown-session",
        `${LoggerUtils.getSessionString(sessionId)} is not open`,
        { sessionId },
      );
    }
    return item;
  }
}
