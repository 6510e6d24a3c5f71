import debug from "debug";
import { SessionMultiplexer } from "../session/session-multiplexer.js";
import {
  CoreConfig,
  EngineEventChannel,
  HttpHeaders,
  SessionEventMap,
  SessionId,
} from "../types.js";
import * as LoggerUtils from "../utils/logger.js";
import {
  DataSource,
  PlaybackControlApi,
  toCreateMessage,
} from "./playback-control.js";

/**
 * Player facade over the engine's playback control API. Every created session
 * gets its own decoded event stream and data request correlation.
 *
 * @example
 * const player = new CustomSourcePlayer(engineApi, engineEvents);
 * await player.init();
 * const sessionId = await player.create({ sourceType: "custom", uri: "app://movie" });
 * player.addEventListener(sessionId, "onFetchData", (request) => {
 *   void fetchBytes(request).then((bytes) =>
 *     player.setData(sessionId, request.id, {}, bytes),
 *   );
 * });
 */
export class CustomSourcePlayer {
  private readonly multiplexer: SessionMultiplexer;
  private readonly logger = debug("custom-source-core:player");

  constructor(
    private readonly api: PlaybackControlApi,
    channel: EngineEventChannel,
    config?: Partial<CoreConfig>,
  ) {
    this.multiplexer = new SessionMultiplexer(channel, api, config);
  }

  getConfig(): CoreConfig {
    return this.multiplexer.getConfig();
  }

  async init() {
    await this.api.initialize();
    const { mixWithOthers } = this.multiplexer.getConfig();
    if (mixWithOthers !== undefined) {
      await this.api.setMixWithOthers(mixWithOthers);
    }
    this.logger("initialized");
  }

  async create(dataSource: DataSource): Promise<SessionId> {
    const sessionId = await this.api.create(toCreateMessage(dataSource));
    this.multiplexer.openSession(sessionId);
    this.logger(
      `${LoggerUtils.getSessionString(sessionId)} created from ${dataSource.sourceType} source`,
    );
    return sessionId;
  }

  async dispose(sessionId: SessionId) {
    // The session may already be gone when the engine ended its stream.
    if (this.multiplexer.hasSession(sessionId)) {
      this.multiplexer.disposeSession(sessionId);
    }
    await this.api.dispose(sessionId);
  }

  setLooping(sessionId: SessionId, isLooping: boolean) {
    return this.api.setLooping(sessionId, isLooping);
  }

  play(sessionId: SessionId) {
    return this.api.play(sessionId);
  }

  pause(sessionId: SessionId) {
    return this.api.pause(sessionId);
  }

  async setVolume(sessionId: SessionId, volume: number) {
    if (!(volume >= 0)) {
      throw new RangeError(`Volume must not be negative, got ${volume}`);
    }
    await this.api.setVolume(sessionId, volume);
  }

  async setPlaybackSpeed(sessionId: SessionId, speed: number) {
    if (!(speed > 0)) {
      throw new RangeError(`Playback speed must be positive, got ${speed}`);
    }
    await this.api.setPlaybackSpeed(sessionId, speed);
  }

  /** @param position - Position in milliseconds. */
  seekTo(sessionId: SessionId, position: number) {
    return this.api.seekTo(sessionId, Math.round(position));
  }

  /** @returns Position in milliseconds. */
  getPosition(sessionId: SessionId) {
    return this.api.getPosition(sessionId);
  }

  setMixWithOthers(mixWithOthers: boolean) {
    return this.api.setMixWithOthers(mixWithOthers);
  }

  /** Answers a data request of the session. See {@link SessionMultiplexer.deliver}. */
  setData(
    sessionId: SessionId,
    requestId: string,
    headers: HttpHeaders,
    data: Uint8Array,
  ) {
    return this.multiplexer.deliver(sessionId, requestId, headers, data);
  }

  /** @returns A function removing the listener. */
  addEventListener<K extends keyof SessionEventMap>(
    sessionId: SessionId,
    eventName: K,
    listener: SessionEventMap[K],
  ) {
    return this.multiplexer.addEventListener(sessionId, eventName, listener);
  }

  removeEventListener<K extends keyof SessionEventMap>(
    sessionId: SessionId,
    eventName: K,
    listener: SessionEventMap[K],
  ) {
    this.multiplexer.removeEventListener(sessionId, eventName, listener);
  }

  /**
   * Subscribes to the decoded events of a session.
   * @returns A function removing the listener.
   */
  videoEventsFor(
    sessionId: SessionId,
    listener: SessionEventMap["onVideoEvent"],
  ): () => void {
    return this.multiplexer.addEventListener(
      sessionId,
      "onVideoEvent",
      listener,
    );
  }

  pendingRequests(sessionId: SessionId) {
    return this.multiplexer.getSession(sessionId).pendingRequests;
  }

  destroy() {
    this.multiplexer.destroy();
  }
}
