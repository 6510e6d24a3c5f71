import { DataSink, HttpHeaders, SessionId } from "../types.js";

/** Container format hint for network and custom sources. */
export type VideoFormat = "ss" | "hls" | "dash" | "other" | "custom";

/** Describes where the engine takes the media of a new session from. */
export type DataSource =
  | {
      readonly sourceType: "asset";
      readonly asset: string;
      /** Package the asset is bundled with, if not the application itself. */
      readonly package?: string;
    }
  | {
      readonly sourceType: "network";
      readonly uri: string;
      readonly formatHint?: VideoFormat;
      readonly httpHeaders?: HttpHeaders;
    }
  | {
      /** The application supplies the bytes through data requests. */
      readonly sourceType: "custom";
      readonly uri: string;
      readonly formatHint?: VideoFormat;
      readonly httpHeaders?: HttpHeaders;
    }
  | { readonly sourceType: "file"; readonly uri: string }
  | { readonly sourceType: "contentUri"; readonly uri: string };

/** Session creation request as the engine accepts it. Exactly one source form is populated. */
export type CreateMessage = {
  asset?: string;
  packageName?: string;
  uri?: string;
  formatHint?: string;
  httpHeaders: HttpHeaders;
};

/** Engine calls for session lifecycle and playback control. */
export interface PlaybackControlApi extends DataSink {
  initialize(): Promise<void>;
  create(message: CreateMessage): Promise<SessionId>;
  dispose(sessionId: SessionId): Promise<void>;
  setLooping(sessionId: SessionId, isLooping: boolean): Promise<void>;
  play(sessionId: SessionId): Promise<void>;
  pause(sessionId: SessionId): Promise<void>;
  setVolume(sessionId: SessionId, volume: number): Promise<void>;
  setPlaybackSpeed(sessionId: SessionId, speed: number): Promise<void>;
  /** @param position - Position in milliseconds. */
  seekTo(sessionId: SessionId, position: number): Promise<void>;
  /** @returns Position in milliseconds. */
  getPosition(sessionId: SessionId): Promise<number>;
  setMixWithOthers(mixWithOthers: boolean): Promise<void>;
}

const VIDEO_FORMAT_STRINGS: Readonly<Record<VideoFormat, string>> = {
  ss: "ss",
  hls: "hls",
  dash: "dash",
  other: "other",
  custom: "custom",
};

export function getFormatHintString(format: VideoFormat | undefined) {
  return format === undefined ? undefined : VIDEO_FORMAT_STRINGS[format];
}

export function toCreateMessage(dataSource: DataSource): CreateMessage {
  switch (dataSource.sourceType) {
    case "asset":
      return {
        asset: dataSource.asset,
        packageName: dataSource.package,
        httpHeaders: {},
      };
    case "network":
    case "custom":
      return {
        uri: dataSource.uri,
        formatHint: getFormatHintString(dataSource.formatHint),
        httpHeaders: { ...dataSource.httpHeaders },
      };
    case "file":
    case "contentUri":
      return { uri: dataSource.uri, httpHeaders: {} };
  }
}
