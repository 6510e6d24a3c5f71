import debug from "debug";

export { SessionMultiplexer } from "./session/session-multiplexer.js";
export { Session } from "./session/session.js";
export { FetchCorrelator } from "./requests/fetch-correlator.js";
export { RequestRegistry } from "./requests/request-registry.js";
export {
  getEffectiveHeaders,
  getEffectiveUri,
  getRequestedByteRange,
  isRedirected,
} from "./requests/data-request.js";
export {
  decodeVideoEvent,
  decodeDataRequestParameters,
} from "./events/event-decoder.js";
export {
  toBufferedRanges,
  toDurationRange,
  durationRangeToString,
} from "./events/duration-range.js";
export { CustomSourcePlayer } from "./player/custom-source-player.js";
export {
  toCreateMessage,
  getFormatHintString,
} from "./player/playback-control.js";
export type {
  CreateMessage,
  DataSource,
  PlaybackControlApi,
  VideoFormat,
} from "./player/playback-control.js";
export type { PendingRequest } from "./internal-types.js";
export type * from "./types.js";
export { CustomSourceError, isCustomSourceError } from "./types.js";
export { debug };
