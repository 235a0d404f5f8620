export { formatChannelId, parseChannelId } from "./channels.js";
export { loadConfig, type DcsConfig, type RateLimitPolicy } from "./config.js";
export { clientOptions, DcsClient, withDcsClient, type DcsClientOptions } from "./dcsClient.js";
export {
  DcsSession,
  withDcsSession,
  type Credentials,
  type DcsSessionOptions,
  type ExclusiveAccess,
  type Send,
  type SessionState,
  type SignInResult,
} from "./dcsSession.js";
export {
  DcsError,
  ERR,
  InvalidChannel,
  InvalidRange,
  InvalidTimeValue,
  MalformedResponse,
  RequestFailed,
  TransportError,
  type ErrorCode,
} from "./errors.js";
export { DEFAULT_MAX_WINDOW_MS, fetchWindowedReadings } from "./largeReadings.js";
export {
  getStatus,
  listMeters,
  listVirtualMeters,
  streamMeters,
  streamVirtualMeters,
  type MeterInfo,
  type StreamListOptions,
  type VirtualMeterInfo,
} from "./metadata.js";
export { Mutex, type Release } from "./mutex.js";
export { interpolate, periodValues, type PeriodReading } from "./periodData.js";
export { loadStreamingParser, type ParserLoader, type StreamHandle } from "./jsonStream.js";
export { fetchReadings, prepareReadingsQuery, type FetchReadingsOptions } from "./readings.js";
export {
  parseRetryAfter,
  RequestExecutor,
  type DcsRequest,
  type FetchLike,
  type Logger,
  type Sleep,
} from "./requestExecutor.js";
export { formatUtc, toUtcInstant, type TimeInput } from "./time.js";
export {
  collectReadings,
  PERIOD_TYPES,
  type ChannelId,
  type ChannelKind,
  type EagerReadingsResult,
  type PeriodType,
  type Reading,
  type ReadingsHeader,
  type ReadingsQuery,
  type ReadingsResult,
  type StreamingReadingsResult,
  type Window,
} from "./types.js";
export { floorToPeriod, splitByPeriod, splitRange } from "./windows.js";
