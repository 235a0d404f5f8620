import type { TimeInput } from "./time.js";

export type PeriodType = "halfHour" | "hour" | "day" | "week" | "month";

export const PERIOD_TYPES: readonly PeriodType[] = ["halfHour", "hour", "day", "week", "month"];

export type ChannelKind = "register" | "virtualMeter";

export type ChannelId = {
  kind: ChannelKind;
  id: number;
};

export type Reading = {
  timestamp: Date;
  // May be Infinity, -Infinity or NaN as sent by the server.
  value: number;
  status: number;
};

export type ReadingsHeader = {
  id?: string;
  name?: string;
  startTime: Date;
  endTime: Date;
  periodType: string;
  unit?: string;
};

export type EagerReadingsResult = ReadingsHeader & {
  mode: "eager";
  readings: Reading[];
};

/** Forward-only and single-pass; re-issue the query to read it again. */
export type StreamingReadingsResult = ReadingsHeader & {
  mode: "streaming";
  readings: AsyncIterable<Reading>;
};

export type ReadingsResult = EagerReadingsResult | StreamingReadingsResult;

export type ReadingsQuery = {
  /** `R123`, `VM456`, or a parsed channel id. */
  channel: string | ChannelId;
  start?: TimeInput;
  end?: TimeInput;
  periodCount?: number;
  periodType?: PeriodType;
  calibrated?: boolean;
  interpolated?: boolean;
  stream?: boolean;
};

export type Window = {
  start: Date;
  end: Date;
};

export async function collectReadings(result: ReadingsResult): Promise<Reading[]> {
  if (result.mode === "eager") return result.readings;
  const out: Reading[] = [];
  for await (const r of result.readings) out.push(r);
  return out;
}
