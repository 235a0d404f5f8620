import { InvalidChannel } from "./errors.js";
import type { ChannelId } from "./types.js";

const CHANNEL_PATTERN = /^(R|VM)(\d+)$/i;

export function parseChannelId(channel: string | ChannelId): ChannelId {
  if (typeof channel !== "string") {
    if (!Number.isSafeInteger(channel.id) || channel.id < 0) {
      throw new InvalidChannel(`Channel id must be a non-negative integer, got ${channel.id}`);
    }
    return { kind: channel.kind, id: channel.id };
  }

  const m = CHANNEL_PATTERN.exec(channel.trim());
  if (!m) throw new InvalidChannel(`Channel "${channel}" is not a register (R123) or virtual meter (VM456) id`);
  const [, tag = "", digits = ""] = m;
  const id = Number(digits);
  if (!Number.isSafeInteger(id)) throw new InvalidChannel(`Channel "${channel}" id is out of range`);
  return { kind: tag.toUpperCase() === "VM" ? "virtualMeter" : "register", id };
}

export function formatChannelId(channel: ChannelId): string {
  return `${channel.kind === "virtualMeter" ? "VM" : "R"}${channel.id}`;
}
