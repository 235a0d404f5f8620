import { describe, it, expect } from "vitest";
import { formatChannelId, parseChannelId } from "../src/channels.js";
import { InvalidChannel } from "../src/errors.js";

describe("channel ids", () => {
  it("parses registers and virtual meters", () => {
    expect(parseChannelId("R123")).toEqual({ kind: "register", id: 123 });
    expect(parseChannelId(" vm456 ")).toEqual({ kind: "virtualMeter", id: 456 });
  });

  it("formats back to the wire form", () => {
    expect(formatChannelId({ kind: "register", id: 7 })).toBe("R7");
    expect(formatChannelId(parseChannelId("vm12"))).toBe("VM12");
  });

  it("rejects anything else", () => {
    expect(() => parseChannelId("M1")).toThrow(InvalidChannel);
    expect(() => parseChannelId("R")).toThrow(InvalidChannel);
    expect(() => parseChannelId({ kind: "register", id: -1 })).toThrow(InvalidChannel);
    expect(() => parseChannelId({ kind: "register", id: 1.5 })).toThrow(InvalidChannel);
  });
});
