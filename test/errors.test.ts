import { describe, it, expect } from "vitest";
import { DcsError, ERR, errMessage, InvalidChannel, RequestFailed } from "../src/errors.js";

describe("errors", () => {
  it("carry a code, a name and the status where there is one", () => {
    const err = new RequestFailed(502, "upstream unavailable", { op: "readings" });
    expect(err).toBeInstanceOf(DcsError);
    expect(err.name).toBe("RequestFailed");
    expect(err.code).toBe(ERR.REQUEST_FAILED);
    expect(err.status).toBe(502);
    expect(err.details).toEqual({ op: "readings" });

    const channel = new InvalidChannel("R9: not found", 404);
    expect([channel.code, channel.status]).toEqual([ERR.INVALID_CHANNEL, 404]);
  });

  it("formats unknown throwables", () => {
    expect(errMessage(new Error("boom"))).toBe("boom");
    expect(errMessage("plain")).toBe("plain");
  });
});
