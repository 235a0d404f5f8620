import { describe, it, expect } from "vitest";
import { Mutex } from "../src/mutex.js";
import { delay } from "./fakeDcsServer.js";

describe("Mutex", () => {
  it("runs holders one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const job = (name: string, ms: number) =>
      mutex.run(async () => {
        events.push(`${name}:start`);
        await delay(ms);
        events.push(`${name}:end`);
      });

    await Promise.all([job("a", 5), job("b", 1), job("c", 0)]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(mutex.locked).toBe(false);
  });

  it("releases after a failing holder", async () => {
    const mutex = new Mutex();
    await expect(mutex.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await mutex.run(async () => "next")).toBe("next");
  });

  it("ignores a second release", async () => {
    const mutex = new Mutex();
    const release = await mutex.acquire();
    expect(mutex.locked).toBe(true);
    release();
    release();
    expect(mutex.locked).toBe(false);
    const again = await mutex.acquire();
    expect(mutex.locked).toBe(true);
    again();
  });
});
