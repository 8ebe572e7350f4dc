import { describe, expect, it } from "vitest";
import { TokenLocks } from "../src/services/checkout/lock.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("TokenLocks", () => {
  it("runs work for the same token one after another", async () => {
    const locks = new TokenLocks();
    const events: string[] = [];

    const first = locks.run("PR-0001", async () => {
      events.push("first:start");
      await delay(10);
      events.push("first:end");
    });
    const second = locks.run("PR-0001", async () => {
      events.push("second:start");
    });
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("does not block different tokens", async () => {
    const locks = new TokenLocks();
    const events: string[] = [];

    const slow = locks.run("PR-0001", async () => {
      events.push("slow:start");
      await delay(10);
      events.push("slow:end");
    });
    const fast = locks.run("PR-0002", async () => {
      events.push("fast");
    });
    await Promise.all([slow, fast]);

    expect(events).toEqual(["slow:start", "fast", "slow:end"]);
  });

  it("releases the token when work throws", async () => {
    const locks = new TokenLocks();

    await expect(
      locks.run("PR-0001", async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(locks.isLocked("PR-0001")).toBe(false);
    await expect(locks.run("PR-0001", async () => "next")).resolves.toBe("next");
  });

  it("reports a token as locked while work is queued", async () => {
    const locks = new TokenLocks();
    const running = locks.run("PR-0001", () => delay(5));

    expect(locks.isLocked("PR-0001")).toBe(true);
    await running;
    expect(locks.isLocked("PR-0001")).toBe(false);
  });
});
