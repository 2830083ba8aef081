import { describe, it, expect, vi } from "vitest";
import { Throttle } from "../lib/scraping/throttle";

describe("Throttle", () => {
  it("sleeps the fixed interval on every call", async () => {
    const sleep = vi.fn().mockResolvedValue(undefined);
    const throttle = new Throttle(300, sleep);

    await throttle.throttle();
    await throttle.throttle();

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 300);
    expect(sleep).toHaveBeenNthCalledWith(2, 300);
    expect(throttle.count).toBe(2);
  });

  it("waits in real time by default", async () => {
    const throttle = new Throttle(50);

    const start = Date.now();
    await throttle.throttle();
    const elapsed = Date.now() - start;

    expect(elapsed).toBeGreaterThanOrEqual(45);
  });
});
