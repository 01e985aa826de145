import { afterEach, describe, expect, test, vi } from "vitest";
import { probeHttp, waitUntil } from "../../../src/core/readiness.ts";
import { createFakeClock } from "../../helpers/test-helpers.ts";

describe("waitUntil", () => {
  test("returns true as soon as the probe succeeds", async () => {
    const clock = createFakeClock();
    let attempts = 0;

    const ready = await waitUntil(async () => ++attempts === 3, {
      timeoutMs: 60_000,
      intervalMs: 1000,
      clock,
    });

    expect(ready).toBe(true);
    expect(attempts).toBe(3);
    expect(clock.elapsed()).toBe(2000);
  });

  test("gives up at the deadline", async () => {
    const clock = createFakeClock();
    const probe = vi.fn(async () => false);

    const ready = await waitUntil(probe, { timeoutMs: 5000, intervalMs: 2000, clock });

    expect(ready).toBe(false);
    // 0, 2000, 4000, then a shortened final wait to 5000
    expect(probe).toHaveBeenCalledTimes(4);
    expect(clock.elapsed()).toBe(5000);
  });

  test("probes once even with a zero timeout", async () => {
    const probe = vi.fn(async () => true);

    expect(await waitUntil(probe, { timeoutMs: 0, intervalMs: 10, clock: createFakeClock() })).toBe(true);
    expect(probe).toHaveBeenCalledTimes(1);
  });
});

describe("probeHttp", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test("returns the response status", async () => {
    const fetchMock = vi.fn(async () => new Response("ok", { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);

    expect(await probeHttp("http://localhost:5985")).toBe(200);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test("reports non-200 statuses as-is", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(null, { status: 502 })));

    expect(await probeHttp("http://localhost:5985")).toBe(502);
  });

  test("returns null when the connection fails", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      }),
    );

    expect(await probeHttp("http://localhost:5985")).toBeNull();
  });
});
