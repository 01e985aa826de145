import { setTimeout as delay } from "node:timers/promises";

/**
 * Time source for polling loops
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

export interface WaitOptions {
  timeoutMs: number;
  intervalMs: number;
  clock?: Clock;
}

/**
 * Poll until the probe succeeds or the timeout elapses
 * The probe always runs at least once.
 * @returns true if the probe succeeded, false on timeout
 */
export async function waitUntil(
  probe: () => Promise<boolean>,
  options: WaitOptions,
): Promise<boolean> {
  const clock = options.clock ?? systemClock;
  const deadline = clock.now() + options.timeoutMs;

  for (;;) {
    if (await probe()) {
      return true;
    }
    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      return false;
    }
    await clock.sleep(Math.min(options.intervalMs, remaining));
  }
}

export type HttpProbe = (url: string) => Promise<number | null>;

const PROBE_TIMEOUT_MS = 5000;

/**
 * Single GET request
 * @returns the HTTP status, or null when no response arrived
 */
export const probeHttp: HttpProbe = async (url) => {
  try {
    const response = await fetch(url, {
      redirect: "manual",
      signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
    });
    await response.body?.cancel();
    return response.status;
  } catch {
    return null;
  }
};
