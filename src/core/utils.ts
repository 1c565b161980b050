import type { JsonObject } from "./logger.js";

export function isoNow(): string {
  return new Date().toISOString();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/** Longest delay a Node timer honours. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Resolves after `ms` milliseconds, or as soon as `signal` aborts.
 * Never rejects: callers check `signal.aborted` afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    let remaining = Math.max(0, ms);
    let timer: NodeJS.Timeout | undefined;
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    // Longer delays fire after 1ms, so they are split into chained timers.
    const arm = (): void => {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= chunk;
      timer = setTimeout(() => {
        if (remaining > 0) {
          arm();
          return;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, chunk);
    };

    arm();
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Parses `text` as JSON and returns it only when it is a JSON object. */
export function parseJsonObject(text: string): JsonObject | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

// JSON.parse only produces JSON values, so checking the top level is enough.
function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value);
}
