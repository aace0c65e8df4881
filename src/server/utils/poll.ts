/**
 * Polling helpers for bounded waits.
 */

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
}

export async function delay(ms: number): Promise<void> {
  await new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Calls `check` until it yields a value other than null/undefined or the
 * deadline passes. The first check runs immediately; returns null on timeout.
 */
export async function pollUntil<T>(
  check: () => Promise<T | null | undefined>,
  options: PollOptions
): Promise<T | null> {
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    const value = await check();
    if (value !== null && value !== undefined) {
      return value;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return null;
    }
    await delay(Math.min(options.intervalMs, remaining));
  }
}
