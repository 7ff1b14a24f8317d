import { setTimeout as delay } from "node:timers/promises";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolve após `ms`, ou antes se o signal abortar (nunca rejeita por abort). */
export const sleep: SleepFn = async (ms, signal) => {
  if (signal?.aborted || ms <= 0) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!(err instanceof Error && err.name === "AbortError")) throw err;
  }
};
