import { setTimeout as delay } from "node:timers/promises";

/** Resolves after `ms`, or early (without throwing) once `signal` aborts. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, signal ? { signal } : {});
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
}
