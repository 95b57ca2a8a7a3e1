import {
  clearTimeout as nodeClearTimeout,
  setTimeout as nodeSetTimeout,
} from "node:timers";

/** Handle returned by {@link runtimeSetTimeout}. */
export type TimeoutHandle = ReturnType<typeof nodeSetTimeout>;

const fallbackTimers = {
  setTimeout: nodeSetTimeout,
  clearTimeout: nodeClearTimeout,
} as const;

/**
 * Looks the timer up on {@link globalThis} at call time. Sinon installs its
 * fake clock there, so probe timeouts stay under the test's control instead of
 * being bound to the native implementation captured at import.
 */
function resolveTimer<K extends keyof typeof fallbackTimers>(key: K): (typeof fallbackTimers)[K] {
  const candidate: unknown = Reflect.get(globalThis, key);
  if (typeof candidate === "function") {
    return candidate as (typeof fallbackTimers)[K];
  }
  return fallbackTimers[key];
}

/** Schedules {@link callback} after {@link delayMs} using the active timer implementation. */
export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  const schedule = resolveTimer("setTimeout");
  return schedule(callback, delayMs);
}

/** Cancels a timeout created by {@link runtimeSetTimeout}. */
export function runtimeClearTimeout(handle: TimeoutHandle): void {
  const cancel = resolveTimer("clearTimeout");
  cancel(handle);
}
