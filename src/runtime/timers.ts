/** Handle returned by {@link runtimeSetTimeout}. */
export type TimeoutHandle = ReturnType<typeof setTimeout>;

/**
 * Timers are resolved on {@link globalThis} at call time, so fake timers
 * installed after this module loaded still drive request timeouts and clock
 * sleeps.
 */
export function runtimeSetTimeout(callback: () => void, delayMs: number): TimeoutHandle {
  return globalThis.setTimeout(callback, delayMs);
}

export function runtimeClearTimeout(handle: TimeoutHandle): void {
  globalThis.clearTimeout(handle);
}
