/**
 * Calls `unref()` on timers and handles when available so background work never keeps the
 * process alive on its own.
 */
export function unrefBestEffort(handle: unknown): void {
  if (!handle || (typeof handle !== 'object' && typeof handle !== 'function')) return;
  try {
    if ('unref' in handle && typeof handle.unref === 'function') handle.unref();
  } catch {
    // unref() on an already-closed handle may throw
  }
}
