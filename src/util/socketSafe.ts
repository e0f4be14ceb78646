import type { Readable, Writable } from 'node:stream';

// Stream methods can throw once the peer has torn a socket down.

export type CaptureResult = Readonly<{ ok: boolean; err: unknown }>;

export function destroyBestEffort(stream: { destroy(err?: Error): unknown } | null | undefined): void {
  if (!stream) return;
  try {
    stream.destroy();
  } catch {
    // already destroyed
  }
}

/**
 * Writes a chunk and reports the outcome. `ok` mirrors `Writable.write()` (false means the
 * caller should wait for `drain`); a thrown error is captured in `err` with `ok: false`.
 */
export function writeCaptureErrorBestEffort(stream: Writable, chunk: Buffer): CaptureResult {
  try {
    return { ok: stream.write(chunk), err: null };
  } catch (err) {
    return { ok: false, err };
  }
}

export function endCaptureErrorBestEffort(stream: Writable, chunk?: Buffer): unknown {
  try {
    if (chunk) stream.end(chunk);
    else stream.end();
    return null;
  } catch (err) {
    return err ?? new Error('end() failed');
  }
}

export function pauseBestEffort(stream: Readable): void {
  try {
    stream.pause();
  } catch {
    // destroyed
  }
}

export function resumeBestEffort(stream: Readable): void {
  try {
    stream.resume();
  } catch {
    // destroyed
  }
}
