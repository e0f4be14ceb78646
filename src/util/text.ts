const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');

function coerceString(input: unknown): string {
  try {
    return String(input ?? '');
  } catch {
    return '';
  }
}

function isForbiddenChar(ch: string): boolean {
  const code = ch.codePointAt(0) ?? 0;
  return code <= 0x1f || code === 0x7f || code === 0x85 || code === 0x2028 || code === 0x2029;
}

/**
 * Collapses control characters and whitespace runs into single spaces and caps the result at
 * `maxBytes` of UTF-8 without splitting a code point.
 */
export function formatOneLineUtf8(input: unknown, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return '';

  const buf = new Uint8Array(maxBytes);
  let written = 0;
  let pendingSpace = false;
  for (const ch of coerceString(input)) {
    if (isForbiddenChar(ch) || /\s/u.test(ch)) {
      pendingSpace = written > 0;
      continue;
    }

    if (pendingSpace) {
      const spaceRes = textEncoder.encodeInto(' ', buf.subarray(written));
      if (spaceRes.written === 0) break;
      written += spaceRes.written;
      pendingSpace = false;
      if (written >= maxBytes) break;
    }

    const res = textEncoder.encodeInto(ch, buf.subarray(written));
    if (res.written === 0) break;
    written += res.written;
    if (written >= maxBytes) break;
  }
  return written === 0 ? '' : textDecoder.decode(buf.subarray(0, written));
}

function safeErrorMessageInput(err: unknown): string {
  if (err === null) return 'null';

  switch (typeof err) {
    case 'string':
      return err;
    case 'number':
    case 'boolean':
    case 'bigint':
    case 'symbol':
    case 'undefined':
      return String(err);
    case 'object': {
      try {
        if ('message' in err && typeof err.message === 'string') return err.message;
      } catch {
        // getters may throw
      }
      break;
    }
    default:
      break;
  }

  // Avoid calling toString() on arbitrary objects/functions (can throw / be expensive).
  return 'Error';
}

export function formatOneLineError(err: unknown, maxBytes: number, fallback = 'Error'): string {
  const safe = formatOneLineUtf8(safeErrorMessageInput(err), maxBytes);
  return safe || fallback || 'Error';
}
