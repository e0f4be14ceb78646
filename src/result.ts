export type ErrorCode =
  | 'FRAME_TRUNCATED'
  | 'FRAME_TOO_LARGE'
  | 'CONTROL_EMPTY'
  | 'CONTROL_UNKNOWN_TYPE'
  | 'CONTROL_BAD_LENGTH'
  | 'CONTROL_BAD_CONN_ID'
  | 'CONTROL_BAD_PORT';

export type Result<T> = { ok: true; value: T } | { ok: false; code: ErrorCode; message: string };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(code: ErrorCode, message: string): Result<T> {
  return { ok: false, code, message };
}
