export type ListLimits = {
  /** Longest accepted input, in UTF-16 code units. */
  maxLen: number;
  maxItems: number;
};

const DEFAULT_LIMITS: ListLimits = { maxLen: 256 * 1024, maxItems: 65535 };

/** Splits `a, b,,c` into trimmed, non-empty entries. */
export function splitCommaList(raw: string, limits: Partial<ListLimits> = {}): string[] {
  const { maxLen, maxItems } = { ...DEFAULT_LIMITS, ...limits };
  if (raw.length > maxLen) throw new Error(`list is longer than ${maxLen} characters`);

  const entries: string[] = [];
  for (const part of raw.split(',')) {
    const entry = part.trim();
    if (entry === '') continue;
    if (entries.length === maxItems) throw new Error(`list has more than ${maxItems} entries`);
    entries.push(entry);
  }
  return entries;
}
