export interface DataRange {
  /** Earliest timestamp (Unix ms) */
  start: number;
  /** Latest timestamp (Unix ms) */
  end: number;
}

/**
 * First and last timestamp across records; null when there are none
 */
export function getDataRange(records: readonly { timestamp: number }[]): DataRange | null {
  if (records.length === 0) return null;

  let start = Infinity;
  let end = -Infinity;
  for (const { timestamp } of records) {
    if (timestamp < start) start = timestamp;
    if (timestamp > end) end = timestamp;
  }
  return { start, end };
}
