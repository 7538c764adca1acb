/**
 * Fixed-width text tables for the prompt
 */

export const EMPTY_TABLE = "(no data)";

/**
 * Render rows as a plain-text table: a header line, then one line per row
 * prefixed with its index. Cells are right-aligned to the widest value in
 * their column; columns are separated by two spaces.
 */
export function formatTable(columns: readonly string[], rows: readonly (readonly string[])[]): string {
  if (rows.length === 0) return EMPTY_TABLE;

  const indexWidth = String(rows.length - 1).length;
  const widths = columns.map((column, c) =>
    rows.reduce((width, row) => Math.max(width, (row[c] ?? "").length), column.length)
  );

  const line = (index: string, cells: readonly string[]) =>
    index.padEnd(indexWidth) +
    widths.map((width, c) => "  " + (cells[c] ?? "").padStart(width)).join("");

  return [line("", columns), ...rows.map((row, i) => line(String(i), row))].join("\n");
}

/**
 * Keep the `max` most recent items, ascending by timestamp
 */
export function takeMostRecent<T extends { timestamp: number }>(
  items: readonly T[],
  max: number
): { rows: T[]; total: number } {
  const sorted = [...items].sort((a, b) => a.timestamp - b.timestamp);
  return { rows: sorted.length > max ? sorted.slice(sorted.length - max) : sorted, total: sorted.length };
}
