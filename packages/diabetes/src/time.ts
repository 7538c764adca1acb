/**
 * Timezone-aware formatting for export timestamps.
 *
 * Exports carry naive local times, so every wall-clock rendering must use the
 * same timezone the parser assumed. Date.getHours() would give the host's zone.
 */

/**
 * Default timezone Glooko exports are written in
 */
export const DEFAULT_EXPORT_TIMEZONE = "America/Los_Angeles";

function partsInTimezone(timestampMs: number, timezone: string): Record<string, string> {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  });

  const parts: Record<string, string> = {};
  for (const part of formatter.formatToParts(new Date(timestampMs))) {
    parts[part.type] = part.value;
  }
  return parts;
}

/**
 * Format a timestamp as YYYY-MM-DD in the given timezone
 */
export function formatDateInTimezone(
  timestampMs: number,
  timezone: string = DEFAULT_EXPORT_TIMEZONE
): string {
  const p = partsInTimezone(timestampMs, timezone);
  return `${p.year}-${p.month}-${p.day}`;
}

/**
 * Format a timestamp as "YYYY-MM-DD HH:MM" in the given timezone
 */
export function formatDateTimeInTimezone(
  timestampMs: number,
  timezone: string = DEFAULT_EXPORT_TIMEZONE
): string {
  const p = partsInTimezone(timestampMs, timezone);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}`;
}

/**
 * Get the hour (0-23) for a timestamp in the given timezone.
 */
export function getHourInTimezone(
  timestampMs: number,
  timezone: string = DEFAULT_EXPORT_TIMEZONE
): number {
  return parseInt(partsInTimezone(timestampMs, timezone).hour, 10);
}

/**
 * Throws RangeError for names Intl does not know
 */
export function assertValidTimezone(timezone: string): void {
  new Intl.DateTimeFormat("en-US", { timeZone: timezone });
}
