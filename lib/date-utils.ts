import { fromDate, toTimeZone, ZonedDateTime } from "@internationalized/date";

/**
 * Epoch milliseconds, branded so they cannot be mixed up with Unix seconds
 */
export type Milliseconds = number & { readonly __brand: "Milliseconds" };

export function asMilliseconds(value: number): Milliseconds {
  return value as Milliseconds;
}

function pad(value: number, length = 2): string {
  return String(value).padStart(length, "0");
}

/**
 * Convert ZonedDateTime to Unix timestamp (seconds since epoch)
 * @param zonedDateTime - ZonedDateTime object
 * @returns Unix timestamp in seconds
 */
export function toUnixTimestamp(zonedDateTime: ZonedDateTime): number {
  return Math.floor(zonedDateTime.toDate().getTime() / 1000);
}

/**
 * Convert ZonedDateTime to epoch milliseconds
 */
export function toEpochMs(zonedDateTime: ZonedDateTime): Milliseconds {
  return asMilliseconds(zonedDateTime.toDate().getTime());
}

/**
 * Convert epoch milliseconds to a ZonedDateTime in the given IANA time zone
 */
export function fromEpochMs(
  epochMs: number,
  timeZone: string,
): ZonedDateTime {
  return fromDate(new Date(epochMs), timeZone);
}

/**
 * Convert Unix timestamp to ZonedDateTime
 * @param unixSeconds - Unix timestamp in seconds
 * @param timeZone - IANA time zone of the result (e.g. "America/Los_Angeles")
 */
export function fromUnixTimestamp(
  unixSeconds: number,
  timeZone: string,
): ZonedDateTime {
  return fromEpochMs(unixSeconds * 1000, timeZone);
}

/**
 * Format a ZonedDateTime the way the Atlas API expects it: UTC, second
 * precision, trailing Z (e.g. "2023-05-01T07:00:00Z")
 */
export function formatAtlasTimestamp(zonedDateTime: ZonedDateTime): string {
  const utc = toTimeZone(zonedDateTime, "UTC");
  return (
    `${pad(utc.year, 4)}-${pad(utc.month)}-${pad(utc.day)}` +
    `T${pad(utc.hour)}:${pad(utc.minute)}:${pad(utc.second)}Z`
  );
}

/**
 * Format a ZonedDateTime as ISO8601 with its own offset, without milliseconds
 * @returns e.g. "2023-05-01T00:30:00-07:00"
 */
export function formatTimeISO(zonedDateTime: ZonedDateTime): string {
  const offsetMinutes = zonedDateTime.offset / (1000 * 60);
  const offsetHours = Math.floor(Math.abs(offsetMinutes) / 60);
  const offsetMins = Math.abs(offsetMinutes) % 60;
  const offsetSign = offsetMinutes >= 0 ? "+" : "-";
  const offsetString = `${offsetSign}${pad(offsetHours)}:${pad(offsetMins)}`;

  return (
    `${pad(zonedDateTime.year, 4)}-${pad(zonedDateTime.month)}-${pad(zonedDateTime.day)}` +
    `T${pad(zonedDateTime.hour)}:${pad(zonedDateTime.minute)}:${pad(zonedDateTime.second)}` +
    offsetString
  );
}
