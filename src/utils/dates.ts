/**
 * Date formatting in the sheet's "YYYY-MM-DD HH:mm:ss" convention
 */

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format a Date using its local wall-clock fields.
 *
 * pg parses `timestamp without time zone` into local time, so local getters
 * reproduce the value stored in the database.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${String(date.getFullYear())}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

const ISO_LIKE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Reformat an ISO-8601 string from the partner API for the sheet.
 *
 * The wall-clock part is kept as written (offsets are dropped, not converted);
 * text that is not ISO-like is returned unchanged.
 */
export function toSheetDate(value: string | null | undefined): string {
  if (value === null || value === undefined || value === "") {
    return "";
  }

  const match = ISO_LIKE.exec(value.trim());
  if (!match) {
    return value;
  }

  const [, year, month, day, hours = "00", minutes = "00", seconds = "00"] =
    match;
  return `${year ?? ""}-${month ?? ""}-${day ?? ""} ${hours}:${minutes}:${seconds}`;
}

/**
 * Current time in the given IANA timezone, in sheet format.
 * Falls back to local time when the timezone is unknown.
 */
export function nowInTimezone(timezone: string, now: Date = new Date()): string {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat("en-CA", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
  } catch (error) {
    if (error instanceof RangeError) {
      return formatTimestamp(now);
    }
    throw error;
  }

  const parts = Object.fromEntries(
    formatter.formatToParts(now).map((part) => [part.type, part.value])
  );
  return `${parts.year ?? ""}-${parts.month ?? ""}-${parts.day ?? ""} ${parts.hour ?? ""}:${parts.minute ?? ""}:${parts.second ?? ""}`;
}

/**
 * Status marker written to each tab after a sync
 */
export function makeStatusLine(
  tab: string,
  rowCount: number,
  timezone: string,
  now: Date = new Date()
): string {
  return `${nowInTimezone(timezone, now)} | ${tab} | records: ${String(rowCount)}`;
}
