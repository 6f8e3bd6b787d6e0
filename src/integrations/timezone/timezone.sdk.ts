import { TimeZoneConverter } from "../../domain/repositories";
import { LocalDateTime } from "../../domain/types";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

// Renders the UTC fields of a Date as a zone-less wall-clock time
export function toLocalDateTime(date: Date): LocalDateTime {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}` +
    `T${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 3_600_000);
}

function inZone(utc: Date, timeZone: string): LocalDateTime {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  })
    .formatToParts(utc)
    .reduce<Record<string, string>>((acc, p) => {
      if (p.type !== "literal") acc[p.type] = p.value;
      return acc;
    }, {});
  return `${parts.year}-${parts.month}-${parts.day}T${parts.hour}:${parts.minute}:${parts.second}`;
}

/**
 * Default time-zone conversion: an IANA zone reference wins; an empty
 * reference applies the record's whole-hour offset. Unknown zones yield null.
 */
export const convertWithTimeZoneTable: TimeZoneConverter = async (utc, offsetHours, zoneRef) => {
  if (!zoneRef) {
    return Number.isInteger(offsetHours) ? toLocalDateTime(addHours(utc, offsetHours)) : null;
  }
  try {
    return inZone(utc, zoneRef);
  } catch (err) {
    if (err instanceof RangeError) return null;
    throw err;
  }
};
