import type { Logger } from "../config/logger";
import { PARAM_TIME_OFFSET_HOURS } from "../domain/mapping";
import { PropertyDirectory, TimeZoneConverter } from "../domain/repositories";
import { LocalDateTime, TimeSource } from "../domain/types";
import { addHours, toLocalDateTime } from "../integrations/timezone/timezone.sdk";

export interface LocalTimeResult {
  localTime: LocalDateTime;
  source: TimeSource;
}

interface NormalizerInput {
  utc: Date;
  propertyId: number;
  properties: PropertyDirectory;
  convert: TimeZoneConverter;
  propertyZoneRef?: string;
}

type TimeStrategy = (input: NormalizerInput) => Promise<LocalTimeResult | null>;

const timeZoneTable: TimeStrategy = async ({ utc, propertyId, properties, convert, propertyZoneRef }) => {
  const tz = await properties.getTimeZone(propertyId);
  if (!tz) return null;
  // the property's own reference stands in when the record carries none
  const zoneRef = tz.zoneRef || propertyZoneRef || "";
  const converted = await convert(utc, tz.offsetHours, zoneRef);
  if (!converted) return null;
  return { localTime: converted, source: "timezone-table" };
};

const fixedOffset: TimeStrategy = async ({ utc, propertyId, properties }) => {
  const raw = await properties.getParameter(propertyId, PARAM_TIME_OFFSET_HOURS);
  if (raw === null || raw.trim() === "") return null;
  const hours = Number(raw);
  if (!Number.isInteger(hours)) return null;
  return { localTime: toLocalDateTime(addHours(utc, hours)), source: "fixed-offset" };
};

export const timeStrategies: readonly TimeStrategy[] = [timeZoneTable, fixedOffset];

export interface NormalizeTimeOptions {
  properties: PropertyDirectory;
  convert: TimeZoneConverter;
  logger: Logger;
  propertyZoneRef?: string;
}

export async function toPropertyLocalTime(
  utc: Date,
  propertyId: number,
  options: NormalizeTimeOptions
): Promise<LocalTimeResult> {
  const input: NormalizerInput = {
    utc,
    propertyId,
    properties: options.properties,
    convert: options.convert,
    propertyZoneRef: options.propertyZoneRef,
  };
  for (const strategy of timeStrategies) {
    const result = await strategy(input);
    if (result) return result;
  }
  options.logger.debug("alert911:time:utc_fallback", { propertyId });
  return { localTime: toLocalDateTime(utc), source: "utc" };
}
