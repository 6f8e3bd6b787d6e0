import assert from "node:assert/strict";
import { toPropertyLocalTime } from "../src/services/time-normalizer.service";
import { convertWithTimeZoneTable } from "../src/integrations/timezone/timezone.sdk";
import { DirectorySeed, InMemoryDirectory } from "../src/integrations/memory/memory.store";
import { TimeZoneConverter } from "../src/domain/repositories";
import { baseSeed, noopLogger } from "./helpers/fixtures";

const noon = new Date("2024-03-01T12:00:00Z");

function normalizer(patch: Partial<DirectorySeed>, convert: TimeZoneConverter = convertWithTimeZoneTable) {
  const properties = new InMemoryDirectory({ ...baseSeed(), ...patch });
  return (utc: Date, propertyId: number) => toPropertyLocalTime(utc, propertyId, { properties, convert, logger: noopLogger });
}

async function testFixedOffsetWhenNoTimeZoneRecord() {
  const toLocal = normalizer({});
  assert.deepEqual(await toLocal(noon, 42), { localTime: "2024-03-01T07:00:00", source: "fixed-offset" });
  // crosses midnight into a leap day
  assert.deepEqual(await toLocal(new Date("2024-03-01T02:30:00Z"), 42), {
    localTime: "2024-02-29T21:30:00",
    source: "fixed-offset",
  });
}

async function testTimeZoneTableWins() {
  const toLocal = normalizer({
    timeZones: [{ propertyId: 42, offsetHours: -6, zoneRef: "America/Chicago" }],
  });
  // standard time before the March DST switch
  assert.deepEqual(await toLocal(noon, 42), { localTime: "2024-03-01T06:00:00", source: "timezone-table" });
  assert.deepEqual(await toLocal(new Date("2024-07-01T12:00:00Z"), 42), {
    localTime: "2024-07-01T07:00:00",
    source: "timezone-table",
  });
}

async function testEmptyZoneRefUsesRecordOffset() {
  const toLocal = normalizer({ timeZones: [{ propertyId: 42, offsetHours: 2, zoneRef: "" }] });
  assert.deepEqual(await toLocal(noon, 42), { localTime: "2024-03-01T14:00:00", source: "timezone-table" });
}

async function testPropertyZoneRefFillsEmptyRecordRef() {
  const properties = new InMemoryDirectory({
    ...baseSeed(),
    timeZones: [{ propertyId: 42, offsetHours: 2, zoneRef: "" }],
  });
  const result = await toPropertyLocalTime(noon, 42, {
    properties,
    convert: convertWithTimeZoneTable,
    logger: noopLogger,
    propertyZoneRef: "America/Chicago",
  });
  assert.deepEqual(result, { localTime: "2024-03-01T06:00:00", source: "timezone-table" });
}

async function testUnknownZoneFallsBackToFixedOffset() {
  const toLocal = normalizer({
    timeZones: [{ propertyId: 42, offsetHours: 0, zoneRef: "Mars/Olympus_Mons" }],
    parameters: [{ propertyId: 42, name: "TIME_OFFSET_HOURS", value: "3" }],
  });
  assert.deepEqual(await toLocal(noon, 42), { localTime: "2024-03-01T15:00:00", source: "fixed-offset" });
}

async function testNullConversionFallsBackToFixedOffset() {
  const calls: Array<[string, number, string]> = [];
  const convert: TimeZoneConverter = async (utc, offset, ref) => {
    calls.push([utc.toISOString(), offset, ref]);
    return null;
  };
  const toLocal = normalizer({ timeZones: [{ propertyId: 42, offsetHours: -8, zoneRef: "PST-TABLE" }] }, convert);
  assert.deepEqual(await toLocal(noon, 42), { localTime: "2024-03-01T07:00:00", source: "fixed-offset" });
  assert.deepEqual(calls, [["2024-03-01T12:00:00.000Z", -8, "PST-TABLE"]]);
}

async function testUtcRetainedAsLastResort() {
  const none = normalizer({ parameters: [] });
  assert.deepEqual(await none(noon, 42), { localTime: "2024-03-01T12:00:00", source: "utc" });

  const fractional = normalizer({ parameters: [{ propertyId: 42, name: "TIME_OFFSET_HOURS", value: "5.5" }] });
  assert.deepEqual(await fractional(noon, 42), { localTime: "2024-03-01T12:00:00", source: "utc" });
}

async function testDeterministic() {
  const toLocal = normalizer({ timeZones: [{ propertyId: 42, offsetHours: -5, zoneRef: "America/New_York" }] });
  const first = await toLocal(noon, 42);
  const second = await toLocal(noon, 42);
  assert.deepEqual(first, second);
  assert.equal(first.localTime, "2024-03-01T07:00:00");
}

async function run() {
  await testFixedOffsetWhenNoTimeZoneRecord();
  await testTimeZoneTableWins();
  await testEmptyZoneRefUsesRecordOffset();
  await testPropertyZoneRefFillsEmptyRecordRef();
  await testUnknownZoneFallsBackToFixedOffset();
  await testNullConversionFallsBackToFixedOffset();
  await testUtcRetainedAsLastResort();
  await testDeterministic();
  console.log("time-normalizer tests passed");
}

run().catch((err) => {
  console.error("time-normalizer tests failed", err);
  process.exitCode = 1;
});
