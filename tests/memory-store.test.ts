import assert from "node:assert/strict";
import { promises as fs } from "fs";
import path from "path";
import { InMemoryAlertStore, isDirectorySeed } from "../src/integrations/memory/memory.store";
import { AlertRecord } from "../src/domain/types";

function record(overrides: Partial<AlertRecord> = {}): AlertRecord {
  return {
    alertId: 1001,
    alertType: 9,
    propertyId: 42,
    localTime: "2024-03-01T07:00:00",
    extension: "100",
    sourceIp: "10.0.0.5",
    acknowledged: false,
    acknowledgedBy: null,
    ackIp: null,
    legacyMessage: "",
    createdAt: "2024-03-01T12:00:01.000Z",
    version: 1,
    dedupBypass: false,
    ...overrides,
  };
}

async function testExampleSeedIsAccepted() {
  const raw = await fs.readFile(path.join(__dirname, "..", "tools", "harness", "seed.example.json"), "utf8");
  assert.equal(isDirectorySeed(JSON.parse(raw)), true);
}

async function testMalformedSeedsAreRejected() {
  assert.equal(isDirectorySeed(null), false);
  assert.equal(isDirectorySeed([]), false);
  assert.equal(isDirectorySeed({}), false);
  assert.equal(isDirectorySeed({ properties: {} }), false);
  assert.equal(isDirectorySeed({ properties: [{ id: "42", name: "Harbor View Suites", legacy: false }] }), false);
  assert.equal(isDirectorySeed({ properties: [], stays: "none" }), false);
  assert.equal(isDirectorySeed({ properties: [{ id: 42, name: "Harbor View Suites", legacy: false }] }), true);
}

async function testNaturalKeyClaimIsExclusive() {
  const alerts = new InMemoryAlertStore();
  assert.equal(await alerts.create(record()), true);
  assert.equal(await alerts.create(record({ alertId: 1002 })), false);
  assert.equal(alerts.all().length, 1);
}

async function testBypassRecordsGetTheirOwnKey() {
  const alerts = new InMemoryAlertStore();
  assert.equal(await alerts.create(record({ dedupBypass: true })), true);
  assert.equal(await alerts.create(record({ alertId: 1002, dedupBypass: true })), true);
  assert.equal(await alerts.findByNaturalKey(9, 42, "2024-03-01T07:00:00", "100"), null);

  const second = record({ alertId: 1002, dedupBypass: true });
  assert.equal(await alerts.stampAckIp(second, "10.0.0.9"), true);
  assert.equal((await alerts.findByAckIp(9, 42, "10.0.0.9"))?.alertId, 1002);
}

async function run() {
  await testExampleSeedIsAccepted();
  await testMalformedSeedsAreRejected();
  await testNaturalKeyClaimIsExclusive();
  await testBypassRecordsGetTheirOwnKey();
  console.log("memory-store tests passed");
}

run().catch((err) => {
  console.error("memory-store tests failed", err);
  process.exitCode = 1;
});
