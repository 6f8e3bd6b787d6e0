import assert from "node:assert/strict";
import { handleCallEvents } from "../src/index";
import { PipelineRun, processCallEvent } from "../src/workflows/alert-911/orchestrator";
import { baseSeed, buildHarness, makeEvent, noopLogger, testConfig, TestHarness } from "./helpers/fixtures";
import { CallEvent } from "../src/domain/types";

const config = testConfig();
const fixedNow = () => new Date("2024-03-01T12:00:01.000Z");

function submit(h: TestHarness, event: CallEvent) {
  return processCallEvent(event, { config, logger: noopLogger, dependencies: h.deps, now: fixedNow });
}

async function testScenarioANewAlert() {
  const h = buildHarness();
  const result = await submit(h, makeEvent());
  assert.deepEqual(result, {
    success: true,
    state: "DONE",
    reason: "dispatched",
    propertyId: 42,
    localTime: "2024-03-01T07:00:00",
    alertId: 1001,
  });
  const records = h.alerts.all();
  assert.equal(records.length, 1);
  assert.equal(records[0]?.alertType, 9);
  assert.equal(records[0]?.ackIp, "10.0.0.5");
  assert.equal(h.sink.emails.length, 1);
  assert.deepEqual(
    h.sink.scheduled.map((s) => s.kind),
    ["phone"]
  );
  assert.deepEqual(h.audit.stages(), ["Entry", "Property resolved", "Converted time", "Alert created"]);
}

async function testScenarioBRedeliveryIsDuplicate() {
  const h = buildHarness();
  await submit(h, makeEvent());
  const again = await submit(h, makeEvent());
  assert.deepEqual(again, {
    success: true,
    state: "DUPLICATE",
    reason: "duplicate_ip",
    propertyId: 42,
    localTime: "2024-03-01T07:00:00",
    alertId: 1001,
  });
  assert.equal(h.alerts.all().length, 1);
  assert.equal(h.sink.emails.length, 1);
  assert.equal(h.audit.stages().at(-1), "Duplicate found");
}

async function testKeyBasedIdempotenceWithoutIp() {
  const h = buildHarness();
  const first = await submit(h, makeEvent({ sourceIp: "" }));
  const second = await submit(h, makeEvent({ sourceIp: "", rawSequence: "seq-0002" }));
  assert.equal(first.state, "DONE");
  assert.equal(second.state, "DUPLICATE");
  assert.equal(second.reason, "duplicate_key");
  assert.equal(h.alerts.all().length, 1);
}

async function testIpPriority() {
  const h = buildHarness();
  await submit(h, makeEvent({ sourceIp: "10.0.0.5" }));
  const sameIpLater = await submit(h, makeEvent({ sourceIp: "10.0.0.5", startTimeUtc: "2024-03-01T12:10:00.000Z" }));
  assert.equal(sameIpLater.reason, "duplicate_ip");

  const otherIp = await submit(h, makeEvent({ sourceIp: "10.0.0.9", startTimeUtc: "2024-03-01T12:20:00.000Z" }));
  assert.equal(otherIp.state, "DONE");
  assert.equal(otherIp.alertId, 1002);
  assert.equal(h.alerts.all().length, 2);
}

async function testLegacyPropertyUsesKeyOnly() {
  const seed = baseSeed();
  seed.properties = [{ id: 42, name: "Harbor View Suites", legacy: true, pbxIntegrationType: "ooma" }];
  const h = buildHarness(seed);
  await submit(h, makeEvent());
  const later = await submit(h, makeEvent({ startTimeUtc: "2024-03-01T12:10:00.000Z" }));
  assert.equal(later.state, "DONE");
  assert.equal(h.alerts.all().length, 2);
}

async function testScenarioCExemptNumber() {
  const seed = baseSeed();
  seed.parameters = [...(seed.parameters ?? []), { propertyId: 42, name: "ALERT911_EXEMPT_NUMBERS", value: "411" }];
  const h = buildHarness(seed);
  const result = await submit(h, makeEvent({ dialedDigits: "411" }));
  assert.deepEqual(result, { success: true, state: "EXEMPT", reason: "exempt_number", propertyId: 42 });
  assert.equal(h.alerts.all().length, 0);
  assert.equal(h.sink.emails.length + h.sink.scheduled.length + h.sink.events.length, 0);
  assert.deepEqual(h.audit.stages(), ["Entry", "Property resolved", "Exempt number"]);
}

async function testScenarioDPropertyNotFound() {
  const h = buildHarness();
  const result = await submit(h, makeEvent({ enterpriseId: "ent-unknown", userId: "nobody" }));
  assert.deepEqual(result, { success: false, state: "FAILED", reason: "property_not_found" });
  assert.equal(h.alerts.all().length, 0);
  assert.deepEqual(h.audit.stages(), ["Entry", "Property not found"]);
}

async function testPartnerGatewayFailure() {
  const h = buildHarness();
  const result = await submit(h, makeEvent({ groupId: "peerless-emergency", enterpriseId: "ent-zzz" }));
  assert.deepEqual(result, { success: false, state: "FAILED", reason: "partner_property_not_found" });
  assert.deepEqual(h.audit.stages(), ["Entry", "Partner property not found"]);
}

async function testResolvedIdWithoutPropertyRecordFails() {
  const seed = baseSeed();
  seed.userExtensions = [{ userId: "user-100", propertyId: 555, extension: "100" }];
  const h = buildHarness(seed);
  const result = await submit(h, makeEvent());
  assert.deepEqual(result, { success: false, state: "FAILED", reason: "property_not_found" });
  assert.equal(h.audit.entries[1]?.propertyId, 555);
}

async function testConcurrentDeliveriesCreateOneAlert() {
  const h = buildHarness();
  const event = makeEvent({ sourceIp: "" });
  const results = await Promise.all([submit(h, event), submit(h, event)]);
  const states = results.map((r) => r.state).sort();
  assert.deepEqual(states, ["DONE", "DUPLICATE"]);
  const dup = results.find((r) => r.state === "DUPLICATE");
  assert.ok(dup && (dup.reason === "duplicate_key" || dup.reason === "duplicate_concurrent"));
  assert.equal(dup?.success, true);
  assert.equal(h.alerts.all().length, 1);
  assert.equal(h.sink.emails.length, 1);
}

async function testBypassEnterpriseIsNotKeyDeduplicated() {
  const h = buildHarness();
  const event = makeEvent({ enterpriseId: "peerless-bypass", sourceIp: "" });
  const first = await submit(h, event);
  const second = await submit(h, event);
  assert.equal(first.state, "DONE");
  assert.equal(first.alertId, 1001);
  assert.deepEqual(second, {
    success: true,
    state: "DONE",
    reason: "dispatched",
    propertyId: 42,
    localTime: "2024-03-01T07:00:00",
    alertId: 1002,
  });
  assert.deepEqual(
    h.alerts.all().map((r) => [r.alertId, r.dedupBypass]),
    [
      [1001, true],
      [1002, true],
    ]
  );
  assert.equal(h.sink.emails.length, 2);
}

async function testUnparseableStartTimeFails() {
  const h = buildHarness();
  const result = await submit(h, makeEvent({ startTimeUtc: "not-a-time" }));
  assert.deepEqual(result, { success: false, state: "FAILED", reason: "invalid_start_time" });
  assert.deepEqual(h.audit.stages(), ["Entry", "Invalid start time"]);
  assert.equal(h.alerts.all().length, 0);
}

async function testCollaboratorErrorWritesTerminalAudit() {
  const h = buildHarness();
  const dependencies = {
    ...h.deps,
    sequence: {
      next: async (): Promise<number> => {
        throw new Error("sequence table unavailable");
      },
    },
  };
  await assert.rejects(
    processCallEvent(makeEvent(), { config, logger: noopLogger, dependencies, now: fixedNow }),
    /sequence table unavailable/
  );
  assert.deepEqual(h.audit.stages(), ["Entry", "Property resolved", "Converted time", "Error"]);
  assert.equal(h.audit.entries.at(-1)?.note, "DISPATCHING: sequence table unavailable");
  assert.equal(h.alerts.all().length, 0);
}

async function testHandleCallEventsProcessesFirstOnly() {
  const h = buildHarness();
  const options = { config, logger: noopLogger, dependencies: h.deps, now: fixedNow };

  const none = await handleCallEvents({ headers: {}, body: "nothing", receivedAt: "2024-03-01T12:00:05.000Z" }, options);
  assert.deepEqual(none, { success: true, state: "NO_EVENT", reason: "no_event" });
  assert.equal(h.audit.entries.length, 0);

  const result = await handleCallEvents(
    {
      headers: {},
      body: [
        { enterprise_id: "ent-unknown", user_id: "nobody", start_time: "2024-03-01 12:00:00" },
        { enterprise_id: "ent-42", user_id: "user-100", ext: "100", start_time: "2024-03-01 12:00:00" },
      ],
      receivedAt: "2024-03-01T12:00:05.000Z",
    },
    options
  );
  assert.equal(result.reason, "property_not_found");
  assert.equal(h.alerts.all().length, 0);
}

async function testStateMachineRejectsSkippedStages() {
  const run = new PipelineRun(noopLogger);
  assert.throws(() => run.to("DISPATCHING"), /Invalid pipeline transition RECEIVED -> DISPATCHING/);
  run.to("RESOLVING_PROPERTY");
  assert.deepEqual(run.finish("EXEMPT", "exempt_number"), { success: true, state: "EXEMPT", reason: "exempt_number" });
  assert.throws(() => run.to("CHECKING_DUPLICATE"));
}

async function run() {
  await testScenarioANewAlert();
  await testScenarioBRedeliveryIsDuplicate();
  await testKeyBasedIdempotenceWithoutIp();
  await testIpPriority();
  await testLegacyPropertyUsesKeyOnly();
  await testScenarioCExemptNumber();
  await testScenarioDPropertyNotFound();
  await testPartnerGatewayFailure();
  await testResolvedIdWithoutPropertyRecordFails();
  await testConcurrentDeliveriesCreateOneAlert();
  await testBypassEnterpriseIsNotKeyDeduplicated();
  await testUnparseableStartTimeFails();
  await testCollaboratorErrorWritesTerminalAudit();
  await testHandleCallEventsProcessesFirstOnly();
  await testStateMachineRejectsSkippedStages();
  console.log("alert911-pipeline tests passed");
}

run().catch((err) => {
  console.error("alert911-pipeline tests failed", err);
  process.exitCode = 1;
});
