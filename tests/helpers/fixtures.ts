import { AppConfig, loadConfig } from "../../src/config/config";
import type { Logger } from "../../src/config/logger";
import { CallEvent } from "../../src/domain/types";
import {
  DirectorySeed,
  InMemoryAlertStore,
  InMemoryDirectory,
  InMemoryNotificationSink,
  InMemorySequence,
} from "../../src/integrations/memory/memory.store";
import { convertWithTimeZoneTable } from "../../src/integrations/timezone/timezone.sdk";
import type { AuditEntry, AuditLog, AuditStage } from "../../src/services/audit-log.service";
import type { Alert911Dependencies } from "../../src/workflows/alert-911/orchestrator";

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    debug: (msg) => lines.push(`debug ${msg}`),
    info: (msg) => lines.push(`info ${msg}`),
    warn: (msg) => lines.push(`warn ${msg}`),
    error: (msg) => lines.push(`error ${msg}`),
  };
}

export class MemoryAuditLog implements AuditLog {
  readonly entries: Array<{ stage: AuditStage } & AuditEntry> = [];

  async write(stage: AuditStage, entry: AuditEntry): Promise<void> {
    this.entries.push({ stage, ...entry });
  }

  stages(): AuditStage[] {
    return this.entries.map((e) => e.stage);
  }
}

// Defaults only; no .env values leak into tests
export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ AUDIT_LOG_DIR: "logs/test-audit", ...env });
}

export function makeEvent(overrides: Partial<CallEvent> = {}): CallEvent {
  return {
    enterpriseId: "ent-42",
    groupId: "ooma-emergency",
    userId: "user-100",
    extension: "100",
    phoneNumber: "5550100",
    dialedDigits: "911",
    startTimeUtc: "2024-03-01T12:00:00.000Z",
    callerName: "ROOM 101",
    sourceIp: "10.0.0.5",
    rawSequence: "seq-0001",
    ...overrides,
  };
}

export function baseSeed(): DirectorySeed {
  return {
    properties: [
      { id: 42, name: "Harbor View Suites", legacy: false, pbxIntegrationType: "ooma" },
      { id: 77, name: "Maple Court Apartments", legacy: true },
    ],
    partnerAttributes: [
      { propertyId: 77, enterpriseCodes: "ent-77;ent-77b" },
      { propertyId: 42, enterpriseCodes: "ent-42-exact" },
    ],
    userExtensions: [{ userId: "user-100", propertyId: 42, extension: "100" }],
    linePorts: [{ linePort: "port-7", propertyId: 42, extension: "107" }],
    parameters: [{ propertyId: 42, name: "TIME_OFFSET_HOURS", value: "-5" }],
    extensions: [
      { propertyId: 42, extension: "100", roomNumber: "101", name: "Room 101" },
      { propertyId: 42, extension: "100b", primaryExtension: "100" },
      { propertyId: 42, extension: "200", roomNumber: "201" },
      { propertyId: 42, extension: "300", name: "Pool House" },
    ],
    stays: [
      { propertyId: 42, roomNumber: "101", guestId: "g-old", guestName: "Former Guest", moveInAt: "2024-01-01T15:00:00Z", moveOutAt: "2024-01-05T11:00:00Z" },
      { propertyId: 42, roomNumber: "101", guestId: "g-1", guestName: "Jordan Example", moveInAt: "2024-02-20T15:00:00Z" },
    ],
    channelDefaults: [{ propertyId: 42, email: true, phone: true, sms: false, popup: true }],
    contacts: [
      { propertyId: 42, emails: ["frontdesk@example.test"], phoneNumbers: ["+15550100"], smsNumbers: ["+15550101"] },
    ],
  };
}

export interface TestHarness {
  deps: Alert911Dependencies;
  directory: InMemoryDirectory;
  alerts: InMemoryAlertStore;
  sink: InMemoryNotificationSink;
  audit: MemoryAuditLog;
}

export function buildHarness(seed: DirectorySeed = baseSeed()): TestHarness {
  const directory = new InMemoryDirectory(seed);
  const alerts = new InMemoryAlertStore();
  const sink = new InMemoryNotificationSink();
  const audit = new MemoryAuditLog();
  return {
    directory,
    alerts,
    sink,
    audit,
    deps: {
      properties: directory,
      extensions: directory,
      alertConfig: directory,
      companies: directory,
      alerts,
      sequence: new InMemorySequence(1000),
      sink,
      convertTime: convertWithTimeZoneTable,
      audit,
    },
  };
}
