import {
  AlertConfigDirectory,
  AlertStore,
  CompanyDirectory,
  ExtensionDirectory,
  NotificationSink,
  PropertyDirectory,
  SequenceGenerator,
} from "../../domain/repositories";
import {
  AlertContacts,
  AlertRecord,
  CallEvent,
  ChannelFlags,
  EmailQueueEntry,
  EmergencyEventRecord,
  ExtensionInfo,
  ExtensionMapping,
  GuestStay,
  LocalDateTime,
  PartnerAttribute,
  Property,
  ScheduledCallEntry,
  TimeZoneRecord,
} from "../../domain/types";
import { computeAckIpKey, computeAlertKey, computeRecordKey } from "../../ingest/idempotency";

export interface DirectorySeed {
  properties: Property[];
  partnerAttributes?: PartnerAttribute[];
  userExtensions?: Array<ExtensionMapping & { userId: string }>;
  linePorts?: Array<ExtensionMapping & { linePort: string }>;
  parameters?: Array<{ propertyId: number; name: string; value: string }>;
  timeZones?: TimeZoneRecord[];
  extensions?: ExtensionInfo[];
  stays?: GuestStay[];
  channelDefaults?: Array<ChannelFlags & { propertyId: number }>;
  channelOverrides?: Array<ChannelFlags & { propertyId: number; alertType: number }>;
  contacts?: Array<AlertContacts & { propertyId: number }>;
  companies?: Array<{ groupId: string; enterpriseId: string; companyNumber: number }>;
}

const SEED_LISTS = [
  "partnerAttributes",
  "userExtensions",
  "linePorts",
  "parameters",
  "timeZones",
  "extensions",
  "stays",
  "channelDefaults",
  "channelOverrides",
  "contacts",
  "companies",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPropertyRow(value: unknown): value is Property {
  return (
    isRecord(value) &&
    typeof value.id === "number" &&
    typeof value.name === "string" &&
    typeof value.legacy === "boolean"
  );
}

// Shape check for seed files loaded from disk; list rows other than properties are taken as written
export function isDirectorySeed(value: unknown): value is DirectorySeed {
  if (!isRecord(value)) return false;
  const properties = value.properties;
  if (!Array.isArray(properties) || !properties.every(isPropertyRow)) return false;
  return SEED_LISTS.every((key) => value[key] === undefined || Array.isArray(value[key]));
}

function pickFlags(row: ChannelFlags): ChannelFlags {
  return { email: row.email, phone: row.phone, sms: row.sms, popup: row.popup };
}

export class InMemoryDirectory
  implements PropertyDirectory, ExtensionDirectory, AlertConfigDirectory, CompanyDirectory
{
  constructor(private readonly seed: DirectorySeed) {}

  async getProperty(propertyId: number): Promise<Property | null> {
    return this.seed.properties.find((p) => p.id === propertyId) ?? null;
  }

  async listPartnerAttributes(): Promise<PartnerAttribute[]> {
    return [...(this.seed.partnerAttributes ?? [])];
  }

  async findUserExtension(userId: string): Promise<ExtensionMapping | null> {
    const row = this.seed.userExtensions?.find((u) => u.userId === userId);
    return row ? { propertyId: row.propertyId, extension: row.extension } : null;
  }

  async findLinePortExtension(linePort: string): Promise<ExtensionMapping | null> {
    const row = this.seed.linePorts?.find((l) => l.linePort === linePort);
    return row ? { propertyId: row.propertyId, extension: row.extension } : null;
  }

  async getParameter(propertyId: number, name: string): Promise<string | null> {
    const row = this.seed.parameters?.find((p) => p.propertyId === propertyId && p.name === name);
    return row ? row.value : null;
  }

  async getTimeZone(propertyId: number): Promise<TimeZoneRecord | null> {
    return this.seed.timeZones?.find((t) => t.propertyId === propertyId) ?? null;
  }

  async getExtension(propertyId: number, extension: string): Promise<ExtensionInfo | null> {
    return this.seed.extensions?.find((e) => e.propertyId === propertyId && e.extension === extension) ?? null;
  }

  async findCurrentOccupant(propertyId: number, roomNumber: string): Promise<GuestStay | null> {
    const current = (this.seed.stays ?? [])
      .filter((s) => s.propertyId === propertyId && s.roomNumber === roomNumber && !s.moveOutAt)
      .sort((a, b) => b.moveInAt.localeCompare(a.moveInAt));
    return current[0] ?? null;
  }

  async getChannelDefaults(propertyId: number): Promise<ChannelFlags | null> {
    const row = this.seed.channelDefaults?.find((c) => c.propertyId === propertyId);
    return row ? pickFlags(row) : null;
  }

  async getChannelOverride(propertyId: number, alertType: number): Promise<ChannelFlags | null> {
    const row = this.seed.channelOverrides?.find((c) => c.propertyId === propertyId && c.alertType === alertType);
    return row ? pickFlags(row) : null;
  }

  async getAlertContacts(propertyId: number): Promise<AlertContacts | null> {
    const row = this.seed.contacts?.find((c) => c.propertyId === propertyId);
    return row ? { emails: row.emails, phoneNumbers: row.phoneNumbers, smsNumbers: row.smsNumbers } : null;
  }

  async findCompanyNumber(event: CallEvent): Promise<number | null> {
    const row = this.seed.companies?.find((c) => c.groupId === event.groupId && c.enterpriseId === event.enterpriseId);
    return row ? row.companyNumber : null;
  }
}

export class InMemoryAlertStore implements AlertStore {
  private readonly records = new Map<string, AlertRecord>();
  private readonly locked = new Set<string>();

  private keyOf(record: AlertRecord): string {
    return computeRecordKey(record);
  }

  all(): AlertRecord[] {
    return Array.from(this.records.values()).map((r) => ({ ...r }));
  }

  // Simulates another writer holding the row
  lock(record: AlertRecord): void {
    this.locked.add(this.keyOf(record));
  }

  async findByAckIp(alertType: number, propertyId: number, ip: string): Promise<AlertRecord | null> {
    const wanted = computeAckIpKey(alertType, propertyId, ip);
    for (const r of this.records.values()) {
      if (r.ackIp !== null && computeAckIpKey(r.alertType, r.propertyId, r.ackIp) === wanted) return { ...r };
    }
    return null;
  }

  async findByNaturalKey(
    alertType: number,
    propertyId: number,
    localTime: LocalDateTime,
    extension: string
  ): Promise<AlertRecord | null> {
    const found = this.records.get(computeAlertKey(alertType, propertyId, localTime, extension));
    return found ? { ...found } : null;
  }

  async create(record: AlertRecord): Promise<boolean> {
    const key = this.keyOf(record);
    if (this.records.has(key)) return false;
    this.records.set(key, { ...record });
    return true;
  }

  async stampAckIp(record: AlertRecord, ip: string): Promise<boolean> {
    const key = this.keyOf(record);
    const current = this.records.get(key);
    if (!current || this.locked.has(key) || current.version !== record.version) return false;
    this.records.set(key, { ...current, ackIp: ip, version: current.version + 1 });
    return true;
  }
}

export class InMemorySequence implements SequenceGenerator {
  private readonly values = new Map<string, number>();

  constructor(private readonly start = 0) {}

  async next(name: string): Promise<number> {
    const value = (this.values.get(name) ?? this.start) + 1;
    this.values.set(name, value);
    return value;
  }
}

export class InMemoryNotificationSink implements NotificationSink {
  readonly emails: EmailQueueEntry[] = [];
  readonly scheduled: ScheduledCallEntry[] = [];
  readonly events: EmergencyEventRecord[] = [];

  async enqueueEmail(entry: EmailQueueEntry): Promise<void> {
    this.emails.push(entry);
  }

  async schedule(entry: ScheduledCallEntry): Promise<void> {
    this.scheduled.push(entry);
  }

  async emitEmergencyEvent(record: EmergencyEventRecord): Promise<void> {
    this.events.push(record);
  }
}
