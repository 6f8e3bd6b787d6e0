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
} from "./types";

export interface PropertyDirectory {
  getProperty(propertyId: number): Promise<Property | null>;
  listPartnerAttributes(): Promise<PartnerAttribute[]>;
  findUserExtension(userId: string): Promise<ExtensionMapping | null>;
  findLinePortExtension(linePort: string): Promise<ExtensionMapping | null>;
  getParameter(propertyId: number, name: string): Promise<string | null>;
  getTimeZone(propertyId: number): Promise<TimeZoneRecord | null>;
}

export interface ExtensionDirectory {
  getExtension(propertyId: number, extension: string): Promise<ExtensionInfo | null>;
  findCurrentOccupant(propertyId: number, roomNumber: string): Promise<GuestStay | null>;
}

export interface AlertConfigDirectory {
  getChannelDefaults(propertyId: number): Promise<ChannelFlags | null>;
  getChannelOverride(propertyId: number, alertType: number): Promise<ChannelFlags | null>;
  getAlertContacts(propertyId: number): Promise<AlertContacts | null>;
}

export interface AlertStore {
  findByAckIp(alertType: number, propertyId: number, ip: string): Promise<AlertRecord | null>;
  findByNaturalKey(
    alertType: number,
    propertyId: number,
    localTime: LocalDateTime,
    extension: string
  ): Promise<AlertRecord | null>;
  // false when a record with the same natural key already exists
  create(record: AlertRecord): Promise<boolean>;
  // single attempt; false when another writer holds or changed the record
  stampAckIp(record: AlertRecord, ip: string): Promise<boolean>;
}

export interface SequenceGenerator {
  next(name: string): Promise<number>;
}

export interface NotificationSink {
  enqueueEmail(entry: EmailQueueEntry): Promise<void>;
  schedule(entry: ScheduledCallEntry): Promise<void>;
  emitEmergencyEvent(record: EmergencyEventRecord): Promise<void>;
}

export interface CompanyDirectory {
  findCompanyNumber(event: CallEvent): Promise<number | null>;
}

export type TimeZoneConverter = (
  utc: Date,
  offsetHours: number,
  zoneRef: string
) => Promise<LocalDateTime | null>;
