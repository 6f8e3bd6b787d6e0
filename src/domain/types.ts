export interface IngestEnvelope {
  headers: Record<string, string | undefined>;
  body: unknown;
  receivedAt: string; // ISO 8601
}

export interface CallEvent {
  enterpriseId: string;
  groupId: string;
  userId: string;
  extension: string;
  phoneNumber: string;
  dialedDigits: string;
  startTimeUtc: string; // ISO 8601
  callerName: string;
  sourceIp: string;
  rawSequence: string;
}

// Wall-clock time at the property, second granularity: YYYY-MM-DDTHH:mm:ss
export type LocalDateTime = string;

export interface Property {
  id: number;
  name: string;
  timeZoneRef?: string;
  legacy: boolean;
  pbxIntegrationType?: string;
}

export interface PartnerAttribute {
  propertyId: number;
  // may be a ;-delimited list
  enterpriseCodes: string;
}

export interface ExtensionMapping {
  propertyId: number;
  extension: string;
}

export interface TimeZoneRecord {
  propertyId: number;
  offsetHours: number;
  zoneRef: string;
}

export type TimeSource = "timezone-table" | "fixed-offset" | "utc";

export interface NormalizedCallEvent {
  event: CallEvent;
  propertyId: number;
  extension: string;
  localTime: LocalDateTime;
  timeSource: TimeSource;
}

export interface ChannelFlags {
  email: boolean;
  phone: boolean;
  sms: boolean;
  popup: boolean;
}

export interface AlertContacts {
  emails: string[];
  phoneNumbers: string[];
  smsNumbers: string[];
}

export interface AlertRecord {
  alertId: number;
  alertType: number;
  propertyId: number;
  localTime: LocalDateTime;
  extension: string;
  sourceIp: string;
  acknowledged: boolean;
  acknowledgedBy: string | null;
  ackIp: string | null;
  legacyMessage: string;
  createdAt: string; // ISO 8601
  version: number;
  // stored under its own key instead of the natural key
  dedupBypass: boolean;
}

export interface ExtensionInfo {
  propertyId: number;
  extension: string;
  primaryExtension?: string;
  roomNumber?: string;
  name?: string;
}

export interface GuestStay {
  propertyId: number;
  roomNumber: string;
  guestId: string;
  guestName: string;
  moveInAt: string;
  moveOutAt?: string;
}

export type Occupancy = "occupied" | "unoccupied" | "extension-only" | "no-location";

export interface AlertContext {
  primaryExtension: string;
  roomNumber: string | null;
  guestId: string | null;
  guestName: string | null;
  extensionName: string | null;
  occupancy: Occupancy;
  locationResolved: boolean;
  displayName: string;
}

export interface NotificationPayload {
  subject: string;
  body: string;
  legacyMessage: string;
  fields: {
    propertyId: number;
    propertyName: string;
    extension: string;
    roomNumber: string | null;
    guestName: string | null;
    localTime: LocalDateTime;
    dialedDigits: string;
    rawSequence: string;
  };
}

export interface EmailQueueEntry {
  alertId: number;
  propertyId: number;
  from: string;
  to: string;
  subject: string;
  body: string;
}

export interface ScheduledCallEntry {
  alertId: number;
  propertyId: number;
  kind: "phone" | "sms";
  destination: string;
  message: string;
}

export interface EmergencyEventRecord {
  alertId: number;
  propertyId: number;
  roomNumber: string | null;
  extension: string;
  guestName: string | null;
  alertTime: LocalDateTime;
}

export type PipelineState =
  | "RECEIVED"
  | "RESOLVING_PROPERTY"
  | "FAILED"
  | "EXEMPT"
  | "CHECKING_DUPLICATE"
  | "DUPLICATE"
  | "ENRICHING"
  | "DISPATCHING"
  | "DONE";

export type ReasonCode =
  | "no_event"
  | "invalid_start_time"
  | "property_not_found"
  | "partner_property_not_found"
  | "exempt_number"
  | "duplicate_ip"
  | "duplicate_key"
  | "duplicate_concurrent"
  | "dispatched";

export interface PipelineResult {
  success: boolean;
  state: PipelineState | "NO_EVENT";
  reason: ReasonCode;
  propertyId?: number;
  localTime?: LocalDateTime;
  alertId?: number;
}
