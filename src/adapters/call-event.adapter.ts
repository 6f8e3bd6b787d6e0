import { CallEvent, IngestEnvelope } from "../domain/types";
import { logger } from "../config/logger";

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// First present field among aliases, coerced to a trimmed string
function pick(raw: RawRecord, ...keys: string[]): string {
  for (const key of keys) {
    const v = raw[key];
    if (typeof v === "string") return v.trim();
    if (typeof v === "number" && Number.isFinite(v)) return String(v);
  }
  return "";
}

export function parseStartTime(raw: string): Date | null {
  if (!raw) return null;
  // Accept ISO or "YYYY-MM-DD HH:mm:ss" → coerce to UTC
  const iso = raw.includes("T") ? raw : raw.replace(" ", "T") + "Z";
  const d = new Date(iso);
  return isNaN(d.getTime()) ? null : d;
}

function toCallEvent(raw: RawRecord): CallEvent | null {
  const started = parseStartTime(pick(raw, "startTimeUtc", "start_time", "call_start", "startTime"));
  if (!started) return null;
  return {
    enterpriseId: pick(raw, "enterpriseId", "enterprise_id"),
    groupId: pick(raw, "groupId", "group_id"),
    userId: pick(raw, "userId", "user_id"),
    extension: pick(raw, "extension", "ext"),
    phoneNumber: pick(raw, "phoneNumber", "phone_number"),
    dialedDigits: pick(raw, "dialedDigits", "dialed_digits", "digits"),
    startTimeUtc: started.toISOString(),
    callerName: pick(raw, "callerName", "caller_name"),
    sourceIp: pick(raw, "sourceIp", "source_ip", "src_ip"),
    rawSequence: pick(raw, "rawSequence", "raw_sequence", "seq"),
  };
}

export function callEventAdapter(envelope: IngestEnvelope): CallEvent[] {
  // Tolerate multiple shapes: single record, array, or { events: [...] }
  const body = envelope.body;
  let candidates: unknown[];
  if (Array.isArray(body)) candidates = body;
  else if (isRecord(body) && Array.isArray(body.events)) candidates = body.events;
  else if (isRecord(body)) candidates = [body];
  else candidates = [];

  const events: CallEvent[] = [];
  for (const candidate of candidates) {
    if (!isRecord(candidate)) continue;
    const event = toCallEvent(candidate);
    if (!event) {
      logger.debug("adapter:call-event:skip:no_start_time", { keys: Object.keys(candidate) });
      continue;
    }
    events.push(event);
  }
  logger.debug("adapter:call-event:emit", { received: candidates.length, events: events.length });
  return events;
}

export default callEventAdapter;
