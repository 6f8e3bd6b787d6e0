import { promises as fs } from "fs";
import path from "path";
import type { DateFormat } from "../config/config";
import { logger as defaultLogger, Logger } from "../config/logger";
import { CallEvent, LocalDateTime } from "../domain/types";

export type AuditStage =
  | "Entry"
  | "Invalid start time"
  | "Property resolved"
  | "Property not found"
  | "Partner property not found"
  | "Exempt number"
  | "Converted time"
  | "Duplicate found"
  | "Alert created"
  | "Error";

export interface AuditEntry {
  propertyId?: number | null;
  event: CallEvent;
  localTime?: LocalDateTime;
  note?: string;
}

export interface AuditLog {
  write(stage: AuditStage, entry: AuditEntry): Promise<void>;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatAuditTimestamp(date: Date, format: DateFormat): string {
  const y = date.getUTCFullYear();
  const m = pad(date.getUTCMonth() + 1);
  const d = pad(date.getUTCDate());
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  if (format === "mdy") return `${m}/${d}/${y} ${time}`;
  if (format === "dmy") return `${d}/${m}/${y} ${time}`;
  return `${y}-${m}-${d} ${time}`;
}

function clean(value: string): string {
  return value.replace(/[|\r\n]/g, " ");
}

export function formatEventSnapshot(event: CallEvent, localTime?: LocalDateTime): string {
  const parts = [
    `ent=${clean(event.enterpriseId)}`,
    `grp=${clean(event.groupId)}`,
    `user=${clean(event.userId)}`,
    `ext=${clean(event.extension)}`,
    `phone=${clean(event.phoneNumber)}`,
    `digits=${clean(event.dialedDigits)}`,
    `start=${clean(event.startTimeUtc)}`,
    `caller=${clean(event.callerName)}`,
    `ip=${clean(event.sourceIp)}`,
    `seq=${clean(event.rawSequence)}`,
  ];
  if (localTime) parts.push(`local=${localTime}`);
  return parts.join("|");
}

export function formatAuditLine(stage: AuditStage, entry: AuditEntry, at: Date, format: DateFormat): string {
  const propertyId = entry.propertyId === undefined || entry.propertyId === null ? "" : String(entry.propertyId);
  const note = entry.note ? `|note=${clean(entry.note)}` : "";
  return `${formatAuditTimestamp(at, format)}|${stage}|${propertyId}|${formatEventSnapshot(entry.event, entry.localTime)}${note}`;
}

export function auditFileName(date: Date): string {
  return `alert911-${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}.log`;
}

export interface FileAuditLogOptions {
  dir: string;
  dateFormat: DateFormat;
  logger?: Logger;
  now?: () => Date;
}

export class FileAuditLog implements AuditLog {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: FileAuditLogOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.now = options.now ?? (() => new Date());
  }

  async write(stage: AuditStage, entry: AuditEntry): Promise<void> {
    const at = this.now();
    const line = formatAuditLine(stage, entry, at, this.options.dateFormat);
    const file = path.join(this.options.dir, auditFileName(at));
    try {
      await fs.mkdir(this.options.dir, { recursive: true });
      await fs.appendFile(file, line + "\n", "utf8");
    } catch (err) {
      this.logger.warn("alert911:audit:write_failed", {
        file,
        stage,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
