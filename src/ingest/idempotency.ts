import { AlertRecord, LocalDateTime } from "../domain/types";

export function computeAlertKey(
  alertType: number,
  propertyId: number,
  localTime: LocalDateTime,
  extension: string
): string {
  return `ALERT#${alertType}#${propertyId}#${localTime}#${extension}`;
}

export function computeAckIpKey(alertType: number, propertyId: number, ip: string): string {
  return `ACKIP#${alertType}#${propertyId}#${ip}`;
}

export function computeRecordKey(record: AlertRecord): string {
  const natural = computeAlertKey(record.alertType, record.propertyId, record.localTime, record.extension);
  return record.dedupBypass ? `${natural}#ID#${record.alertId}` : natural;
}
