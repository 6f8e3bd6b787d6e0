import type { AppConfig } from "../config/config";

// Alert type of the emergency (911) class
export const EMERGENCY_ALERT_TYPE = 9;

// Parameter records, scoped per property; property 0 applies to all
export const GLOBAL_PROPERTY_ID = 0;
export const PARAM_EXEMPT_NUMBERS = "ALERT911_EXEMPT_NUMBERS";
export const PARAM_TIME_OFFSET_HOURS = "TIME_OFFSET_HOURS";
export const PARAM_EMERGENCY_EVENT_SUBSCRIBE = "EMERGENCY_EVENT_SUBSCRIBE";

export const UNOCCUPIED_ROOM_LABEL = "Unoccupied Room";
export const UNKNOWN_LOCATION_LABEL = "Unknown Location";

export type GroupKind = "partner-gateway" | "emergency-gateway" | "direct-integration" | "other";

export function classifyGroup(groupId: string, gateways: AppConfig["gateways"]): GroupKind {
  if (groupId === gateways.partnerGroup) return "partner-gateway";
  if (groupId === gateways.emergencyGroup) return "emergency-gateway";
  if (gateways.directIntegrationGroups.includes(groupId)) return "direct-integration";
  return "other";
}

export function splitList(raw: string): string[] {
  return raw
    .split(/[,;]/)
    .map((s) => s.trim())
    .filter(Boolean);
}

export function isTruthyParam(raw: string | null): boolean {
  if (!raw) return false;
  return ["1", "y", "yes", "true", "on"].includes(raw.trim().toLowerCase());
}
