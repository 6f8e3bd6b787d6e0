import type { AppConfig } from "../config/config";
import type { Logger } from "../config/logger";
import { AlertStore } from "../domain/repositories";
import { AlertRecord, NormalizedCallEvent, Property } from "../domain/types";

export interface DuplicateCheckInput {
  normalized: NormalizedCallEvent;
  property: Property;
  alertType: number;
}

export interface DuplicateMatcher {
  reason: "duplicate_ip" | "duplicate_key";
  applies(input: DuplicateCheckInput): boolean;
  find(input: DuplicateCheckInput): Promise<AlertRecord | null>;
}

export class SourceIpMatcher implements DuplicateMatcher {
  readonly reason = "duplicate_ip";

  constructor(private readonly alerts: AlertStore, private readonly integrationTypes: readonly string[]) {}

  applies({ normalized, property }: DuplicateCheckInput): boolean {
    // Legacy properties predate structured PBX management and carry no vendor type
    if (property.legacy || !property.pbxIntegrationType) return false;
    return this.integrationTypes.includes(property.pbxIntegrationType) && normalized.event.sourceIp !== "";
  }

  find({ normalized, alertType }: DuplicateCheckInput): Promise<AlertRecord | null> {
    return this.alerts.findByAckIp(alertType, normalized.propertyId, normalized.event.sourceIp);
  }
}

export class NaturalKeyMatcher implements DuplicateMatcher {
  readonly reason = "duplicate_key";

  constructor(private readonly alerts: AlertStore, private readonly bypassEnterpriseId: string) {}

  applies({ normalized }: DuplicateCheckInput): boolean {
    return normalized.event.enterpriseId !== this.bypassEnterpriseId;
  }

  find({ normalized, alertType }: DuplicateCheckInput): Promise<AlertRecord | null> {
    return this.alerts.findByNaturalKey(alertType, normalized.propertyId, normalized.localTime, normalized.extension);
  }
}

export function createDuplicateMatchers(alerts: AlertStore, gateways: AppConfig["gateways"]): DuplicateMatcher[] {
  return [
    new SourceIpMatcher(alerts, gateways.ipDedupIntegrationTypes),
    new NaturalKeyMatcher(alerts, gateways.dedupBypassEnterpriseId),
  ];
}

export type DuplicateCheck =
  | { duplicate: false }
  | { duplicate: true; reason: DuplicateMatcher["reason"]; existing: AlertRecord };

export async function findDuplicate(
  input: DuplicateCheckInput,
  matchers: readonly DuplicateMatcher[],
  logger: Logger
): Promise<DuplicateCheck> {
  for (const matcher of matchers) {
    if (!matcher.applies(input)) continue;
    const existing = await matcher.find(input);
    if (existing) {
      logger.debug("alert911:dedup:match", { reason: matcher.reason, alertId: existing.alertId });
      return { duplicate: true, reason: matcher.reason, existing };
    }
  }
  return { duplicate: false };
}
