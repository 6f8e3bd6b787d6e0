import type { AppConfig } from "../config/config";
import type { Logger } from "../config/logger";
import { classifyGroup, GroupKind } from "../domain/mapping";
import { CompanyDirectory, PropertyDirectory } from "../domain/repositories";
import { CallEvent, PartnerAttribute } from "../domain/types";

export type ResolutionFailure = "property_not_found" | "partner_property_not_found";

export type PropertyResolution =
  | { ok: true; propertyId: number; extension: string; via: string }
  | { ok: false; reason: ResolutionFailure };

interface ResolverInput {
  event: CallEvent;
  groupKind: GroupKind;
  properties: PropertyDirectory;
  companies: CompanyDirectory;
}

// null means "not applicable, try the next strategy"
type ResolverStrategy = (input: ResolverInput) => Promise<PropertyResolution | null>;

function firstEnterpriseCode(attr: PartnerAttribute): string {
  return attr.enterpriseCodes.split(";")[0]?.trim() ?? "";
}

const directIntegration: ResolverStrategy = async ({ event, groupKind, companies }) => {
  if (groupKind !== "direct-integration") return null;
  const companyNumber = await companies.findCompanyNumber(event);
  if (companyNumber === null || companyNumber <= 0) return null;
  return { ok: true, propertyId: companyNumber, extension: event.extension, via: "company-directory" };
};

const partnerGateway: ResolverStrategy = async ({ event, groupKind, properties }) => {
  if (groupKind !== "partner-gateway") return null;
  const attrs = await properties.listPartnerAttributes();
  const match = attrs.find((a) => event.enterpriseId !== "" && firstEnterpriseCode(a) === event.enterpriseId);
  if (!match) return { ok: false, reason: "partner_property_not_found" };
  return { ok: true, propertyId: match.propertyId, extension: event.extension, via: "partner-attribute" };
};

const extensionMapping: ResolverStrategy = async ({ event, groupKind, properties }) => {
  if (groupKind === "direct-integration" || groupKind === "partner-gateway") return null;
  if (!event.userId) return null;
  const byUser = await properties.findUserExtension(event.userId);
  if (byUser) {
    return { ok: true, propertyId: byUser.propertyId, extension: byUser.extension || event.extension, via: "user-extension" };
  }
  const byPort = await properties.findLinePortExtension(event.userId);
  if (byPort) {
    return { ok: true, propertyId: byPort.propertyId, extension: byPort.extension || event.extension, via: "line-port" };
  }
  return null;
};

const exactEnterpriseCode: ResolverStrategy = async ({ event, properties }) => {
  if (!event.enterpriseId) return null;
  const attrs = await properties.listPartnerAttributes();
  const match = attrs.find((a) => a.enterpriseCodes === event.enterpriseId);
  if (!match) return null;
  return { ok: true, propertyId: match.propertyId, extension: event.extension, via: "enterprise-code" };
};

export const resolverStrategies: readonly ResolverStrategy[] = [
  directIntegration,
  partnerGateway,
  extensionMapping,
  exactEnterpriseCode,
];

export interface ResolvePropertyOptions {
  properties: PropertyDirectory;
  companies: CompanyDirectory;
  gateways: AppConfig["gateways"];
  logger: Logger;
}

export async function resolveProperty(event: CallEvent, options: ResolvePropertyOptions): Promise<PropertyResolution> {
  const groupKind = classifyGroup(event.groupId, options.gateways);
  const input: ResolverInput = {
    event,
    groupKind,
    properties: options.properties,
    companies: options.companies,
  };
  for (const strategy of resolverStrategies) {
    const outcome = await strategy(input);
    if (outcome) {
      options.logger.debug("alert911:resolve:outcome", { groupKind, outcome });
      return outcome;
    }
  }
  options.logger.debug("alert911:resolve:miss", { groupKind, enterpriseId: event.enterpriseId, userId: event.userId });
  return { ok: false, reason: "property_not_found" };
}
