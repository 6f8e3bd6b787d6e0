import * as dotenv from "dotenv";

dotenv.config();

export type LogLevel = "debug" | "info" | "warn" | "error";
export type DateFormat = "ymd" | "mdy" | "dmy";

export interface AppConfig {
  dynamo: {
    region: string;
    endpoint?: string;
    alertsTable: string;
    referenceTable: string;
    queueTable: string;
    sequenceTable: string;
  };
  gateways: {
    partnerGroup: string;
    emergencyGroup: string;
    directIntegrationGroups: string[];
    ipDedupIntegrationTypes: string[];
    dedupBypassEnterpriseId: string;
  };
  companyDirectory: {
    url?: string;
  };
  alerting: {
    autoAckActor: string;
    emailFrom: string;
  };
  audit: {
    dir: string;
    dateFormat: DateFormat;
  };
  logLevel: LogLevel;
}

function csv(raw: string | undefined, fallback: string[] = []): string[] {
  if (raw === undefined) return fallback;
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function oneOf<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  const match = allowed.find((a) => a === raw);
  return match ?? fallback;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    dynamo: {
      region: env.DYNAMO_REGION || env.AWS_REGION || "us-west-2",
      endpoint: env.DYNAMO_ENDPOINT || undefined,
      alertsTable: env.DYNAMO_ALERTS_TABLE || "Alert911Records",
      referenceTable: env.DYNAMO_REFERENCE_TABLE || "Alert911Reference",
      queueTable: env.DYNAMO_QUEUE_TABLE || "Alert911Queue",
      sequenceTable: env.DYNAMO_SEQUENCE_TABLE || "Alert911Sequence",
    },
    gateways: {
      partnerGroup: env.PARTNER_GATEWAY_GROUP || "peerless-emergency",
      emergencyGroup: env.EMERGENCY_GATEWAY_GROUP || "ooma-emergency",
      directIntegrationGroups: csv(env.DIRECT_INTEGRATION_GROUPS),
      ipDedupIntegrationTypes: csv(env.IP_DEDUP_INTEGRATION_TYPES, ["ooma", "peerless"]),
      dedupBypassEnterpriseId: env.DEDUP_BYPASS_ENTERPRISE_ID || "peerless-bypass",
    },
    companyDirectory: {
      url: env.COMPANY_DIRECTORY_URL || undefined,
    },
    alerting: {
      autoAckActor: env.ALERT_AUTO_ACK_ACTOR || "system:popup-disabled",
      emailFrom: env.ALERT_EMAIL_FROM || "alerts@localhost",
    },
    audit: {
      dir: env.AUDIT_LOG_DIR || "logs/audit",
      dateFormat: oneOf(env.AUDIT_DATE_FORMAT, ["ymd", "mdy", "dmy"] as const, "ymd"),
    },
    logLevel: oneOf(env.LOG_LEVEL, ["debug", "info", "warn", "error"] as const, "info"),
  };
}
