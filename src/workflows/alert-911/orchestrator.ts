import { parseStartTime } from "../../adapters/call-event.adapter";
import { AppConfig, loadConfig } from "../../config/config";
import { logger as defaultLogger, Logger } from "../../config/logger";
import { EMERGENCY_ALERT_TYPE } from "../../domain/mapping";
import {
  AlertConfigDirectory,
  AlertStore,
  CompanyDirectory,
  ExtensionDirectory,
  NotificationSink,
  PropertyDirectory,
  SequenceGenerator,
  TimeZoneConverter,
} from "../../domain/repositories";
import { CallEvent, NormalizedCallEvent, PipelineResult, PipelineState, ReasonCode } from "../../domain/types";
import { HttpCompanyDirectory } from "../../integrations/directory/company-directory.sdk";
import { DynamoAlertStore } from "../../integrations/dynamo/alert-records.repo";
import { getDynamoDocClient } from "../../integrations/dynamo/dynamo.sdk";
import { DynamoNotificationQueue } from "../../integrations/dynamo/queue.repo";
import { DynamoReferenceDirectory } from "../../integrations/dynamo/reference.repo";
import { DynamoSequenceGenerator } from "../../integrations/dynamo/sequence.repo";
import { convertWithTimeZoneTable } from "../../integrations/timezone/timezone.sdk";
import { AuditEntry, AuditLog, AuditStage, FileAuditLog } from "../../services/audit-log.service";
import { resolveAlertContext } from "../../services/context-enricher.service";
import { createDuplicateMatchers, findDuplicate } from "../../services/dedup.service";
import { isExemptNumber } from "../../services/exemption.service";
import { dispatchAlert } from "../../services/notification-dispatcher.service";
import { resolveProperty } from "../../services/property-resolver.service";
import { toPropertyLocalTime } from "../../services/time-normalizer.service";

export interface Alert911Dependencies {
  properties: PropertyDirectory;
  extensions: ExtensionDirectory;
  alertConfig: AlertConfigDirectory;
  companies: CompanyDirectory;
  alerts: AlertStore;
  sequence: SequenceGenerator;
  sink: NotificationSink;
  convertTime: TimeZoneConverter;
  audit: AuditLog;
}

export interface Alert911Options {
  config?: AppConfig;
  logger?: Logger;
  dependencies?: Partial<Alert911Dependencies>;
  now?: () => Date;
}

const transitions: Record<PipelineState, readonly PipelineState[]> = {
  RECEIVED: ["RESOLVING_PROPERTY"],
  RESOLVING_PROPERTY: ["FAILED", "EXEMPT", "CHECKING_DUPLICATE"],
  CHECKING_DUPLICATE: ["DUPLICATE", "ENRICHING"],
  ENRICHING: ["DISPATCHING"],
  // a concurrent delivery can still win the conditional create
  DISPATCHING: ["DONE", "DUPLICATE"],
  FAILED: [],
  EXEMPT: [],
  DUPLICATE: [],
  DONE: [],
};

export class PipelineRun {
  private current: PipelineState = "RECEIVED";

  constructor(private readonly logger: Logger) {}

  get state(): PipelineState {
    return this.current;
  }

  to(next: PipelineState): void {
    if (!transitions[this.current].includes(next)) {
      throw new Error(`Invalid pipeline transition ${this.current} -> ${next}`);
    }
    this.logger.debug("alert911:state", { from: this.current, to: next });
    this.current = next;
  }

  finish(next: PipelineState, reason: ReasonCode, extra: Omit<PipelineResult, "success" | "state" | "reason"> = {}): PipelineResult {
    this.to(next);
    return { success: next !== "FAILED", state: next, reason, ...extra };
  }
}

function buildDefaultDependencies(config: AppConfig, logger: Logger): Alert911Dependencies {
  const doc = getDynamoDocClient(config.dynamo);
  const reference = new DynamoReferenceDirectory(doc, config.dynamo.referenceTable);
  return {
    properties: reference,
    extensions: reference,
    alertConfig: reference,
    companies: new HttpCompanyDirectory({ baseUrl: config.companyDirectory.url }),
    alerts: new DynamoAlertStore(doc, config.dynamo.alertsTable),
    sequence: new DynamoSequenceGenerator(doc, config.dynamo.sequenceTable),
    sink: new DynamoNotificationQueue(doc, config.dynamo.queueTable),
    convertTime: convertWithTimeZoneTable,
    audit: new FileAuditLog({ dir: config.audit.dir, dateFormat: config.audit.dateFormat, logger }),
  };
}

export function resolveDependencies(
  config: AppConfig,
  logger: Logger,
  overrides: Partial<Alert911Dependencies> = {}
): Alert911Dependencies {
  const complete = (["properties", "extensions", "alertConfig", "companies", "alerts", "sequence", "sink", "convertTime", "audit"] as const).every(
    (key) => overrides[key] !== undefined
  );
  // Only touch DynamoDB when something is missing
  const defaults = complete ? null : buildDefaultDependencies(config, logger);
  const pick = <K extends keyof Alert911Dependencies>(key: K): Alert911Dependencies[K] => {
    const value = overrides[key] ?? defaults?.[key];
    if (value === undefined) throw new Error(`Missing dependency: ${key}`);
    return value;
  };
  return {
    properties: pick("properties"),
    extensions: pick("extensions"),
    alertConfig: pick("alertConfig"),
    companies: pick("companies"),
    alerts: pick("alerts"),
    sequence: pick("sequence"),
    sink: pick("sink"),
    convertTime: pick("convertTime"),
    audit: pick("audit"),
  };
}

interface StageContext {
  config: AppConfig;
  logger: Logger;
  deps: Alert911Dependencies;
  run: PipelineRun;
  audit: (stage: AuditStage, entry?: Omit<AuditEntry, "event">) => Promise<void>;
  now?: () => Date;
}

export async function processCallEvent(event: CallEvent, options: Alert911Options = {}): Promise<PipelineResult> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? defaultLogger;
  const deps = resolveDependencies(config, logger, options.dependencies);
  const run = new PipelineRun(logger);
  const audit = (stage: AuditStage, entry: Omit<AuditEntry, "event"> = {}) => deps.audit.write(stage, { event, ...entry });

  try {
    return await runStages(event, { config, logger, deps, run, audit, now: options.now });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error("alert911:failed", { state: run.state, message });
    await audit("Error", { note: `${run.state}: ${message}` }).catch((auditErr: unknown) => {
      logger.warn("alert911:audit:error_entry_failed", {
        message: auditErr instanceof Error ? auditErr.message : String(auditErr),
      });
    });
    throw err;
  }
}

async function runStages(event: CallEvent, ctx: StageContext): Promise<PipelineResult> {
  const { config, logger, deps, run, audit } = ctx;
  const alertType = EMERGENCY_ALERT_TYPE;

  run.to("RESOLVING_PROPERTY");
  await audit("Entry");

  const startedAt = parseStartTime(event.startTimeUtc);
  if (!startedAt) {
    await audit("Invalid start time", { propertyId: null, note: event.startTimeUtc });
    logger.warn("alert911:invalid_start_time", { startTimeUtc: event.startTimeUtc });
    return run.finish("FAILED", "invalid_start_time");
  }

  const resolution = await resolveProperty(event, {
    properties: deps.properties,
    companies: deps.companies,
    gateways: config.gateways,
    logger,
  });
  if (!resolution.ok) {
    await audit(resolution.reason === "partner_property_not_found" ? "Partner property not found" : "Property not found", {
      propertyId: null,
    });
    logger.warn("alert911:resolve:failed", { reason: resolution.reason, groupId: event.groupId, enterpriseId: event.enterpriseId });
    return run.finish("FAILED", resolution.reason);
  }

  const property = await deps.properties.getProperty(resolution.propertyId);
  if (!property) {
    await audit("Property not found", { propertyId: resolution.propertyId, note: `resolved via ${resolution.via} but no property record` });
    logger.warn("alert911:resolve:no_property_record", { propertyId: resolution.propertyId, via: resolution.via });
    return run.finish("FAILED", "property_not_found");
  }
  await audit("Property resolved", { propertyId: property.id, note: resolution.via });

  if (await isExemptNumber(deps.properties, property.id, event.dialedDigits)) {
    await audit("Exempt number", { propertyId: property.id });
    logger.info("alert911:exempt", { propertyId: property.id, digits: event.dialedDigits });
    return run.finish("EXEMPT", "exempt_number", { propertyId: property.id });
  }

  const local = await toPropertyLocalTime(startedAt, property.id, {
    properties: deps.properties,
    convert: deps.convertTime,
    logger,
    propertyZoneRef: property.timeZoneRef,
  });
  await audit("Converted time", { propertyId: property.id, localTime: local.localTime, note: local.source });

  const normalized: NormalizedCallEvent = {
    event,
    propertyId: property.id,
    extension: resolution.extension,
    localTime: local.localTime,
    timeSource: local.source,
  };

  run.to("CHECKING_DUPLICATE");
  const dup = await findDuplicate(
    { normalized, property, alertType },
    createDuplicateMatchers(deps.alerts, config.gateways),
    logger
  );
  if (dup.duplicate) {
    await audit("Duplicate found", { propertyId: property.id, localTime: local.localTime, note: `${dup.reason} alert=${dup.existing.alertId}` });
    logger.info("alert911:duplicate", { propertyId: property.id, reason: dup.reason, alertId: dup.existing.alertId });
    return run.finish("DUPLICATE", dup.reason, {
      propertyId: property.id,
      localTime: local.localTime,
      alertId: dup.existing.alertId,
    });
  }

  run.to("ENRICHING");
  const context = await resolveAlertContext(deps.extensions, property.id, normalized.extension);

  run.to("DISPATCHING");
  const dispatched = await dispatchAlert(
    {
      normalized,
      property,
      context,
      alertType,
      dedupBypass: event.enterpriseId === config.gateways.dedupBypassEnterpriseId,
    },
    {
      dependencies: {
        alerts: deps.alerts,
        sequence: deps.sequence,
        sink: deps.sink,
        alertConfig: deps.alertConfig,
        properties: deps.properties,
      },
      alerting: config.alerting,
      logger,
      now: ctx.now,
    }
  );
  if (!dispatched.created) {
    await audit("Duplicate found", { propertyId: property.id, localTime: local.localTime, note: "duplicate_concurrent" });
    return run.finish("DUPLICATE", "duplicate_concurrent", { propertyId: property.id, localTime: local.localTime });
  }

  await audit("Alert created", {
    propertyId: property.id,
    localTime: local.localTime,
    note: `alert=${dispatched.record.alertId} room=${context.roomNumber ?? ""} guest=${context.displayName}`,
  });
  return run.finish("DONE", "dispatched", {
    propertyId: property.id,
    localTime: local.localTime,
    alertId: dispatched.record.alertId,
  });
}

export default processCallEvent;
