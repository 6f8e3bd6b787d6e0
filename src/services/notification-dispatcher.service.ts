import type { AppConfig } from "../config/config";
import type { Logger } from "../config/logger";
import { isTruthyParam, PARAM_EMERGENCY_EVENT_SUBSCRIBE } from "../domain/mapping";
import {
  AlertConfigDirectory,
  AlertStore,
  NotificationSink,
  PropertyDirectory,
  SequenceGenerator,
} from "../domain/repositories";
import {
  AlertContext,
  AlertRecord,
  ChannelFlags,
  NormalizedCallEvent,
  NotificationPayload,
  Property,
} from "../domain/types";

export const ALERT_SEQUENCE = "alert911";

// Used when a property has no channel configuration at all
export const DEFAULT_CHANNELS: ChannelFlags = { email: false, phone: false, sms: false, popup: true };

/**
 * Channel activation is strictly configuration-driven: an alert-type
 * override, when present, replaces the property defaults outright.
 */
export function resolveChannelFlags(defaults: ChannelFlags | null, override: ChannelFlags | null): ChannelFlags {
  return { ...(override ?? defaults ?? DEFAULT_CHANNELS) };
}

export function composeNotification(
  normalized: NormalizedCallEvent,
  property: Property,
  context: AlertContext,
  alertType: number
): NotificationPayload {
  const { event } = normalized;
  const room = context.roomNumber ?? "";
  const body = [
    `Emergency call (${event.dialedDigits}) placed at ${property.name}.`,
    `Property: ${property.id} ${property.name}`,
    `Extension: ${normalized.extension}`,
    `Room: ${room || "N/A"}`,
    `Guest: ${context.displayName}`,
    `Call time: ${normalized.localTime}`,
    `Digits dialed: ${event.dialedDigits}`,
    `Reference: ${event.rawSequence}`,
  ].join("\n");
  const legacyMessage = [
    alertType,
    property.id,
    normalized.extension,
    room,
    context.displayName,
    normalized.localTime,
    event.dialedDigits,
    event.rawSequence,
  ].join("|");
  return {
    subject: `911 ALERT - ${property.name}`,
    body,
    legacyMessage,
    fields: {
      propertyId: property.id,
      propertyName: property.name,
      extension: normalized.extension,
      roomNumber: context.roomNumber,
      guestName: context.guestName,
      localTime: normalized.localTime,
      dialedDigits: event.dialedDigits,
      rawSequence: event.rawSequence,
    },
  };
}

export interface DispatchDependencies {
  alerts: AlertStore;
  sequence: SequenceGenerator;
  sink: NotificationSink;
  alertConfig: AlertConfigDirectory;
  properties: PropertyDirectory;
}

export interface DispatchInput {
  normalized: NormalizedCallEvent;
  property: Property;
  context: AlertContext;
  alertType: number;
  // key-based dedup is off for this traffic; the record gets its own key
  dedupBypass?: boolean;
}

export interface DispatchOptions {
  dependencies: DispatchDependencies;
  alerting: AppConfig["alerting"];
  logger: Logger;
  now?: () => Date;
}

export interface DeliveryCounts {
  email: number;
  phone: number;
  sms: number;
}

export type DispatchResult =
  | {
      created: true;
      record: AlertRecord;
      channels: ChannelFlags;
      delivered: DeliveryCounts;
      emergencyEvent: boolean;
      ackStamped: boolean;
    }
  | { created: false; alertId: number };

async function bestEffort(logger: Logger, label: string, fn: () => Promise<void>): Promise<boolean> {
  try {
    await fn();
    return true;
  } catch (err) {
    logger.warn("alert911:dispatch:transport_failed", {
      channel: label,
      message: err instanceof Error ? err.message : String(err),
    });
    return false;
  }
}

export async function dispatchAlert(input: DispatchInput, options: DispatchOptions): Promise<DispatchResult> {
  const { normalized, property, context, alertType } = input;
  const dedupBypass = input.dedupBypass ?? false;
  const { alerts, sequence, sink, alertConfig, properties } = options.dependencies;
  const logger = options.logger;
  const now = options.now ?? (() => new Date());

  const [defaults, override] = await Promise.all([
    alertConfig.getChannelDefaults(property.id),
    alertConfig.getChannelOverride(property.id, alertType),
  ]);
  const channels = resolveChannelFlags(defaults, override);

  const alertId = await sequence.next(ALERT_SEQUENCE);
  const payload = composeNotification(normalized, property, context, alertType);

  const record: AlertRecord = {
    alertId,
    alertType,
    propertyId: property.id,
    localTime: normalized.localTime,
    extension: normalized.extension,
    sourceIp: normalized.event.sourceIp,
    acknowledged: !channels.popup,
    acknowledgedBy: channels.popup ? null : options.alerting.autoAckActor,
    ackIp: null,
    legacyMessage: payload.legacyMessage,
    createdAt: now().toISOString(),
    version: 1,
    dedupBypass,
  };

  // The conditional create is the commit point; a concurrent delivery that won it owns the notifications
  const created = await alerts.create(record);
  if (!created) {
    logger.info("alert911:dispatch:claim_lost", { alertId, propertyId: property.id, localTime: record.localTime });
    return { created: false, alertId };
  }

  const delivered: DeliveryCounts = { email: 0, phone: 0, sms: 0 };
  const contacts = await alertConfig.getAlertContacts(property.id);

  if (channels.email && contacts) {
    for (const to of contacts.emails) {
      const ok = await bestEffort(logger, "email", () =>
        sink.enqueueEmail({
          alertId,
          propertyId: property.id,
          from: options.alerting.emailFrom,
          to,
          subject: payload.subject,
          body: payload.body,
        })
      );
      if (ok) delivered.email++;
    }
  }
  if (channels.phone && contacts) {
    for (const destination of contacts.phoneNumbers) {
      const ok = await bestEffort(logger, "phone", () =>
        sink.schedule({ alertId, propertyId: property.id, kind: "phone", destination, message: payload.body })
      );
      if (ok) delivered.phone++;
    }
  }
  if (channels.sms && contacts) {
    for (const destination of contacts.smsNumbers) {
      const ok = await bestEffort(logger, "sms", () =>
        sink.schedule({ alertId, propertyId: property.id, kind: "sms", destination, message: payload.subject })
      );
      if (ok) delivered.sms++;
    }
  }

  let emergencyEvent = false;
  const subscribed = await properties.getParameter(property.id, PARAM_EMERGENCY_EVENT_SUBSCRIBE);
  if (isTruthyParam(subscribed)) {
    emergencyEvent = await bestEffort(logger, "event", () =>
      sink.emitEmergencyEvent({
        alertId,
        propertyId: property.id,
        roomNumber: context.roomNumber,
        extension: normalized.extension,
        guestName: context.guestName,
        alertTime: normalized.localTime,
      })
    );
  }

  let ackStamped = false;
  if (normalized.event.sourceIp) {
    ackStamped = await alerts.stampAckIp(record, normalized.event.sourceIp).catch((err: unknown) => {
      logger.warn("alert911:dispatch:ack_ip_failed", {
        alertId,
        message: err instanceof Error ? err.message : String(err),
      });
      return false;
    });
    if (!ackStamped) {
      logger.debug("alert911:dispatch:ack_ip_skipped", { alertId });
    }
  }

  logger.info("alert911:dispatch:done", { alertId, propertyId: property.id, channels, delivered, emergencyEvent });
  return { created: true, record, channels, delivered, emergencyEvent, ackStamped };
}
