import { PutCommand, DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { NotificationSink } from "../../domain/repositories";
import { EmailQueueEntry, EmergencyEventRecord, ScheduledCallEntry } from "../../domain/types";

type QueueKind = "EMAIL" | "PHONE" | "SMS" | "EVENT";

// Downstream workers poll QUEUE#<kind> for PENDING rows
export class DynamoNotificationQueue implements NotificationSink {
  constructor(
    private readonly doc: DynamoDBDocumentClient,
    private readonly tableName: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  private async put(kind: QueueKind, alertId: number, suffix: string, payload: object): Promise<void> {
    const queuedAt = this.now().toISOString();
    await this.doc.send(
      new PutCommand({
        TableName: this.tableName,
        Item: {
          pk: `QUEUE#${kind}`,
          sk: `${queuedAt}#${alertId}#${suffix}`,
          status: "PENDING",
          queuedAt,
          ...payload,
        },
      })
    );
  }

  async enqueueEmail(entry: EmailQueueEntry): Promise<void> {
    await this.put("EMAIL", entry.alertId, entry.to, entry);
  }

  async schedule(entry: ScheduledCallEntry): Promise<void> {
    await this.put(entry.kind === "phone" ? "PHONE" : "SMS", entry.alertId, entry.destination, entry);
  }

  async emitEmergencyEvent(record: EmergencyEventRecord): Promise<void> {
    await this.put("EVENT", record.alertId, "emergency", { eventType: "EMERGENCY_911", ...record });
  }
}
