import { GetCommand, PutCommand, QueryCommand, UpdateCommand, DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { AlertStore } from "../../domain/repositories";
import { AlertRecord, LocalDateTime } from "../../domain/types";
import { computeAckIpKey, computeAlertKey, computeRecordKey } from "../../ingest/idempotency";
import { isConditionalCheckFailed } from "./dynamo.sdk";
import { Item, readBoolean, readNumber, readString } from "./item";

export const ACK_IP_INDEX = "ackIpKey-index";

export function toAlertRecord(item: Item): AlertRecord | null {
  const alertId = readNumber(item, "alertId");
  const alertType = readNumber(item, "alertType");
  const propertyId = readNumber(item, "propertyId");
  const localTime = readString(item, "localTime");
  if (alertId === undefined || alertType === undefined || propertyId === undefined || !localTime) return null;
  return {
    alertId,
    alertType,
    propertyId,
    localTime,
    extension: readString(item, "extension") ?? "",
    sourceIp: readString(item, "sourceIp") ?? "",
    acknowledged: readBoolean(item, "acknowledged"),
    acknowledgedBy: readString(item, "acknowledgedBy") ?? null,
    ackIp: readString(item, "ackIp") ?? null,
    legacyMessage: readString(item, "legacyMessage") ?? "",
    createdAt: readString(item, "createdAt") ?? "",
    version: readNumber(item, "version") ?? 1,
    dedupBypass: readBoolean(item, "dedupBypass"),
  };
}

export class DynamoAlertStore implements AlertStore {
  constructor(private readonly doc: DynamoDBDocumentClient, private readonly tableName: string) {}

  async findByNaturalKey(
    alertType: number,
    propertyId: number,
    localTime: LocalDateTime,
    extension: string
  ): Promise<AlertRecord | null> {
    const res = await this.doc.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { pk: computeAlertKey(alertType, propertyId, localTime, extension) },
        ConsistentRead: true,
      })
    );
    return res.Item ? toAlertRecord(res.Item) : null;
  }

  async findByAckIp(alertType: number, propertyId: number, ip: string): Promise<AlertRecord | null> {
    const res = await this.doc.send(
      new QueryCommand({
        TableName: this.tableName,
        IndexName: ACK_IP_INDEX,
        KeyConditionExpression: "ackIpKey = :k",
        ExpressionAttributeValues: { ":k": computeAckIpKey(alertType, propertyId, ip) },
        Limit: 1,
      })
    );
    const first = res.Items?.[0];
    return first ? toAlertRecord(first) : null;
  }

  async create(record: AlertRecord): Promise<boolean> {
    try {
      await this.doc.send(
        new PutCommand({
          TableName: this.tableName,
          Item: {
            pk: computeRecordKey(record),
            ...record,
          },
          ConditionExpression: "attribute_not_exists(pk)",
        })
      );
      return true; // first time seen
    } catch (err) {
      if (isConditionalCheckFailed(err)) {
        return false; // duplicate
      }
      throw err;
    }
  }

  async stampAckIp(record: AlertRecord, ip: string): Promise<boolean> {
    try {
      await this.doc.send(
        new UpdateCommand({
          TableName: this.tableName,
          Key: { pk: computeRecordKey(record) },
          UpdateExpression: "SET ackIp = :ip, ackIpKey = :k, version = :next",
          ConditionExpression: "version = :expected",
          ExpressionAttributeValues: {
            ":ip": ip,
            ":k": computeAckIpKey(record.alertType, record.propertyId, ip),
            ":next": record.version + 1,
            ":expected": record.version,
          },
        })
      );
      return true;
    } catch (err) {
      // another writer got there first; the stamp is an annotation only
      if (isConditionalCheckFailed(err)) return false;
      throw err;
    }
  }
}
