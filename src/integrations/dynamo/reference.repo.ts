import { GetCommand, QueryCommand, DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { AlertConfigDirectory, ExtensionDirectory, PropertyDirectory } from "../../domain/repositories";
import {
  AlertContacts,
  ChannelFlags,
  ExtensionInfo,
  ExtensionMapping,
  GuestStay,
  PartnerAttribute,
  Property,
  TimeZoneRecord,
} from "../../domain/types";
import { Item, readBoolean, readNumber, readString, readStringList } from "./item";

/*
  Single-table layout (pk / sk):
    PROPERTY#<id>   META | PARAM#<name> | TIMEZONE | EXT#<ext> | STAY#<room>#<moveInAt>#<guestId>
                    CHANNELS#DEFAULT | CHANNELS#TYPE#<alertType> | CONTACTS
    PARTNER         PROPERTY#<id>
    USER#<userId>   MAPPING
    LINEPORT#<port> MAPPING
*/

const propertyPk = (id: number) => `PROPERTY#${id}`;

function toChannelFlags(item: Item): ChannelFlags {
  return {
    email: readBoolean(item, "email"),
    phone: readBoolean(item, "phone"),
    sms: readBoolean(item, "sms"),
    popup: readBoolean(item, "popup"),
  };
}

function toMapping(item: Item): ExtensionMapping | null {
  const propertyId = readNumber(item, "propertyId");
  if (propertyId === undefined) return null;
  return { propertyId, extension: readString(item, "extension") ?? "" };
}

export class DynamoReferenceDirectory implements PropertyDirectory, ExtensionDirectory, AlertConfigDirectory {
  constructor(private readonly doc: DynamoDBDocumentClient, private readonly tableName: string) {}

  private async getItem(pk: string, sk: string): Promise<Item | null> {
    const res = await this.doc.send(new GetCommand({ TableName: this.tableName, Key: { pk, sk } }));
    return res.Item ?? null;
  }

  private async queryAll(pk: string, skPrefix?: string, newestFirst = false): Promise<Item[]> {
    const items: Item[] = [];
    let startKey: Record<string, unknown> | undefined;
    do {
      const res = await this.doc.send(
        new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: skPrefix ? "pk = :pk AND begins_with(sk, :prefix)" : "pk = :pk",
          ExpressionAttributeValues: skPrefix ? { ":pk": pk, ":prefix": skPrefix } : { ":pk": pk },
          ExclusiveStartKey: startKey,
          ScanIndexForward: !newestFirst,
        })
      );
      items.push(...(res.Items ?? []));
      startKey = res.LastEvaluatedKey;
    } while (startKey);
    return items;
  }

  async getProperty(propertyId: number): Promise<Property | null> {
    const item = await this.getItem(propertyPk(propertyId), "META");
    if (!item) return null;
    return {
      id: propertyId,
      name: readString(item, "name") ?? `Property ${propertyId}`,
      timeZoneRef: readString(item, "timeZoneRef"),
      legacy: readBoolean(item, "legacy"),
      pbxIntegrationType: readString(item, "pbxIntegrationType"),
    };
  }

  async listPartnerAttributes(): Promise<PartnerAttribute[]> {
    const items = await this.queryAll("PARTNER");
    const attrs: PartnerAttribute[] = [];
    for (const item of items) {
      const propertyId = readNumber(item, "propertyId");
      const enterpriseCodes = readString(item, "enterpriseCodes");
      if (propertyId === undefined || enterpriseCodes === undefined) continue;
      attrs.push({ propertyId, enterpriseCodes });
    }
    return attrs;
  }

  async findUserExtension(userId: string): Promise<ExtensionMapping | null> {
    const item = await this.getItem(`USER#${userId}`, "MAPPING");
    return item ? toMapping(item) : null;
  }

  async findLinePortExtension(linePort: string): Promise<ExtensionMapping | null> {
    const item = await this.getItem(`LINEPORT#${linePort}`, "MAPPING");
    return item ? toMapping(item) : null;
  }

  async getParameter(propertyId: number, name: string): Promise<string | null> {
    const item = await this.getItem(propertyPk(propertyId), `PARAM#${name}`);
    if (!item) return null;
    return readString(item, "value") ?? null;
  }

  async getTimeZone(propertyId: number): Promise<TimeZoneRecord | null> {
    const item = await this.getItem(propertyPk(propertyId), "TIMEZONE");
    if (!item) return null;
    return {
      propertyId,
      offsetHours: readNumber(item, "offsetHours") ?? 0,
      zoneRef: readString(item, "zoneRef") ?? "",
    };
  }

  async getExtension(propertyId: number, extension: string): Promise<ExtensionInfo | null> {
    const item = await this.getItem(propertyPk(propertyId), `EXT#${extension}`);
    if (!item) return null;
    return {
      propertyId,
      extension,
      primaryExtension: readString(item, "primaryExtension"),
      roomNumber: readString(item, "roomNumber"),
      name: readString(item, "name"),
    };
  }

  async findCurrentOccupant(propertyId: number, roomNumber: string): Promise<GuestStay | null> {
    const items = await this.queryAll(propertyPk(propertyId), `STAY#${roomNumber}#`, true);
    for (const item of items) {
      if (readString(item, "moveOutAt")) continue;
      const guestId = readString(item, "guestId");
      if (!guestId) continue;
      return {
        propertyId,
        roomNumber,
        guestId,
        guestName: readString(item, "guestName") ?? "",
        moveInAt: readString(item, "moveInAt") ?? "",
      };
    }
    return null;
  }

  async getChannelDefaults(propertyId: number): Promise<ChannelFlags | null> {
    const item = await this.getItem(propertyPk(propertyId), "CHANNELS#DEFAULT");
    return item ? toChannelFlags(item) : null;
  }

  async getChannelOverride(propertyId: number, alertType: number): Promise<ChannelFlags | null> {
    const item = await this.getItem(propertyPk(propertyId), `CHANNELS#TYPE#${alertType}`);
    return item ? toChannelFlags(item) : null;
  }

  async getAlertContacts(propertyId: number): Promise<AlertContacts | null> {
    const item = await this.getItem(propertyPk(propertyId), "CONTACTS");
    if (!item) return null;
    return {
      emails: readStringList(item, "emails"),
      phoneNumbers: readStringList(item, "phoneNumbers"),
      smsNumbers: readStringList(item, "smsNumbers"),
    };
  }
}
