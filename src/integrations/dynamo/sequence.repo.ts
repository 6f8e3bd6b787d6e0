import { UpdateCommand, DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import { SequenceGenerator } from "../../domain/repositories";
import { readNumber } from "./item";

export class DynamoSequenceGenerator implements SequenceGenerator {
  constructor(private readonly doc: DynamoDBDocumentClient, private readonly tableName: string) {}

  async next(name: string): Promise<number> {
    const res = await this.doc.send(
      new UpdateCommand({
        TableName: this.tableName,
        Key: { pk: name },
        UpdateExpression: "ADD #v :one",
        ExpressionAttributeNames: { "#v": "value" },
        ExpressionAttributeValues: { ":one": 1 },
        ReturnValues: "UPDATED_NEW",
      })
    );
    const value = res.Attributes ? readNumber(res.Attributes, "value") : undefined;
    if (value === undefined) throw new Error(`Sequence ${name} returned no value`);
    return value;
  }
}
