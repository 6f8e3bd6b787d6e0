import { DynamoDBClient, DynamoDBClientConfig } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";
import type { AppConfig } from "../../config/config";

let cachedDoc: DynamoDBDocumentClient | null = null;

export function getDynamoDocClient(cfg: AppConfig["dynamo"]): DynamoDBDocumentClient {
  if (cachedDoc) return cachedDoc;
  const clientConfig: DynamoDBClientConfig = {
    region: cfg.region,
  };
  if (cfg.endpoint) {
    clientConfig.endpoint = cfg.endpoint;
    clientConfig.credentials = {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || "fakeMyKeyId",
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || "fakeSecretAccessKey",
    };
  }
  const ddb = new DynamoDBClient(clientConfig);
  cachedDoc = DynamoDBDocumentClient.from(ddb, {
    marshallOptions: { removeUndefinedValues: true },
  });
  return cachedDoc;
}

export function isConditionalCheckFailed(err: unknown): boolean {
  return err instanceof Error && err.name === "ConditionalCheckFailedException";
}
