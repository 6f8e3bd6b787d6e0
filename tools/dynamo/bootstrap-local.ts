/*
  DynamoDB Local bootstrap
  - Optionally starts a local Docker container (if --start-docker)
  - Creates the alert, reference, queue and sequence tables if missing
  Usage:
    npx tsx tools/dynamo/bootstrap-local.ts
    npx tsx tools/dynamo/bootstrap-local.ts --start-docker
*/

import { exec as _exec } from "child_process";
import { promisify } from "util";
import path from "path";
import fs from "fs";
import {
  CreateTableCommand,
  CreateTableCommandInput,
  DescribeTableCommand,
  DynamoDBClient,
  ListTablesCommand,
  ResourceNotFoundException,
} from "@aws-sdk/client-dynamodb";
import { loadConfig } from "../../src/config/config";
import { ACK_IP_INDEX } from "../../src/integrations/dynamo/alert-records.repo";

const exec = promisify(_exec);
const cfg = loadConfig();

function hasFlag(flag: string): boolean {
  return process.argv.includes(flag);
}

function message(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function getLocalDockerVolume(): string {
  const vol = path.resolve(process.cwd(), "docker/dynamodb");
  fs.mkdirSync(vol, { recursive: true });
  return vol;
}

async function startDockerIfRequested(): Promise<void> {
  if (!hasFlag("--start-docker")) return;
  const volume = getLocalDockerVolume();
  const cmd = `docker run -d --rm --name dynamodb-local -p 8000:8000 -v "${volume}:/data" amazon/dynamodb-local -jar DynamoDBLocal.jar -sharedDb -dbPath /data`;
  console.log("[dynamo] starting Docker container:", cmd);
  try {
    const { stdout, stderr } = await exec(cmd);
    if (stdout) console.log(stdout.trim());
    if (stderr) console.log(stderr.trim());
  } catch (e) {
    console.log("[dynamo] docker run failed (is Docker installed/running?)", message(e));
  }
}

function buildClient(): DynamoDBClient {
  return new DynamoDBClient({
    region: cfg.dynamo.region,
    endpoint: cfg.dynamo.endpoint || "http://localhost:8000",
    credentials: {
      accessKeyId: process.env.AWS_ACCESS_KEY_ID || "fakeMyKeyId",
      secretAccessKey: process.env.AWS_SECRET_ACCESS_KEY || "fakeSecretAccessKey",
    },
  });
}

function tableDefinitions(): CreateTableCommandInput[] {
  return [
    {
      TableName: cfg.dynamo.alertsTable,
      AttributeDefinitions: [
        { AttributeName: "pk", AttributeType: "S" },
        { AttributeName: "ackIpKey", AttributeType: "S" },
      ],
      KeySchema: [{ AttributeName: "pk", KeyType: "HASH" }],
      GlobalSecondaryIndexes: [
        {
          IndexName: ACK_IP_INDEX,
          KeySchema: [{ AttributeName: "ackIpKey", KeyType: "HASH" }],
          Projection: { ProjectionType: "ALL" },
        },
      ],
      BillingMode: "PAY_PER_REQUEST",
    },
    {
      TableName: cfg.dynamo.referenceTable,
      AttributeDefinitions: [
        { AttributeName: "pk", AttributeType: "S" },
        { AttributeName: "sk", AttributeType: "S" },
      ],
      KeySchema: [
        { AttributeName: "pk", KeyType: "HASH" },
        { AttributeName: "sk", KeyType: "RANGE" },
      ],
      BillingMode: "PAY_PER_REQUEST",
    },
    {
      TableName: cfg.dynamo.queueTable,
      AttributeDefinitions: [
        { AttributeName: "pk", AttributeType: "S" },
        { AttributeName: "sk", AttributeType: "S" },
      ],
      KeySchema: [
        { AttributeName: "pk", KeyType: "HASH" },
        { AttributeName: "sk", KeyType: "RANGE" },
      ],
      BillingMode: "PAY_PER_REQUEST",
    },
    {
      TableName: cfg.dynamo.sequenceTable,
      AttributeDefinitions: [{ AttributeName: "pk", AttributeType: "S" }],
      KeySchema: [{ AttributeName: "pk", KeyType: "HASH" }],
      BillingMode: "PAY_PER_REQUEST",
    },
  ];
}

async function ensureTableExists(client: DynamoDBClient, def: CreateTableCommandInput): Promise<void> {
  try {
    await client.send(new DescribeTableCommand({ TableName: def.TableName }));
    console.log(`[dynamo] table exists: ${def.TableName}`);
    return;
  } catch (err) {
    if (!(err instanceof ResourceNotFoundException)) throw err;
  }

  console.log(`[dynamo] creating table: ${def.TableName}`);
  await client.send(new CreateTableCommand(def));
  console.log(`[dynamo] table created: ${def.TableName}`);
}

async function waitForReady(client: DynamoDBClient, timeoutMs = 15000): Promise<void> {
  const started = Date.now();
  let attempt = 0;
  let lastError = "";
  while (Date.now() - started < timeoutMs) {
    attempt++;
    try {
      await client.send(new ListTablesCommand({ Limit: 1 }));
      console.log(`[dynamo] ready after ${attempt} attempt(s)`);
      return;
    } catch (e) {
      lastError = message(e);
      await new Promise((r) => setTimeout(r, 500));
    }
  }
  throw new Error(`DynamoDB Local did not become ready in time: ${lastError}`);
}

async function main() {
  console.log("[dynamo] endpoint:", cfg.dynamo.endpoint || "http://localhost:8000");
  await startDockerIfRequested();
  const client = buildClient();
  try {
    await waitForReady(client);
  } catch (e) {
    console.log("[dynamo] wait for ready failed:", message(e));
  }
  for (const def of tableDefinitions()) {
    await ensureTableExists(client, def);
  }
  console.log("[dynamo] done");
}

main().catch((e) => {
  console.error("[dynamo] error:", message(e));
  process.exitCode = 1;
});
