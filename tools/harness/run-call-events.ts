/*
  Call-event harness
  - Replays JSON call-event files through the alert pipeline against in-memory stores
  - Reference data comes from a seed file (see tools/harness/seed.example.json)
  Usage:
    npx tsx tools/harness/run-call-events.ts --dir data/call-events --seed tools/harness/seed.example.json
    npx tsx tools/harness/run-call-events.ts --dir data/call-events --limit 5
*/

import { promises as fs } from "fs";
import path from "path";
import { loadConfig } from "../../src/config/config";
import { createLogger } from "../../src/config/logger";
import { handleCallEvents } from "../../src/index";
import type { IngestEnvelope } from "../../src/domain/types";
import {
  InMemoryAlertStore,
  InMemoryDirectory,
  InMemoryNotificationSink,
  InMemorySequence,
  isDirectorySeed,
} from "../../src/integrations/memory/memory.store";
import { convertWithTimeZoneTable } from "../../src/integrations/timezone/timezone.sdk";
import { FileAuditLog } from "../../src/services/audit-log.service";

interface Args {
  dir?: string;
  seed?: string;
  limit?: number;
}

function parseArgs(): Args {
  const out: Args = {};
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--dir") out.dir = argv[++i];
    else if (a === "--seed") out.seed = argv[++i];
    else if (a === "--limit") out.limit = Number(argv[++i]);
  }
  return out;
}

async function run() {
  const args = parseArgs();
  const config = loadConfig();
  // Default to very verbose logging for harness runs unless user overrides
  const logger = createLogger(process.env.LOG_LEVEL ? config.logLevel : "debug");

  const seedPath = path.resolve(args.seed ?? "tools/harness/seed.example.json");
  const seed: unknown = JSON.parse(await fs.readFile(seedPath, "utf8"));
  if (!isDirectorySeed(seed)) {
    throw new Error(`Seed file ${seedPath} needs a properties array of { id, name, legacy } rows`);
  }
  const directory = new InMemoryDirectory(seed);
  const alerts = new InMemoryAlertStore();
  const sink = new InMemoryNotificationSink();
  const sequence = new InMemorySequence();

  const audit = new FileAuditLog({ dir: config.audit.dir, dateFormat: config.audit.dateFormat, logger });

  const selectedDir = path.resolve(args.dir ?? "data/call-events");
  console.log(`[harness] scanning dir: ${selectedDir}`);
  const files = (await fs.readdir(selectedDir)).filter((f) => f.toLowerCase().endsWith(".json")).sort();
  const limit = args.limit && args.limit > 0 ? args.limit : files.length;
  const chosen = files.slice(0, limit);
  console.log(`[harness] found ${files.length} files; running ${chosen.length}`);

  const tally: Record<string, number> = {};
  let errors = 0;
  for (const file of chosen) {
    try {
      const data = await fs.readFile(path.join(selectedDir, file), "utf8");
      const envelope: IngestEnvelope = { headers: {}, body: JSON.parse(data), receivedAt: new Date().toISOString() };
      const result = await handleCallEvents(envelope, {
        config,
        logger,
        dependencies: {
          properties: directory,
          extensions: directory,
          alertConfig: directory,
          companies: directory,
          alerts,
          sequence,
          sink,
          convertTime: convertWithTimeZoneTable,
          audit,
        },
      });
      console.log(`[harness] ${file}: ${result.state} (${result.reason})`);
      tally[result.reason] = (tally[result.reason] ?? 0) + 1;
    } catch (err) {
      errors++;
      console.error(`[harness] error on ${file}:`, err instanceof Error ? err.message : String(err));
    }
  }

  console.log(
    `[harness] done. alerts=${alerts.all().length} emails=${sink.emails.length} scheduled=${sink.scheduled.length} events=${sink.events.length} errors=${errors}`
  );
  console.log("[harness] outcomes:", tally);
}

run().catch((e) => {
  console.error("[harness] fatal:", e);
  process.exitCode = 1;
});
