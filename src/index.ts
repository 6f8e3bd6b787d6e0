import { callEventAdapter } from "./adapters/call-event.adapter";
import { IngestEnvelope, PipelineResult } from "./domain/types";
import { logger as defaultLogger } from "./config/logger";
import { Alert911Options, processCallEvent } from "./workflows/alert-911/orchestrator";

export type { Alert911Options, Alert911Dependencies } from "./workflows/alert-911/orchestrator";
export type { CallEvent, PipelineResult } from "./domain/types";
export { processCallEvent };

export async function handleCallEvents(envelope: IngestEnvelope, options: Alert911Options = {}): Promise<PipelineResult> {
  const logger = options.logger ?? defaultLogger;
  logger.debug("ingest:start", { receivedAt: envelope.receivedAt });

  const events = callEventAdapter(envelope);
  const first = events[0];
  if (!first) {
    logger.info("ingest:done", { state: "NO_EVENT" });
    return { success: true, state: "NO_EVENT", reason: "no_event" };
  }
  if (events.length > 1) {
    // only the first record is processed per invocation
    logger.warn("ingest:extra_events_ignored", { count: events.length - 1 });
  }

  const result = await processCallEvent(first, options);
  logger.info("ingest:done", { ...result });
  return result;
}

export default handleCallEvents;
