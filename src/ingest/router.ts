import { IngestEnvelope } from "../domain/types";

export interface SimpleHttpLikeRequest {
  headers: Record<string, string | undefined>;
  body?: unknown;
}

export function toEnvelope(req: SimpleHttpLikeRequest): IngestEnvelope {
  return {
    headers: req.headers,
    body: req.body,
    receivedAt: new Date().toISOString(),
  };
}
