import { handleCallEvents } from "../../index";
import { toEnvelope } from "../../ingest/router";

// Minimal local types to avoid aws-lambda dependency
interface APIGatewayProxyEventLike {
  headers: Record<string, string | undefined> | null;
  body: string | null;
}

interface APIGatewayProxyResultLike {
  statusCode: number;
  headers?: Record<string, string>;
  body: string;
}

function json(statusCode: number, body: unknown): APIGatewayProxyResultLike {
  return {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

export async function handler(event: APIGatewayProxyEventLike): Promise<APIGatewayProxyResultLike> {
  let body: unknown;
  try {
    body = event.body ? JSON.parse(event.body) : undefined;
  } catch {
    return json(400, { ok: false, error: "Invalid JSON body" });
  }

  try {
    const result = await handleCallEvents(toEnvelope({ headers: event.headers || {}, body }));
    return json(200, { ok: result.success, result });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return json(500, { ok: false, error: message });
  }
}

export default handler;
