import { createServer, IncomingMessage, ServerResponse } from "http";
import { handleCallEvents } from "../../index";
import { toEnvelope } from "../../ingest/router";
import { logger } from "../../config/logger";

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const json = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.setHeader("Content-Length", Buffer.byteLength(json));
  res.end(json);
}

async function readBody(req: IncomingMessage): Promise<string> {
  return await new Promise<string>((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk) => chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

function flattenHeaders(req: IncomingMessage): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    out[key] = Array.isArray(value) ? value.join(", ") : value;
  }
  return out;
}

async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
  try {
    const url = req.url || "/";
    const method = req.method || "GET";

    if (method === "GET" && url === "/health") {
      return sendJson(res, 200, { ok: true });
    }

    if (method !== "POST" || url !== "/call-events") {
      return sendJson(res, 404, { error: "Not Found" });
    }

    const raw = await readBody(req);
    let body: unknown;
    try {
      body = raw ? JSON.parse(raw) : undefined;
    } catch {
      return sendJson(res, 400, { ok: false, error: "Invalid JSON body" });
    }

    const result = await handleCallEvents(toEnvelope({ headers: flattenHeaders(req), body }));
    return sendJson(res, 200, { ok: result.success, result });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error("server:error", { message });
    return sendJson(res, 500, { ok: false, error: message });
  }
}

const server = createServer((req, res) => {
  route(req, res).catch((err: unknown) => {
    logger.error("server:unhandled", { message: err instanceof Error ? err.message : String(err) });
  });
});

const port = Number(process.env.PORT || 3000);
server.listen(port, () => {
  logger.info(`dev server listening on http://localhost:${port}`);
});
