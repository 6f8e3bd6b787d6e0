import fs from "fs";
import path from "path";
import { loadConfig, LogLevel } from "./config";

export type { LogLevel };

export interface Logger {
  debug: (msg: string, ctx?: Record<string, unknown>) => void;
  info: (msg: string, ctx?: Record<string, unknown>) => void;
  warn: (msg: string, ctx?: Record<string, unknown>) => void;
  error: (msg: string, ctx?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  // false disables the per-run file mirror
  logsDir?: string | false;
}

const order: LogLevel[] = ["debug", "info", "warn", "error"];

export function createLogger(level: LogLevel = "info", options: LoggerOptions = {}): Logger {
  const minIdx = order.indexOf(level);

  // Initialize per-run file logger
  const runStamp = new Date().toISOString().replace(/[:.]/g, "-");
  const logsDir = options.logsDir ?? (process.env.LOG_DIR || path.join(process.cwd(), "logs"));
  let fileStream: fs.WriteStream | null = null;
  if (logsDir !== false) {
    try {
      fs.mkdirSync(logsDir, { recursive: true });
      const filePath = path.join(logsDir, `run-${runStamp}.log`);
      fileStream = fs.createWriteStream(filePath, { flags: "a" });
      fileStream.on("error", (err) => {
        // eslint-disable-next-line no-console
        console.warn(`log file disabled: ${err.message}`);
        fileStream = null;
      });
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(`log file disabled: ${err instanceof Error ? err.message : String(err)}`);
      fileStream = null;
    }
  }

  function shouldLog(lvl: LogLevel): boolean {
    return order.indexOf(lvl) >= minIdx;
  }

  function log(lvl: LogLevel, msg: string, ctx?: Record<string, unknown>) {
    if (!shouldLog(lvl)) return;
    const payload = ctx ? ` ${JSON.stringify(ctx)}` : "";
    const ts = new Date().toISOString();
    const line = `${ts} [${lvl}] ${msg}${payload}`;
    // eslint-disable-next-line no-console
    console[lvl === "debug" ? "log" : lvl](line);
    fileStream?.write(line + "\n");
  }

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
  };
}

export default createLogger;

export const logger: Logger = createLogger(loadConfig().logLevel);
