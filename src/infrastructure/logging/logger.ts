import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";

type LogLevel = "debug" | "info" | "warn" | "error";

type LogContext = Record<string, unknown>;

export type RequestWithId = Request & { requestId?: string };

const levelOrder: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  threshold = level;
}

const basePayload = (level: LogLevel, message: string, context: LogContext) => ({
  level,
  message,
  time: new Date().toISOString(),
  ...context
});

// Amounts are bigints throughout; JSON.stringify rejects them otherwise.
const replacer = (_key: string, value: unknown) =>
  typeof value === "bigint" ? value.toString() : value;

export function log(level: LogLevel, message: string, context: LogContext = {}) {
  if (levelOrder[level] < levelOrder[threshold]) {
    return;
  }
  const line = JSON.stringify(basePayload(level, message, context), replacer);
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function logError(message: string, error: unknown, context: LogContext = {}) {
  if (error instanceof Error) {
    log("error", message, {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack
      }
    });
    return;
  }
  log("error", message, { ...context, error });
}

export function requestLogger(req: RequestWithId, res: Response, next: NextFunction) {
  const requestId = req.header("x-request-id") ?? randomUUID();
  req.requestId = requestId;
  res.setHeader("x-request-id", requestId);
  res.setHeader("x-server-time", Date.now().toString());

  const start = Date.now();
  log("debug", "request.start", {
    requestId,
    method: req.method,
    path: req.originalUrl,
    ip: req.ip
  });

  res.on("finish", () => {
    log("info", "request.end", {
      requestId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - start
    });
  });

  next();
}
