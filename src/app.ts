import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import { existsSync } from "fs";
import path from "path";
import { describeError } from "./errors.js";
import type { Logger } from "./lib/logger.js";
import type { ChatService } from "./rag/chat.js";
import { createChatRouter } from "./routes/chat.js";
import { createHealthRouter } from "./routes/health.js";

export interface AppOptions {
  chat: ChatService;
  logger: Logger;
  service: string;
  version: string;
  maxMessageLength: number;
  /** Directory holding the chat UI; not served when null. */
  publicDir: string | null;
}

function hasStatus(err: unknown): err is { status: number } {
  return !!err && typeof err === "object" && "status" in err && typeof err.status === "number";
}

export function createApp(options: AppOptions): express.Express {
  const { logger } = options;
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "100kb" }));

  app.use(createHealthRouter({ service: options.service, version: options.version }));
  app.use(createChatRouter(options.chat, { maxMessageLength: options.maxMessageLength, logger }));

  if (options.publicDir) {
    const publicDir = options.publicDir;
    app.use(express.static(publicDir));
    app.get("/", (_req, res) => {
      res.sendFile(path.join(publicDir, "index.html"));
    });
  }

  app.use((_req, res) => {
    res.status(404).json({ error: "Endpoint not found" });
  });

  // Body parser failures (malformed JSON, oversized body) arrive here with a 4xx status.
  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (hasStatus(err) && err.status >= 400 && err.status < 500) {
      logger.warn("Rejected malformed request", { status: err.status, error: describeError(err) });
      res.status(err.status).json({ error: err.status === 413 ? "Request body too large" : "Invalid JSON body" });
      return;
    }
    logger.error("Unhandled request error", { error: describeError(err) });
    res.status(500).json({ error: "Internal server error" });
  };
  app.use(onError);

  return app;
}

/** Locate public/ beside src/ or dist/. */
export function findPublicDir(startDir: string): string | null {
  const candidates = [path.resolve(startDir, "..", "public"), path.resolve(startDir, "..", "..", "public")];
  for (const dir of candidates) {
    if (existsSync(path.join(dir, "index.html"))) return dir;
  }
  return null;
}
