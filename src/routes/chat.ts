import { Router } from "express";
import { AppError, ValidationError, describeError } from "../errors.js";
import type { Logger } from "../lib/logger.js";
import type { ChatService } from "../rag/chat.js";

export interface ChatRequest {
  message: string;
}

/**
 * Validate a POST /chat body. Returns the trimmed message or throws ValidationError.
 */
export function parseChatRequest(body: unknown, maxMessageLength: number): ChatRequest {
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    throw new ValidationError("No JSON data provided");
  }
  const { message } = body as { message?: unknown };
  if (message === undefined || message === null) {
    throw new ValidationError("No message provided");
  }
  if (typeof message !== "string") {
    throw new ValidationError("message must be a string");
  }
  const trimmed = message.trim();
  if (!trimmed) {
    throw new ValidationError("No message provided");
  }
  if (trimmed.length > maxMessageLength) {
    throw new ValidationError(`message must be at most ${maxMessageLength} characters`);
  }
  return { message: trimmed };
}

export function createChatRouter(
  chat: ChatService,
  options: { maxMessageLength: number; logger: Logger }
): Router {
  const { logger, maxMessageLength } = options;
  const router = Router();

  router.post("/chat", async (req, res) => {
    const startedAt = Date.now();
    let request: ChatRequest;
    try {
      request = parseChatRequest(req.body, maxMessageLength);
    } catch (err) {
      const message = err instanceof ValidationError ? err.message : "Invalid request";
      logger.warn("Rejected chat request", { error: message });
      res.status(400).json({ error: message });
      return;
    }

    try {
      const reply = await chat.reply(request.message);
      logger.info("Chat answered", {
        intent: reply.intent,
        kind: reply.kind,
        retrieved: reply.retrieved.length,
        latencyMs: Date.now() - startedAt,
      });
      res.json({ answer: reply.answer, sources: reply.sources });
    } catch (err) {
      logger.error("Chat request failed", {
        code: err instanceof AppError ? err.code : "UNKNOWN",
        error: describeError(err),
        latencyMs: Date.now() - startedAt,
      });
      res.status(500).json({ error: "Internal server error" });
    }
  });

  return router;
}
