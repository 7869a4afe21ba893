import path from "path";
import { ConfigurationError } from "../errors.js";
import { isLogLevel, type LogLevel } from "../lib/logger.js";

export type VectorStoreKind = "pinecone" | "local";

export interface Settings {
  serviceName: string;
  version: string;
  port: number;
  logLevel: LogLevel;

  pineconeApiKey: string | null;
  pineconeIndex: string;
  vectorStore: VectorStoreKind;
  localIndexPath: string;

  openaiApiKey: string;
  llmApiKey: string;
  llmBaseUrl: string | null;
  chatModel: string;
  embeddingModel: string;
  embeddingDimension: number;

  assistantName: string;
  topK: number;
  minScore: number;
  maxAnswerTokens: number;
  maxGreetingTokens: number;
  maxMessageLength: number;
  requestTimeoutMs: number;

  dataDir: string;
  catalogPath: string;
  sourceIndexPath: string;
  logDir: string;
}

/** Dimension of every vector in the index. Fixed when the index is created. */
export const EMBEDDING_DIMENSION = 384;

const DEFAULTS = {
  serviceName: "Sermon Q&A API",
  version: "2.0.0",
  port: 5000,
  logLevel: "info",
  pineconeIndex: "sermon-index",
  vectorStore: "pinecone",
  chatModel: "gpt-4o-mini",
  embeddingModel: "text-embedding-3-small",
  assistantName: "Sermon Guide",
  topK: 3,
  minScore: 0.25,
  maxAnswerTokens: 400,
  maxGreetingTokens: 150,
  maxMessageLength: 2000,
  requestTimeoutMs: 15000,
  dataDir: "data",
  logDir: "logs",
} as const;

function readString(env: NodeJS.ProcessEnv, name: string): string | null {
  const value = env[name]?.trim();
  return value ? value : null;
}

function readNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  check: (n: number) => boolean
): number {
  const raw = readString(env, name);
  if (raw == null) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigurationError(`${name} has an invalid value: ${raw}`);
  }
  return value;
}

const isPositiveInt = (n: number): boolean => Number.isInteger(n) && n > 0;

export interface LogSettings {
  logDir: string;
  logLevel: LogLevel;
}

/** Log location and level only. Never throws; an invalid LOG_LEVEL falls back to the default here. */
export function loadLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  const level = readString(env, "LOG_LEVEL");
  return {
    logDir: readString(env, "LOG_DIR") ?? DEFAULTS.logDir,
    logLevel: level && isLogLevel(level) ? level : DEFAULTS.logLevel,
  };
}

/**
 * Build the settings object once at startup. Missing secrets are a ConfigurationError:
 * OPENAI_API_KEY always, PINECONE_API_KEY unless the local vector store is selected.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const missing: string[] = [];

  const vectorStoreRaw = readString(env, "VECTOR_STORE") ?? DEFAULTS.vectorStore;
  if (vectorStoreRaw !== "pinecone" && vectorStoreRaw !== "local") {
    throw new ConfigurationError(`VECTOR_STORE must be "pinecone" or "local", got "${vectorStoreRaw}"`);
  }
  const vectorStore: VectorStoreKind = vectorStoreRaw;

  const pineconeApiKey = readString(env, "PINECONE_API_KEY");
  if (vectorStore === "pinecone" && !pineconeApiKey) missing.push("PINECONE_API_KEY");

  const openaiApiKey = readString(env, "OPENAI_API_KEY");
  if (!openaiApiKey) missing.push("OPENAI_API_KEY");

  if (missing.length > 0 || !openaiApiKey) {
    throw new ConfigurationError(
      `Missing required environment variable(s): ${missing.join(", ")}. Add them to the .env file or the environment.`
    );
  }

  const logLevelRaw = readString(env, "LOG_LEVEL") ?? DEFAULTS.logLevel;
  if (!isLogLevel(logLevelRaw)) {
    throw new ConfigurationError(`LOG_LEVEL has an invalid value: ${logLevelRaw}`);
  }

  const dataDir = readString(env, "DATA_DIR") ?? DEFAULTS.dataDir;

  return {
    serviceName: DEFAULTS.serviceName,
    version: readString(env, "APP_VERSION") ?? DEFAULTS.version,
    port: readNumber(env, "PORT", DEFAULTS.port, (n) => Number.isInteger(n) && n >= 0 && n < 65536),
    logLevel: logLevelRaw,

    pineconeApiKey,
    pineconeIndex: readString(env, "PINECONE_INDEX") ?? DEFAULTS.pineconeIndex,
    vectorStore,
    localIndexPath: readString(env, "LOCAL_INDEX_PATH") ?? path.join(dataDir, "vectorIndex.json"),

    openaiApiKey,
    llmApiKey: readString(env, "LLM_API_KEY") ?? openaiApiKey,
    llmBaseUrl: readString(env, "LLM_BASE_URL"),
    chatModel: readString(env, "CHAT_MODEL") ?? DEFAULTS.chatModel,
    embeddingModel: readString(env, "EMBEDDING_MODEL") ?? DEFAULTS.embeddingModel,
    embeddingDimension: EMBEDDING_DIMENSION,

    assistantName: readString(env, "ASSISTANT_NAME") ?? DEFAULTS.assistantName,
    topK: readNumber(env, "TOP_K", DEFAULTS.topK, isPositiveInt),
    minScore: readNumber(env, "MIN_SCORE", DEFAULTS.minScore, (n) => n >= -1 && n <= 1),
    maxAnswerTokens: readNumber(env, "MAX_ANSWER_TOKENS", DEFAULTS.maxAnswerTokens, isPositiveInt),
    maxGreetingTokens: DEFAULTS.maxGreetingTokens,
    maxMessageLength: readNumber(env, "MAX_MESSAGE_LENGTH", DEFAULTS.maxMessageLength, isPositiveInt),
    requestTimeoutMs: readNumber(env, "REQUEST_TIMEOUT_MS", DEFAULTS.requestTimeoutMs, isPositiveInt),

    dataDir,
    catalogPath: readString(env, "CATALOG_PATH") ?? path.join(dataDir, "sermon_data.json"),
    sourceIndexPath: path.join(dataDir, "sourceIndex.json"),
    logDir: readString(env, "LOG_DIR") ?? DEFAULTS.logDir,
  };
}
