/**
 * Utility functions for Code Researcher
 */
import { ZodError } from "zod";
import { ConfigurationError } from "./errors/index.js";
import { RAGConfigSchema } from "./rag/types.js";
import type { RAGConfig } from "./rag/types.js";
import { ResearchConfigSchema, PlannerTypeSchema } from "./research/types.js";
import type { ResearchConfig, PlannerType } from "./research/types.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL = (() => {
  const level = process.env.LOG_LEVEL?.toUpperCase() || "INFO";
  const isProduction = process.env.NODE_ENV === "production";

  if (isProduction && (level === "DEBUG" || level === "INFO")) {
    return LogLevel.WARN;
  }

  switch (level) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "INFO":
      return LogLevel.INFO;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
})();

export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.DEBUG) {
      console.log(`🔍 ${message}`, ...args);
    }
  },

  info: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.INFO) {
      console.log(`ℹ️ ${message}`, ...args);
    }
  },

  warn: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.WARN) {
      console.warn(`⚠️ ${message}`, ...args);
    }
  },

  error: (message: string, ...args: unknown[]) => {
    if (LOG_LEVEL <= LogLevel.ERROR) {
      console.error(`❌ ${message}`, ...args);
    }
  },
};

// =============================================================================
// Scalar tunables
// =============================================================================

/** Defaults for scalar tunables, overridable through environment variables */
export const CONFIG_DEFAULTS = {
  /** Characters per estimated token */
  TOKENS_CHARS_RATIO: 4,
  /** Maximum directory depth visited by the scanner */
  RAG_MAX_DIRECTORY_DEPTH: 20,
  /** Files larger than this are skipped by the scanner */
  RAG_MAX_FILE_BYTES: 1_048_576,
} as const;

export type ConfigValueKey = keyof typeof CONFIG_DEFAULTS;

/**
 * Read a numeric tunable, falling back to its default when the environment
 * value is missing or not a positive number
 */
export function getConfigValue(key: ConfigValueKey): number {
  const raw = process.env[key];
  if (raw === undefined || raw.trim() === "") {
    return CONFIG_DEFAULTS[key];
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    logger.warn(
      `Invalid ${key}: ${raw}, using default: ${CONFIG_DEFAULTS[key]}`
    );
    return CONFIG_DEFAULTS[key];
  }

  return parsed;
}

// =============================================================================
// Application configuration
// =============================================================================

export interface ProviderSettings {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly embeddingModel: string;
  readonly chatModel: string;
  readonly timeoutMs: number;
}

export interface Config {
  readonly projectPath: string;
  readonly question: string | null;
  readonly planner: PlannerType;
  readonly provider: ProviderSettings;
  readonly rag: RAGConfig;
  readonly research: ResearchConfig;
}

type Env = Readonly<Record<string, string | undefined>>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`, name);
  }
  return parsed;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === "") return undefined;
  return raw === "true" || raw === "1" || raw === "yes";
}

function parseSection<T>(
  section: string,
  parse: () => T
): T {
  try {
    return parse();
  } catch (error) {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const field = issue ? issue.path.join(".") || section : section;
      throw new ConfigurationError(
        `Invalid ${section} configuration: ${issue?.message ?? error.message}`,
        field,
        { issues: error.issues }
      );
    }
    throw error;
  }
}

/**
 * Loads configuration from environment variables
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigurationError if a required value is missing or invalid
 */
export function loadConfig(env: Env = process.env): Config {
  const projectPath = env["PROJECT_PATH"];
  if (!projectPath) {
    throw new ConfigurationError(
      "PROJECT_PATH environment variable is required",
      "PROJECT_PATH"
    );
  }

  const apiKey = env["OPENAI_API_KEY"];
  if (!apiKey) {
    throw new ConfigurationError(
      "OPENAI_API_KEY environment variable is required",
      "OPENAI_API_KEY"
    );
  }

  const timeoutMs = readNumber(env, "OPENAI_TIMEOUT_MS") ?? 60000;
  if (timeoutMs <= 0) {
    throw new ConfigurationError(
      "OPENAI_TIMEOUT_MS must be a positive number",
      "OPENAI_TIMEOUT_MS"
    );
  }

  const planner = parseSection("planner", () =>
    PlannerTypeSchema.parse(env["RESEARCH_PLANNER"] ?? "heuristic")
  );

  const rag = parseSection("rag", () =>
    RAGConfigSchema.parse({
      chunkSize: readNumber(env, "RAG_CHUNK_SIZE"),
      windowLines: readNumber(env, "RAG_WINDOW_LINES"),
      overlapFraction: readNumber(env, "RAG_OVERLAP_FRACTION"),
      vectorWeight: readNumber(env, "RAG_VECTOR_WEIGHT"),
      oversampling: readNumber(env, "RAG_OVERSAMPLING"),
      embeddingMaxAttempts: readNumber(env, "RAG_EMBEDDING_MAX_ATTEMPTS"),
      embeddingBaseDelayMs: readNumber(env, "RAG_EMBEDDING_BASE_DELAY_MS"),
      embeddingMaxDelayMs: readNumber(env, "RAG_EMBEDDING_MAX_DELAY_MS"),
      embeddingConcurrency: readNumber(env, "RAG_EMBEDDING_CONCURRENCY"),
      queryCacheSize: readNumber(env, "RAG_QUERY_CACHE_SIZE"),
      extensions: env["RAG_EXTENSIONS"]
        ?.split(",")
        .map((ext) => ext.trim())
        .filter((ext) => ext.length > 0),
    })
  );

  const research = parseSection("research", () =>
    ResearchConfigSchema.parse({
      maxIterations: readNumber(env, "RESEARCH_MAX_ITERATIONS"),
      sessionTimeoutMs: readNumber(env, "RESEARCH_SESSION_TIMEOUT_MS"),
      retrievalK: readNumber(env, "RESEARCH_RETRIEVAL_K"),
      evidenceTokenBudget: readNumber(env, "RESEARCH_EVIDENCE_TOKEN_BUDGET"),
      dedupThreshold: readNumber(env, "RESEARCH_DEDUP_THRESHOLD"),
      historyTurns: readNumber(env, "RESEARCH_HISTORY_TURNS"),
      degradedAnswers: readBoolean(env, "RESEARCH_DEGRADED_ANSWERS"),
    })
  );

  return {
    projectPath,
    question: env["QUESTION"]?.trim() || null,
    planner,
    provider: {
      apiKey,
      baseUrl: env["OPENAI_BASE_URL"] ?? "https://api.openai.com/v1",
      embeddingModel: env["OPENAI_EMBEDDING_MODEL"] ?? "text-embedding-3-small",
      chatModel: env["OPENAI_CHAT_MODEL"] ?? "gpt-4.1-mini",
      timeoutMs,
    },
    rag,
    research,
  };
}

/**
 * Formats duration in milliseconds to readable format
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes < 60) {
    return remainingSeconds > 0
      ? `${minutes}m ${remainingSeconds}s`
      : `${minutes}m`;
  }

  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;

  return remainingMinutes > 0 ? `${hours}h ${remainingMinutes}m` : `${hours}h`;
}
