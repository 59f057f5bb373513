/**
 * Pipeline Configuration
 *
 * Environment-driven configuration for the mapping pipeline. Values are read
 * from `process.env` (after `.env.local` and `.env` are loaded) and validated
 * with zod; missing provider credentials surface as a ConfigurationError before
 * any document is processed.
 */

import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError, DEFAULT_TIMEOUTS } from "../agents/errors";

export type LLMProviderConfig =
  | {
      provider: "openai";
      apiKey: string;
      baseUrl?: string;
      model: string;
    }
  | {
      provider: "azure";
      apiKey: string;
      endpoint: string;
      deployment: string;
      apiVersion: string;
    };

export type EmbeddingProviderConfig =
  | { provider: "voyage"; apiKey: string; model: string }
  | { provider: "openai"; apiKey: string; baseUrl?: string; model: string };

export interface MappingConfig {
  /** Minimum LLM confidence for a mapping to be accepted. */
  confidenceThreshold: number;
  /** Mappings at or above this confidence count as high-confidence. */
  highConfidenceThreshold: number;
  retrievalTopK: number;
  termConcurrency: number;
  documentConcurrency: number;
}

export interface PipelineConfig {
  llm: LLMProviderConfig;
  embedding: EmbeddingProviderConfig;
  indexPath: string;
  mapping: MappingConfig;
  requestTimeoutMs: number;
}

export const DEFAULT_MAPPING_CONFIG: MappingConfig = {
  confidenceThreshold: 0.7,
  highConfidenceThreshold: 0.8,
  retrievalTopK: 10,
  termConcurrency: 1,
  documentConcurrency: 1,
};

export const DEFAULT_OPENAI_MODEL = "gpt-4o";
export const DEFAULT_VOYAGE_MODEL = "voyage-3";
export const DEFAULT_OPENAI_EMBEDDING_MODEL = "text-embedding-3-small";
export const DEFAULT_AZURE_API_VERSION = "2025-01-01-preview";
/** Directory holding the JSON index artifact, not a FAISS store. */
export const DEFAULT_INDEX_PATH = "./embeddings/hpo-index-json";

// Blank environment values count as unset.
const optionalString = z.preprocess(
  (value) => (typeof value === "string" && value.trim() === "" ? undefined : value),
  z.string().optional(),
);

const numberWithDefault = (fallback: number, schema: z.ZodNumber) =>
  z.preprocess(
    (value) => (value === undefined || value === "" ? fallback : Number(value)),
    schema,
  );

const EnvSchema = z.object({
  LLM_PROVIDER: z.preprocess(
    (value) => (typeof value === "string" && value !== "" ? value.toLowerCase() : "openai"),
    z.enum(["openai", "azure"]),
  ),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  OPENAI_MODEL: optionalString,
  AZURE_OPENAI_API_KEY: optionalString,
  AZURE_OPENAI_ENDPOINT: optionalString,
  AZURE_OPENAI_DEPLOYMENT_NAME: optionalString,
  AZURE_OPENAI_API_VERSION: optionalString,
  EMBEDDING_PROVIDER: z.preprocess(
    (value) => (typeof value === "string" && value !== "" ? value.toLowerCase() : "voyage"),
    z.enum(["voyage", "openai"]),
  ),
  VOYAGE_API_KEY: optionalString,
  EMBEDDING_MODEL: optionalString,
  HPO_INDEX_PATH: optionalString,
  MAPPING_CONFIDENCE_THRESHOLD: numberWithDefault(
    DEFAULT_MAPPING_CONFIG.confidenceThreshold,
    z.number().min(0).max(1),
  ),
  HIGH_CONFIDENCE_THRESHOLD: numberWithDefault(
    DEFAULT_MAPPING_CONFIG.highConfidenceThreshold,
    z.number().min(0).max(1),
  ),
  RETRIEVAL_TOP_K: numberWithDefault(DEFAULT_MAPPING_CONFIG.retrievalTopK, z.number().int().min(1)),
  TERM_CONCURRENCY: numberWithDefault(DEFAULT_MAPPING_CONFIG.termConcurrency, z.number().int().min(1)),
  DOCUMENT_CONCURRENCY: numberWithDefault(
    DEFAULT_MAPPING_CONFIG.documentConcurrency,
    z.number().int().min(1),
  ),
  REQUEST_TIMEOUT_MS: numberWithDefault(DEFAULT_TIMEOUTS.LLM_REQUEST, z.number().int().min(1000)),
});

type ParsedEnv = z.infer<typeof EnvSchema>;

let environmentLoaded = false;

/**
 * Loads `.env.local` then `.env` into `process.env`. Existing variables win.
 */
export function loadEnvironment(): void {
  if (environmentLoaded) return;
  dotenv.config({ path: ".env.local" });
  dotenv.config({ path: ".env" });
  environmentLoaded = true;
}

export function loadPipelineConfig(
  env: Record<string, string | undefined> = process.env,
): PipelineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid pipeline configuration: ${problems.join("; ")}`, {
      problems,
    });
  }

  const values = parsed.data;
  const missing: string[] = [];
  const llm = buildLLMConfig(values, missing);
  const embedding = buildEmbeddingConfig(values, missing);

  if (!llm || !embedding || missing.length > 0) {
    throw new ConfigurationError(
      `Missing required environment variables: ${missing.join(", ")}`,
      { missing },
    );
  }

  return {
    llm,
    embedding,
    indexPath: values.HPO_INDEX_PATH ?? DEFAULT_INDEX_PATH,
    mapping: {
      confidenceThreshold: values.MAPPING_CONFIDENCE_THRESHOLD,
      highConfidenceThreshold: values.HIGH_CONFIDENCE_THRESHOLD,
      retrievalTopK: values.RETRIEVAL_TOP_K,
      termConcurrency: values.TERM_CONCURRENCY,
      documentConcurrency: values.DOCUMENT_CONCURRENCY,
    },
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
  };
}

function buildLLMConfig(values: ParsedEnv, missing: string[]): LLMProviderConfig | undefined {
  if (values.LLM_PROVIDER === "azure") {
    const apiKey = values.AZURE_OPENAI_API_KEY;
    const endpoint = values.AZURE_OPENAI_ENDPOINT;
    const deployment = values.AZURE_OPENAI_DEPLOYMENT_NAME;
    if (!apiKey) missing.push("AZURE_OPENAI_API_KEY");
    if (!endpoint) missing.push("AZURE_OPENAI_ENDPOINT");
    if (!deployment) missing.push("AZURE_OPENAI_DEPLOYMENT_NAME");
    if (!apiKey || !endpoint || !deployment) return undefined;

    return {
      provider: "azure",
      apiKey,
      endpoint,
      deployment,
      apiVersion: values.AZURE_OPENAI_API_VERSION ?? DEFAULT_AZURE_API_VERSION,
    };
  }

  if (!values.OPENAI_API_KEY) {
    missing.push("OPENAI_API_KEY");
    return undefined;
  }
  return {
    provider: "openai",
    apiKey: values.OPENAI_API_KEY,
    baseUrl: values.OPENAI_BASE_URL,
    model: values.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL,
  };
}

function buildEmbeddingConfig(
  values: ParsedEnv,
  missing: string[],
): EmbeddingProviderConfig | undefined {
  if (values.EMBEDDING_PROVIDER === "openai") {
    if (!values.OPENAI_API_KEY) {
      if (!missing.includes("OPENAI_API_KEY")) missing.push("OPENAI_API_KEY");
      return undefined;
    }
    return {
      provider: "openai",
      apiKey: values.OPENAI_API_KEY,
      baseUrl: values.OPENAI_BASE_URL,
      model: values.EMBEDDING_MODEL ?? DEFAULT_OPENAI_EMBEDDING_MODEL,
    };
  }

  if (!values.VOYAGE_API_KEY) {
    missing.push("VOYAGE_API_KEY");
    return undefined;
  }
  return {
    provider: "voyage",
    apiKey: values.VOYAGE_API_KEY,
    model: values.EMBEDDING_MODEL ?? DEFAULT_VOYAGE_MODEL,
  };
}

/**
 * Returns a copy safe to log: credentials are reduced to a short prefix.
 */
export function describePipelineConfig(config: PipelineConfig): Record<string, unknown> {
  const mask = (value: string) => `${value.substring(0, 4)}...`;
  return {
    llm: { ...config.llm, apiKey: mask(config.llm.apiKey) },
    embedding: { ...config.embedding, apiKey: mask(config.embedding.apiKey) },
    indexPath: config.indexPath,
    mapping: config.mapping,
    requestTimeoutMs: config.requestTimeoutMs,
  };
}
