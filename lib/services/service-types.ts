/**
 * Service contracts consumed by the agents and the orchestrator. Real
 * implementations live beside this file; tests substitute in-process fakes.
 */

import type { z } from "zod";
import type { WorkflowLogger } from "../logging/logging";

// ============================================================================
// AI MODEL SERVICE
// ============================================================================

export interface AIModelConfig {
  provider: "openai" | "azure";
  /** Model name, or deployment name on Azure. */
  model: string;
  temperature: number;
  maxTokens: number;
  timeout: number;
}

export interface LLMRequestOptions {
  system?: string;
  signal?: AbortSignal;
  /** Recorded with the AI usage log entry. */
  callerName?: string;
}

export interface AIModelUsageStats {
  requestCount: number;
  totalTokensUsed: number;
  averageTokensPerRequest: number;
}

export interface AIModelService {
  generateText(prompt: string, options?: LLMRequestOptions): Promise<string>;
  generateStructuredOutput<T>(
    prompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: LLMRequestOptions,
  ): Promise<T>;
  getUsageStats(): AIModelUsageStats;
  getConfig(): AIModelConfig;
}

// ============================================================================
// EMBEDDINGS
// ============================================================================

export type EmbeddingInputType = "query" | "document";

export interface EmbeddingRequestOptions {
  inputType?: EmbeddingInputType;
  signal?: AbortSignal;
}

export interface EmbeddingService {
  readonly provider: string;
  readonly model: string;
  embed(texts: string[], options?: EmbeddingRequestOptions): Promise<number[][]>;
  embedQuery(text: string, options?: Omit<EmbeddingRequestOptions, "inputType">): Promise<number[]>;
}

// ============================================================================
// ONTOLOGY INDEX
// ============================================================================

export interface OntologyIndexEntry {
  id: string;
  label: string;
  /** Indexed text: id, label, definition and synonyms. */
  content: string;
  vector: number[];
}

export interface OntologySearchHit {
  termId: string;
  termLabel: string;
  description: string;
  /** Squared Euclidean distance to the query vector. */
  distance: number;
}

export interface OntologySearchOptions {
  signal?: AbortSignal;
}

export interface OntologyIndex {
  readonly model: string;
  readonly dimension: number;
  readonly size: number;
  search(queryText: string, k: number, options?: OntologySearchOptions): Promise<OntologySearchHit[]>;
  getTerm(termId: string): OntologyIndexEntry | undefined;
}

// ============================================================================
// SERVICE REGISTRY
// ============================================================================

export interface PipelineServices {
  aiModel: AIModelService;
  embeddings: EmbeddingService;
  ontologyIndex: OntologyIndex;
  logger: WorkflowLogger;
}
