/**
 * Candidate Retriever
 *
 * Turns a query string into ranked ontology candidates. Unless the caller asks
 * for `throwOnError`, retrieval failures are logged as RetrievalError and the
 * caller gets an empty list, which the orchestrator records as "no candidates".
 */

import { OntologyIndex } from './service-types';
import { OntologyCandidate } from '../agents/types';
import { RetrievalError, errorMessage } from '../agents/errors';
import { WorkflowLogger } from '../logging/logging';

export const DEFAULT_RETRIEVAL_K = 10;
/** Recommended k for standalone single-symptom lookups. */
export const SINGLE_SYMPTOM_K = 5;

/**
 * Maps a distance to a similarity score in [0, 1]: 1 / (1 + distance).
 * Negative distances are treated as 0; NaN and infinite distances score 0.
 */
export function toSimilarityScore(distance: number): number {
  if (!Number.isFinite(distance)) {
    return 0;
  }
  return 1 / (1 + Math.max(0, distance));
}

export interface RetrieveOptions {
  signal?: AbortSignal;
  logger?: WorkflowLogger;
  /** Rethrow retrieval failures as RetrievalError instead of returning []. Defaults to false. */
  throwOnError?: boolean;
}

export class CandidateRetriever {
  constructor(
    private readonly index: OntologyIndex,
    private readonly logger?: WorkflowLogger,
  ) {}

  async retrieve(
    queryText: string,
    k: number = DEFAULT_RETRIEVAL_K,
    options: RetrieveOptions = {},
  ): Promise<OntologyCandidate[]> {
    const logger = options.logger ?? this.logger;
    const query = queryText.trim();
    if (query === '' || k <= 0) {
      return [];
    }

    try {
      const hits = await this.index.search(query, k, { signal: options.signal });
      const candidates = hits
        .map((hit) => ({
          termId: hit.termId,
          termLabel: hit.termLabel,
          description: hit.description,
          similarityScore: toSimilarityScore(hit.distance),
        }))
        .sort((a, b) => b.similarityScore - a.similarityScore)
        .slice(0, k);

      logger?.logDebug('CandidateRetriever.retrieve', `Retrieved ${candidates.length} candidates`, {
        query,
        k,
        topCandidate: candidates[0]?.termId,
      });
      return candidates;
    } catch (error) {
      const retrievalError =
        error instanceof RetrievalError
          ? error
          : new RetrievalError(`Candidate retrieval failed: ${errorMessage(error)}`, { query, k }, error);

      if (options.throwOnError) {
        throw retrievalError;
      }
      logger?.logWarn('CandidateRetriever.retrieve', 'Retrieval failed, continuing without candidates', {
        query,
        k,
        code: retrievalError.code,
        error: retrievalError.message,
      });
      return [];
    }
  }
}
