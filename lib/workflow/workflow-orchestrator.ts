/**
 * Phenotype Mapping Orchestrator
 *
 * Drives one document through extraction, per-term retrieval and selection,
 * and aggregation, and runs batches of documents with failure isolation.
 *
 * Failure policy:
 * - extraction failure fails the document (state FAILED, `error` set);
 * - any per-term failure is recorded as that term's outcome and the rest of
 *   the document continues;
 * - one document's failure never affects another's result.
 */

import { randomUUID } from "crypto";

import { AgentContext } from "../agents/agent-core";
import { ConfigurationError, errorMessage } from "../agents/errors";
import {
  ClinicalTerm,
  DocumentResult,
  ExtractionResult,
  OntologyCandidate,
  OntologyMapping,
  SelectionDecision,
  TermOutcome,
  queryTextFor,
} from "../agents/types";
import { TermExtractionAgent } from "../agents/term-extraction-agent";
import { TermSelectionAgent } from "../agents/term-selection-agent";
import { CandidateRetriever, RetrieveOptions } from "../services/candidate-retriever";
import { createPipelineServices } from "../services/service-registry";
import { PipelineServices } from "../services/service-types";
import {
  DEFAULT_MAPPING_CONFIG,
  MappingConfig,
  PipelineConfig,
  loadEnvironment,
  loadPipelineConfig,
} from "../config/pipeline-config";
import { WorkflowLogger } from "../logging/logging";
import { mapWithConcurrency } from "../utils/concurrency";
import { DocumentStateMachine, computeMappingSummary, createFailedResult } from "./state-manager";

// ============================================================================
// COLLABORATOR CONTRACTS
// ============================================================================

export interface TermExtractor {
  extract(text: string, context?: Partial<AgentContext>): Promise<ExtractionResult>;
}

export interface CandidateSource {
  retrieve(queryText: string, k?: number, options?: RetrieveOptions): Promise<OntologyCandidate[]>;
}

export interface TermSelector {
  selectDetailed(
    term: ClinicalTerm,
    candidates: readonly OntologyCandidate[],
    threshold?: number,
    context?: Partial<AgentContext>,
  ): Promise<SelectionDecision>;
}

export interface PipelineComponents {
  extractor: TermExtractor;
  retriever: CandidateSource;
  selector: TermSelector;
  logger?: WorkflowLogger;
}

export interface TransformOptions {
  signal?: AbortSignal;
  /** Per-document logger; a fresh one keyed by document id is used otherwise. */
  logger?: WorkflowLogger;
  /** Overrides the configured acceptance threshold for this document. */
  confidenceThreshold?: number;
}

export interface BatchTransformOptions {
  signal?: AbortSignal;
}

export const CANCELLED_MESSAGE = "Processing cancelled before this document started";

// ============================================================================
// ORCHESTRATOR
// ============================================================================

export class PhenotypeMappingOrchestrator {
  private readonly extractor: TermExtractor;
  private readonly retriever: CandidateSource;
  private readonly selector: TermSelector;
  private readonly logger: WorkflowLogger;
  private readonly config: MappingConfig;

  constructor(components: PipelineComponents, config: Partial<MappingConfig> = {}) {
    this.extractor = components.extractor;
    this.retriever = components.retriever;
    this.selector = components.selector;
    this.logger = components.logger ?? new WorkflowLogger("phenotype-mapping");
    this.config = { ...DEFAULT_MAPPING_CONFIG, ...config };
    validateMappingConfig(this.config);
  }

  /**
   * Wires the real agents and retriever over an existing service set.
   */
  static fromServices(services: PipelineServices, config: Partial<MappingConfig> = {}): PhenotypeMappingOrchestrator {
    return new PhenotypeMappingOrchestrator(
      {
        extractor: new TermExtractionAgent(services.aiModel, services.logger),
        retriever: new CandidateRetriever(services.ontologyIndex, services.logger),
        selector: new TermSelectionAgent(services.aiModel, services.logger),
        logger: services.logger,
      },
      config,
    );
  }

  /**
   * Builds every collaborator from configuration, read from the environment
   * when none is given. Throws ConfigurationError on missing credentials or
   * a missing index.
   */
  static async create(config?: PipelineConfig, logger?: WorkflowLogger): Promise<PhenotypeMappingOrchestrator> {
    let resolved = config;
    if (!resolved) {
      loadEnvironment();
      resolved = loadPipelineConfig();
    }
    const services = await createPipelineServices(resolved, logger);
    return PhenotypeMappingOrchestrator.fromServices(services, resolved.mapping);
  }

  getConfiguration(): MappingConfig {
    return { ...this.config };
  }

  /**
   * Runs one document through the pipeline. An out-of-range
   * `confidenceThreshold` override is rejected with a ConfigurationError
   * before any stage runs.
   */
  async transform(text: string, options: TransformOptions = {}): Promise<DocumentResult> {
    if (options.confidenceThreshold !== undefined) {
      validateMappingConfig({ ...this.config, confidenceThreshold: options.confidenceThreshold });
    }

    const startTime = Date.now();
    const documentId = `doc-${randomUUID()}`;
    const ownsLogger = options.logger === undefined;
    const logger = options.logger ?? new WorkflowLogger(documentId, { documentId });

    try {
      return await this.runDocument(text, documentId, startTime, logger, options);
    } finally {
      if (ownsLogger) {
        await logger.close();
      }
    }
  }

  /**
   * One result per input, in input order. After `signal` aborts, documents
   * not yet started get a FAILED result instead of being processed.
   */
  async batchTransform(texts: readonly string[], options: BatchTransformOptions = {}): Promise<DocumentResult[]> {
    const { signal } = options;
    const fn = "PhenotypeMappingOrchestrator.batchTransform";
    const startTime = Date.now();

    this.logger.logWorkflow(fn, `Starting batch of ${texts.length} documents`, {
      documentCount: texts.length,
      documentConcurrency: this.config.documentConcurrency,
    });

    const results = await mapWithConcurrency(texts, this.config.documentConcurrency, async (text, index) => {
      try {
        return await this.transform(text, { signal });
      } catch (error) {
        this.logger.logError(fn, `Document ${index} failed unexpectedly`, { index, error: errorMessage(error) });
        return createFailedResult(text, errorMessage(error), 0);
      }
    });

    const failed = results.filter((result) => result.state === "FAILED").length;
    this.logger.logWorkflow(fn, "Batch completed", {
      documentCount: texts.length,
      failed,
      elapsedMs: Date.now() - startTime,
    });

    return results;
  }

  private async runDocument(
    text: string,
    documentId: string,
    startTime: number,
    logger: WorkflowLogger,
    options: TransformOptions,
  ): Promise<DocumentResult> {
    const fn = "PhenotypeMappingOrchestrator.transform";
    const { signal } = options;
    const threshold = options.confidenceThreshold ?? this.config.confidenceThreshold;
    const machine = new DocumentStateMachine(documentId, logger);
    const elapsedSeconds = () => (Date.now() - startTime) / 1000;

    if (signal?.aborted) {
      machine.transition("FAILED");
      logger.logWarn(fn, CANCELLED_MESSAGE, { documentId });
      return createFailedResult(text, CANCELLED_MESSAGE, elapsedSeconds());
    }

    logger.logWorkflow(fn, "Document processing started", { documentId, textLength: text.length });

    // Extraction
    machine.transition("EXTRACTING");
    logger.logStageStart("extraction");
    const extractionStart = Date.now();
    let extraction: ExtractionResult;
    try {
      extraction = await this.extractor.extract(text, { logger, signal });
      const extractionMs = Date.now() - extractionStart;
      logger.logStageEnd("extraction", true, extractionMs, { termCount: extraction.terms.length });
      logger.logPerformance(fn, "Extraction timing", {
        duration: extractionMs,
        inputSize: text.length,
        outputSize: extraction.terms.length,
      });
    } catch (error) {
      logger.logStageEnd("extraction", false, Date.now() - extractionStart);
      machine.transition("FAILED");
      logger.logError(fn, "Extraction failed, document marked FAILED", { documentId, error: errorMessage(error) });
      return createFailedResult(text, errorMessage(error), elapsedSeconds());
    }

    // Per-term mapping
    machine.transition("MAPPING_TERMS");
    logger.logStageStart("mapping", { termCount: extraction.terms.length });
    const mappingStart = Date.now();
    const termOutcomes = await mapWithConcurrency(extraction.terms, this.config.termConcurrency, (term) =>
      this.mapTerm(term, threshold, logger, signal),
    );
    logger.logStageEnd("mapping", true, Date.now() - mappingStart);

    // Aggregation
    machine.transition("AGGREGATING");
    const mappings: OntologyMapping[] = [];
    for (const outcome of termOutcomes) {
      if (outcome.status === "mapped") {
        mappings.push(outcome.mapping);
      }
    }
    const summary = computeMappingSummary(extraction.terms.length, mappings, this.config.highConfidenceThreshold);

    machine.transition("DONE");
    const processingTime = elapsedSeconds();

    logger.logPerformanceMetrics("PhenotypeMappingOrchestrator", {
      processingTimeMs: Date.now() - startTime,
      totalTerms: summary.totalTerms,
      successfullyMapped: summary.successfullyMapped,
      highConfidenceMapped: summary.highConfidenceMapped,
    });
    logger.logWorkflow(fn, "Document processing completed", { documentId, summary });

    return {
      sourceText: text,
      clinicalTerms: extraction.terms,
      mappings,
      termOutcomes,
      summary,
      categorySummary: extraction.categorySummary,
      diagnosticNotes: extraction.diagnosticNotes,
      processingNotes: extraction.processingNotes,
      processingTime,
      timestamp: new Date().toISOString(),
      state: "DONE",
    };
  }

  private async mapTerm(
    term: ClinicalTerm,
    threshold: number,
    logger: WorkflowLogger,
    signal?: AbortSignal,
  ): Promise<TermOutcome> {
    const fn = "PhenotypeMappingOrchestrator.mapTerm";
    try {
      const candidates = await this.retriever.retrieve(queryTextFor(term), this.config.retrievalTopK, {
        signal,
        logger,
      });
      if (candidates.length === 0) {
        logger.logInfo(fn, "No candidates retrieved", { term: term.standardizedText });
        return { status: "unmapped-no-candidates", term };
      }

      const decision = await this.selector.selectDetailed(term, candidates, threshold, {
        logger,
        signal,
      });
      return toTermOutcome(term, candidates.length, decision);
    } catch (error) {
      logger.logError(fn, "Term mapping failed", { term: term.standardizedText, error: errorMessage(error) });
      return { status: "unmapped-error", term, error: errorMessage(error) };
    }
  }
}

export function toTermOutcome(term: ClinicalTerm, candidateCount: number, decision: SelectionDecision): TermOutcome {
  switch (decision.kind) {
    case "selected":
      return { status: "mapped", term, mapping: decision.mapping, candidateCount };
    case "no-candidates":
      return { status: "unmapped-no-candidates", term };
    case "declined":
      return { status: "unmapped-low-confidence", term, candidateCount, reason: decision.reasoning };
    case "below-threshold":
      return {
        status: "unmapped-low-confidence",
        term,
        candidateCount,
        reason: `Confidence ${decision.confidence} is below the threshold ${decision.threshold}`,
      };
    case "invalid-response":
      return { status: "unmapped-error", term, error: decision.reason };
  }
}

function validateMappingConfig(config: MappingConfig): void {
  const problems: string[] = [];
  for (const key of ["confidenceThreshold", "highConfidenceThreshold"] as const) {
    const value = config[key];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      problems.push(`${key} must be within [0, 1]`);
    }
  }
  for (const key of ["retrievalTopK", "termConcurrency", "documentConcurrency"] as const) {
    if (!Number.isInteger(config[key]) || config[key] < 1) {
      problems.push(`${key} must be a positive integer`);
    }
  }
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid mapping configuration: ${problems.join("; ")}`, { problems });
  }
}
