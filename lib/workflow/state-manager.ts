/**
 * Document State Management
 *
 * Per-document lifecycle and result assembly for the mapping pipeline:
 *
 *   START → EXTRACTING → MAPPING_TERMS → AGGREGATING → DONE
 *
 * with FAILED reachable from every non-terminal state. Transitions outside
 * this graph are programming errors and throw.
 */

import { ERROR_CODES, PipelineError, ProcessingErrorSeverity } from "../agents/errors";
import {
  DocumentResult,
  DocumentState,
  MappingSummary,
  OntologyMapping,
  emptyCategorySummary,
  emptyDiagnosticNotes,
} from "../agents/types";
import { WorkflowLogger } from "../logging/logging";

export const DEFAULT_HIGH_CONFIDENCE_THRESHOLD = 0.8;

// ============================================================================
// STATE MACHINE
// ============================================================================

const TRANSITIONS: Record<DocumentState, readonly DocumentState[]> = {
  START: ["EXTRACTING", "FAILED"],
  EXTRACTING: ["MAPPING_TERMS", "FAILED"],
  MAPPING_TERMS: ["AGGREGATING", "FAILED"],
  AGGREGATING: ["DONE", "FAILED"],
  DONE: [],
  FAILED: [],
};

export function canTransition(from: DocumentState, to: DocumentState): boolean {
  return TRANSITIONS[from].includes(to);
}

export class DocumentStateMachine {
  private current: DocumentState = "START";
  private readonly history: DocumentState[] = ["START"];

  constructor(
    private readonly documentId: string,
    private readonly logger?: WorkflowLogger,
  ) {}

  get state(): DocumentState {
    return this.current;
  }

  getHistory(): readonly DocumentState[] {
    return [...this.history];
  }

  isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  transition(to: DocumentState): void {
    if (!canTransition(this.current, to)) {
      throw new PipelineError(
        ERROR_CODES.INVALID_STATE_TRANSITION,
        `Illegal document state transition ${this.current} → ${to}`,
        ProcessingErrorSeverity.CRITICAL,
        { documentId: this.documentId, from: this.current, to },
      );
    }

    this.logger?.logStateTransition(this.current, to, "DocumentStateMachine", this.documentId);
    this.current = to;
    this.history.push(to);
  }
}

// ============================================================================
// AGGREGATION
// ============================================================================

export function emptyMappingSummary(totalTerms = 0): MappingSummary {
  return {
    totalTerms,
    successfullyMapped: 0,
    highConfidenceMapped: 0,
    averageConfidence: 0,
    successRate: 0,
  };
}

/**
 * Averages are over accepted mappings only; both ratios are 0 when their
 * denominator is.
 */
export function computeMappingSummary(
  totalTerms: number,
  mappings: readonly OntologyMapping[],
  highConfidenceThreshold: number = DEFAULT_HIGH_CONFIDENCE_THRESHOLD,
): MappingSummary {
  const successfullyMapped = mappings.length;
  const highConfidenceMapped = mappings.filter((m) => m.confidence >= highConfidenceThreshold).length;
  const confidenceTotal = mappings.reduce((sum, m) => sum + m.confidence, 0);

  return {
    totalTerms,
    successfullyMapped,
    highConfidenceMapped,
    averageConfidence: successfullyMapped > 0 ? confidenceTotal / successfullyMapped : 0,
    successRate: totalTerms > 0 ? successfullyMapped / totalTerms : 0,
  };
}

/**
 * A FAILED result: no terms, no mappings, a zero summary and the error text.
 */
export function createFailedResult(sourceText: string, error: string, processingTime: number): DocumentResult {
  return {
    sourceText,
    clinicalTerms: [],
    mappings: [],
    termOutcomes: [],
    summary: emptyMappingSummary(),
    categorySummary: emptyCategorySummary(),
    diagnosticNotes: emptyDiagnosticNotes(),
    processingNotes: "",
    processingTime,
    timestamp: new Date().toISOString(),
    state: "FAILED",
    error,
  };
}
