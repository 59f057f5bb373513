/**
 * Core data model for the phenotype mapping pipeline.
 */

// ============================================================================
// CLINICAL TERMS
// ============================================================================

export const SYMPTOM_CATEGORIES = [
  "neurological",
  "cardiovascular",
  "respiratory",
  "digestive",
  "musculoskeletal",
  "dermatological",
  "constitutional",
  "other",
] as const;

export type SymptomCategory = (typeof SYMPTOM_CATEGORIES)[number];

export const SEVERITY_LEVELS = ["mild", "moderate", "severe", "unknown"] as const;
export type Severity = (typeof SEVERITY_LEVELS)[number];

export const TEMPORAL_PATTERNS = ["acute", "chronic", "recurrent", "unknown"] as const;
export type TemporalPattern = (typeof TEMPORAL_PATTERNS)[number];

export type InputLanguage = "en" | "zh";

/**
 * A symptom or clinical sign extracted from one document. Frozen once built.
 */
export interface ClinicalTerm {
  readonly originalText: string;
  readonly standardizedText: string;
  /** English rendering, present when the source text is not English. */
  readonly translatedText?: string;
  readonly category: SymptomCategory;
  readonly severity: Severity;
  readonly temporal: TemporalPattern;
  readonly context: string;
  readonly extractionConfidence: number;
}

export type CategorySummary = Record<SymptomCategory, string[]>;

export interface DiagnosticNotes {
  labValues: string[];
  imagingFindings: string[];
  physicalExamination: string[];
  temporalInformation: string[];
  severityIndicators: string[];
}

export interface ExtractionResult {
  terms: ClinicalTerm[];
  categorySummary: CategorySummary;
  diagnosticNotes: DiagnosticNotes;
  processingNotes: string;
  language: InputLanguage;
}

/** The text used to query the ontology index for a term. */
export function queryTextFor(term: ClinicalTerm): string {
  return term.translatedText ?? term.standardizedText;
}

export function emptyCategorySummary(): CategorySummary {
  return {
    neurological: [],
    cardiovascular: [],
    respiratory: [],
    digestive: [],
    musculoskeletal: [],
    dermatological: [],
    constitutional: [],
    other: [],
  };
}

export function emptyDiagnosticNotes(): DiagnosticNotes {
  return {
    labValues: [],
    imagingFindings: [],
    physicalExamination: [],
    temporalInformation: [],
    severityIndicators: [],
  };
}

// ============================================================================
// ONTOLOGY CANDIDATES AND MAPPINGS
// ============================================================================

export interface OntologyCandidate {
  termId: string;
  termLabel: string;
  description: string;
  /** 1 / (1 + distance), in (0, 1]. */
  similarityScore: number;
}

export const MAPPING_QUALITIES = ["excellent", "good", "fair", "poor"] as const;
export type MappingQuality = (typeof MAPPING_QUALITIES)[number];

export interface OntologyMapping {
  sourceTerm: ClinicalTerm;
  selectedTermId: string;
  selectedTermLabel: string;
  confidence: number;
  reasoning: string;
  mappingQuality?: MappingQuality;
}

/**
 * Outcome of one selection call. Only `selected` yields a mapping.
 */
export type SelectionDecision =
  | { kind: "selected"; mapping: OntologyMapping }
  | { kind: "no-candidates" }
  | { kind: "declined"; reasoning: string }
  | { kind: "below-threshold"; confidence: number; threshold: number; reasoning: string }
  | { kind: "invalid-response"; reason: string };

// ============================================================================
// DOCUMENT RESULTS
// ============================================================================

export type TermOutcome =
  | { status: "mapped"; term: ClinicalTerm; mapping: OntologyMapping; candidateCount: number }
  | { status: "unmapped-no-candidates"; term: ClinicalTerm }
  | { status: "unmapped-low-confidence"; term: ClinicalTerm; candidateCount: number; reason: string }
  | { status: "unmapped-error"; term: ClinicalTerm; error: string };

export type TermOutcomeStatus = TermOutcome["status"];

export interface MappingSummary {
  totalTerms: number;
  successfullyMapped: number;
  highConfidenceMapped: number;
  averageConfidence: number;
  successRate: number;
}

export type DocumentState =
  | "START"
  | "EXTRACTING"
  | "MAPPING_TERMS"
  | "AGGREGATING"
  | "DONE"
  | "FAILED";

export interface DocumentResult {
  sourceText: string;
  clinicalTerms: ClinicalTerm[];
  mappings: OntologyMapping[];
  termOutcomes: TermOutcome[];
  summary: MappingSummary;
  categorySummary: CategorySummary;
  diagnosticNotes: DiagnosticNotes;
  processingNotes: string;
  /** Wall-clock seconds from before extraction to after aggregation. */
  processingTime: number;
  timestamp: string;
  state: Extract<DocumentState, "DONE" | "FAILED">;
  error?: string;
}
