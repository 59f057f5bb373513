/**
 * Term Extraction Agent
 *
 * Parses raw clinical text into structured ClinicalTerms with one LLM call.
 * Any failure to obtain a schema-valid response is an ExtractionError: a
 * wrong term list would invalidate every mapping in the document, so nothing
 * partial is returned. No confidence filtering happens here.
 */

import { Agent, AgentContext } from "./agent-core";
import { ExtractionError, errorMessage, isPipelineError } from "./errors";
import {
  TERM_EXTRACTION_SYSTEM_PROMPT,
  termExtractionPrompt,
} from "./prompts/term-extraction-prompts";
import { ExtractedSymptom, SymptomExtractionResponse, SymptomExtractionSchema } from "./schemas";
import {
  CategorySummary,
  ClinicalTerm,
  DiagnosticNotes,
  ExtractionResult,
  InputLanguage,
  emptyCategorySummary,
  emptyDiagnosticNotes,
} from "./types";
import { AIModelService } from "../services/service-types";
import { WorkflowLogger } from "../logging/logging";

// CJK Unified Ideographs, Extension A and Compatibility Ideographs.
const CJK_PATTERN = /[\u3400-\u9fff\uf900-\ufaff]/;

export function detectLanguage(text: string): InputLanguage {
  return CJK_PATTERN.test(text) ? "zh" : "en";
}

export class TermExtractionAgent extends Agent {
  readonly name = "term_extraction_agent";
  readonly description = "Extracts clinical terms (symptoms, signs, phenotypic observations) from free text";

  constructor(aiModel: AIModelService, logger?: WorkflowLogger) {
    super(aiModel, logger);
  }

  async extract(text: string, context?: Partial<AgentContext>): Promise<ExtractionResult> {
    const ctx = this.resolveContext(context);
    const { logger } = ctx;
    const language = detectLanguage(text);

    if (text.trim() === "") {
      logger.logInfo(this.name, "Empty input, nothing to extract");
      return {
        terms: [],
        categorySummary: emptyCategorySummary(),
        diagnosticNotes: emptyDiagnosticNotes(),
        processingNotes: "Input text was empty.",
        language,
      };
    }

    logger.logInfo(this.name, "Term extraction started", { language, textLength: text.length });

    let response: SymptomExtractionResponse;
    try {
      response = await this.loggedApiCall(
        ctx,
        "aiModel",
        "generateStructuredOutput",
        () =>
          this.aiModel.generateStructuredOutput(termExtractionPrompt(text, language), SymptomExtractionSchema, {
            system: TERM_EXTRACTION_SYSTEM_PROMPT,
            signal: ctx.signal,
            callerName: `${this.name}.extract`,
          }),
        { language, textLength: text.length },
      );
    } catch (error) {
      const extractionError = new ExtractionError(
        `Term extraction failed: ${errorMessage(error)}`,
        { language, cause: isPipelineError(error) ? error.code : undefined },
        error,
      );
      logger.logError(this.name, extractionError.message, {
        code: extractionError.code,
        causeCode: extractionError.context?.cause,
      });
      throw extractionError;
    }

    const terms = response.extracted_symptoms.map((symptom) => this.toClinicalTerm(symptom, language, ctx));
    const result: ExtractionResult = {
      terms,
      categorySummary: summarizeByCategory(terms),
      diagnosticNotes: toDiagnosticNotes(response),
      processingNotes: response.processing_notes,
      language,
    };

    logger.logInfo(this.name, "Term extraction completed", {
      language,
      termCount: terms.length,
      terms: terms.map((term) => ({
        standardized: term.standardizedText,
        translated: term.translatedText,
        category: term.category,
        confidence: term.extractionConfidence,
      })),
    });

    return result;
  }

  private toClinicalTerm(symptom: ExtractedSymptom, language: InputLanguage, context: AgentContext): ClinicalTerm {
    const translation = symptom.english_translation?.trim();
    let translatedText: string | undefined;

    if (language === "zh") {
      translatedText = translation || undefined;
      if (!translatedText) {
        context.logger.logWarn(this.name, "Symptom has no English translation, retrieval will use the standardized text", {
          standardizedText: symptom.standardized_text,
        });
      }
    }

    return Object.freeze({
      originalText: symptom.original_text,
      standardizedText: symptom.standardized_text,
      translatedText,
      category: symptom.category,
      severity: symptom.severity,
      temporal: symptom.temporal,
      context: symptom.context,
      extractionConfidence: symptom.confidence,
    });
  }
}

export function summarizeByCategory(terms: readonly ClinicalTerm[]): CategorySummary {
  const summary = emptyCategorySummary();
  for (const term of terms) {
    summary[term.category].push(term.standardizedText);
  }
  return summary;
}

function toDiagnosticNotes(response: SymptomExtractionResponse): DiagnosticNotes {
  const info = response.diagnostic_information;
  if (!info) {
    return emptyDiagnosticNotes();
  }
  return {
    labValues: info.lab_values,
    imagingFindings: info.imaging_findings,
    physicalExamination: info.physical_examination,
    temporalInformation: info.temporal_information,
    severityIndicators: info.severity_indicators,
  };
}
