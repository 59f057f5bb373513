/**
 * Schemas for the structured LLM responses. Anything that does not parse
 * against these is rejected at the boundary; partially valid data never
 * reaches the pipeline.
 */

import { z } from "zod";
import {
  MAPPING_QUALITIES,
  SEVERITY_LEVELS,
  SYMPTOM_CATEGORIES,
  TEMPORAL_PATTERNS,
} from "./types";

// ============================================================================
// TERM EXTRACTION
// ============================================================================

const stringList = z.array(z.string()).default([]);

export const ExtractedSymptomSchema = z.object({
  original_text: z.string().min(1),
  standardized_text: z.string().min(1),
  english_translation: z.string().min(1).nullish(),
  category: z.enum(SYMPTOM_CATEGORIES),
  severity: z.enum(SEVERITY_LEVELS),
  temporal: z.enum(TEMPORAL_PATTERNS),
  context: z.string().default(""),
  confidence: z.number().min(0).max(1),
});

export const DiagnosticInformationSchema = z.object({
  lab_values: stringList,
  imaging_findings: stringList,
  physical_examination: stringList,
  temporal_information: stringList,
  severity_indicators: stringList,
});

export const SymptomExtractionSchema = z.object({
  extracted_symptoms: z.array(ExtractedSymptomSchema),
  diagnostic_information: DiagnosticInformationSchema.optional(),
  processing_notes: z.string().default(""),
});

export type ExtractedSymptom = z.infer<typeof ExtractedSymptomSchema>;
export type SymptomExtractionResponse = z.infer<typeof SymptomExtractionSchema>;

// ============================================================================
// TERM SELECTION
// ============================================================================

/**
 * Confidence is deliberately unbounded here: an out-of-range value is a
 * distinct, logged rejection rather than a generic schema failure.
 */
export const TermSelectionSchema = z.object({
  selected_hpo_id: z.string().nullable(),
  selected_hpo_name: z.string().nullish(),
  confidence: z.number(),
  reasoning: z.string(),
  mapping_quality: z.enum(MAPPING_QUALITIES).nullish(),
});

export type TermSelectionResponse = z.infer<typeof TermSelectionSchema>;

// ============================================================================
// RESPONSE PARSING
// ============================================================================

export type StructuredParseResult<T> =
  | { success: true; data: T }
  | { success: false; reason: "invalid-json" | "schema-mismatch"; message: string };

/**
 * Strips a surrounding markdown code fence, if any.
 */
export function stripCodeFences(content: string): string {
  const trimmed = content.trim();
  if (trimmed.startsWith("```json")) {
    return trimmed.replace(/^```json\s*/, "").replace(/\s*```$/, "");
  }
  if (trimmed.startsWith("```")) {
    return trimmed.replace(/^```\s*/, "").replace(/\s*```$/, "");
  }
  return trimmed;
}

export function parseStructuredResponse<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): StructuredParseResult<T> {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(raw));
  } catch (error) {
    return {
      success: false,
      reason: "invalid-json",
      message: error instanceof Error ? error.message : String(error),
    };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return {
      success: false,
      reason: "schema-mismatch",
      message: parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; "),
    };
  }

  return { success: true, data: parsed.data };
}
