/**
 * Prompt template for the Term Selection Agent.
 */

import { ClinicalTerm, OntologyCandidate } from "../types";

export const TERM_SELECTION_SYSTEM_PROMPT =
  "You are a medical expert making final decisions on HPO term mapping. " +
  "You select the BEST HPO term from retrieved candidates based on clinical accuracy. " +
  "Respond only with the JSON object described in the request: no markdown, no code fences, no extra text.";

/**
 * Candidates are rendered as the JSON list the model sees, in retrieval order.
 */
export function formatCandidates(candidates: readonly OntologyCandidate[]): string {
  return JSON.stringify(
    candidates.map((candidate) => ({
      hpo_id: candidate.termId,
      hpo_name: candidate.termLabel,
      description: candidate.description,
      similarity_score: Number(candidate.similarityScore.toFixed(4)),
    })),
    null,
    2,
  );
}

export const termSelectionPrompt = (
  term: ClinicalTerm,
  candidates: readonly OntologyCandidate[],
  confidenceThreshold: number,
): string => {
  const translation = term.translatedText ? `\n- English Translation: ${term.translatedText}` : "";

  return `Select the BEST HPO term for the clinical description:

**Clinical Term:**
- Original Text: ${term.originalText}
- Standardized Term: ${term.standardizedText}${translation}
- Category: ${term.category}
- Severity: ${term.severity}
- Temporal: ${term.temporal}
- Context: ${term.context || "none"}

**Retrieved HPO Candidates (from vector search):**
${formatCandidates(candidates)}

**Selection Criteria:**
1. Semantic and clinical accuracy - the HPO term must match the clinical meaning
2. Appropriate level of specificity - not too general, not too specific
3. Medical appropriateness - clinically valid mapping
4. Confidence threshold: ${confidenceThreshold} - only select if confidence >= ${confidenceThreshold}

Select the most appropriate HPO term. "selected_hpo_id" must be one of the candidate ids listed above.

Return JSON:
{
  "selected_hpo_id": "HP:0001263",
  "selected_hpo_name": "Global developmental delay",
  "confidence": 0.90,
  "reasoning": "Why this term matches the clinical meaning",
  "mapping_quality": "excellent | good | fair | poor"
}

If no term meets the confidence threshold: {"selected_hpo_id": null, "confidence": 0.0, "reasoning": "why no candidate fits"}`;
};
