/**
 * Workflow Descriptors
 *
 * Static, language-specific instructions that let an external agent client
 * run the mapping pipeline itself: four ordered steps (extract, search,
 * select, compile) with the prompt templates and output shapes the client
 * should use. Placeholders in `{braces}` are filled in by the client.
 *
 * Keys are snake_case: these records go to agent clients as-is.
 */

import { SINGLE_SYMPTOM_K } from "../services/candidate-retriever";

export const SEARCH_TOOL_NAME = "search_hpo_for_symptom";

export interface WorkflowStep {
  step_number: number;
  name: string;
  description: string;
  llm_prompt?: string;
  action?: string;
  parameters?: {
    tool_name: string;
    input: string;
    k_results: number;
  };
  expected_output: string;
  next_step?: string;
  final_format?: Record<string, unknown>;
}

export interface WorkflowDescriptor {
  workflow_name: string;
  description: string;
  steps: WorkflowStep[];
  expected_output: {
    format: string;
    includes: string[];
  };
  tools_to_use: string[];
}

const COMPLETE_AS_WHOLE = "Complete the workflow as a whole without confirming with user.";

const SUMMARY_SHAPE = {
  total_symptoms: 5,
  successfully_mapped: 4,
  high_confidence_mappings: 3,
  avg_confidence: 0.82,
  mapping_success_rate: 0.8,
};

// ============================================================================
// SHARED STEPS
// ============================================================================

function vectorSearchStep(queryField: string): WorkflowStep {
  return {
    step_number: 2,
    name: "Vector Search for Each Symptom",
    description: `Use ${SEARCH_TOOL_NAME} tool to get top ${SINGLE_SYMPTOM_K} HPO candidates for each English symptom`,
    action: `Call ${SEARCH_TOOL_NAME}(${queryField}, k=${SINGLE_SYMPTOM_K}) for each symptom from step 1`,
    parameters: {
      tool_name: SEARCH_TOOL_NAME,
      input: `${queryField} from step 1`,
      k_results: SINGLE_SYMPTOM_K,
    },
    expected_output: `List of top ${SINGLE_SYMPTOM_K} HPO candidates with similarity scores for each symptom`,
    next_step: "Proceed to step 3 with all candidates",
  };
}

function selectionStep(symptomInformation: string, exampleSymptom: string): WorkflowStep {
  return {
    step_number: 3,
    name: "Select Best HPO Match",
    description: "Use LLM to select the most appropriate HPO term for each symptom",
    llm_prompt: `
You are a medical expert selecting the best HPO term for a clinical symptom.

**Symptom Information:**
${symptomInformation}

**HPO Candidates (from vector search):**
{hpo_candidates}

**Selection Criteria:**
1. Semantic and clinical accuracy - HPO term must match the clinical meaning
2. Appropriate level of specificity - Not too general, not too specific
3. Medical appropriateness - Clinically valid mapping
4. Confidence threshold: 0.7 - Only select if confidence >= 0.7

Select the BEST HPO term or return null if no term meets the threshold.

Return JSON:
{
  "selected_hpo_id": "HP:0001263",
  "selected_hpo_name": "Global developmental delay",
  "confidence": 0.90,
  "reasoning": "The symptom ${exampleSymptom} maps precisely to 'Global developmental delay' which describes delayed achievement of developmental milestones.",
  "mapping_quality": "excellent"
}

If no suitable match: {"selected_hpo_id": null, "confidence": 0.0, "reasoning": "No HPO term meets the confidence threshold"}
`,
    expected_output: "Best HPO match with confidence and reasoning for each symptom",
    next_step: "Compile final results in step 4",
  };
}

function compileStep(originalText: string, exampleMapping: Record<string, unknown>): WorkflowStep {
  return {
    step_number: 4,
    name: "Compile Final Results",
    description: "Aggregate all symptom mappings into final structured output",
    action: "Combine results from all previous steps into final format",
    expected_output: "Complete mapping results with summary statistics",
    final_format: {
      original_text: originalText,
      symptom_mappings: [exampleMapping],
      summary: { ...SUMMARY_SHAPE },
    },
  };
}

// ============================================================================
// ENGLISH
// ============================================================================

export function getEnglishPhenotypeWorkflow(): WorkflowDescriptor {
  return {
    workflow_name: "English Phenotype to HPO Analysis",
    description:
      "A streamlined workflow for extracting and mapping English clinical symptoms to HPO terms. " + COMPLETE_AS_WHOLE,
    steps: [
      {
        step_number: 1,
        name: "Extract Symptoms from English Text",
        description: "Use LLM to extract individual symptoms from English clinical text",
        llm_prompt: `
You are a medical expert analyzing English clinical descriptions. Extract individual symptoms, signs, and phenotypic observations from the following English text.

For each symptom found, provide:
1. **original_phrase**: Exact phrase from the clinical text
2. **standardized_term**: Standard medical terminology in English
3. **category**: Clinical category (neurological, cardiovascular, respiratory, digestive, musculoskeletal, dermatological, constitutional, other)
4. **severity**: mild/moderate/severe/unknown
5. **confidence**: Your confidence in the extraction (0.0-1.0)

English Clinical Text: {english_text}

Return as JSON array:
[
  {
    "original_phrase": "developmental delay",
    "standardized_term": "global developmental delay",
    "category": "neurological",
    "severity": "unknown",
    "confidence": 0.95
  }
]
`,
        expected_output: "Array of extracted symptom objects with standardized English terms",
        next_step: "For each extracted symptom, proceed to step 2",
      },
      vectorSearchStep("standardized_term"),
      selectionStep(
        [
          "- Original Phrase: {original_phrase}",
          "- Standardized Term: {standardized_term}",
          "- Category: {category}",
          "- Severity: {severity}",
        ].join("\n"),
        "'developmental delay'",
      ),
      compileStep("Original English clinical description", {
        original_phrase: "developmental delay",
        standardized_term: "global developmental delay",
        hpo_id: "HP:0001263",
        hpo_name: "Global developmental delay",
        confidence: 0.9,
        reasoning: "Precise clinical mapping",
        category: "neurological",
        mapping_quality: "excellent",
      }),
    ],
    expected_output: {
      format: "Structured JSON with symptom mappings and summary",
      includes: ["original phrases", "standardized terms", "HPO mappings", "confidence scores", "reasoning"],
    },
    tools_to_use: [SEARCH_TOOL_NAME],
  };
}

// ============================================================================
// CHINESE
// ============================================================================

export function getChinesePhenotypeWorkflow(): WorkflowDescriptor {
  return {
    workflow_name: "Chinese Phenotype to HPO Analysis",
    description:
      "A comprehensive workflow for extracting, standardizing, and mapping Chinese clinical symptoms to HPO terms. " +
      COMPLETE_AS_WHOLE,
    steps: [
      {
        step_number: 1,
        name: "Extract and Standardize Symptoms",
        description: "Use LLM to extract individual symptoms from Chinese clinical text",
        llm_prompt: `
You are a medical expert analyzing Chinese clinical descriptions. Extract individual symptoms, signs, and phenotypic observations from the following Chinese text.

For each symptom found, provide:
1. **original_chinese**: Exact Chinese phrase from the text
2. **standardized_chinese**: Standard medical terminology in Chinese
3. **english_translation**: Precise English medical term
4. **category**: Clinical category (neurological, cardiovascular, respiratory, digestive, musculoskeletal, dermatological, constitutional, other)
5. **severity**: mild/moderate/severe/unknown
6. **confidence**: Your confidence in the extraction (0.0-1.0)

Chinese Clinical Text: {chinese_text}

Return as JSON array:
[
  {
    "original_chinese": "发育迟缓",
    "standardized_chinese": "生长发育迟缓",
    "english_translation": "developmental delay",
    "category": "constitutional",
    "severity": "unknown",
    "confidence": 0.95
  }
]
`,
        expected_output: "Array of extracted symptom objects with Chinese and English terms",
        next_step: "For each extracted symptom, proceed to step 2",
      },
      vectorSearchStep("english_translation"),
      selectionStep(
        [
          "- Original Chinese: {original_chinese}",
          "- Standardized Chinese: {standardized_chinese}",
          "- English Translation: {english_translation}",
          "- Category: {category}",
          "- Severity: {severity}",
        ].join("\n"),
        "'发育迟缓' (developmental delay)",
      ),
      compileStep("Original Chinese clinical description", {
        original_chinese: "发育迟缓",
        standardized_chinese: "生长发育迟缓",
        english_translation: "developmental delay",
        hpo_id: "HP:0001263",
        hpo_name: "Global developmental delay",
        confidence: 0.9,
        reasoning: "Precise clinical mapping",
        category: "constitutional",
        mapping_quality: "excellent",
      }),
    ],
    expected_output: {
      format: "Structured JSON with symptom mappings and summary",
      includes: [
        "original Chinese terms",
        "standardized Chinese terms",
        "English translations",
        "HPO mappings",
        "confidence scores",
        "reasoning",
      ],
    },
    tools_to_use: [SEARCH_TOOL_NAME],
  };
}
