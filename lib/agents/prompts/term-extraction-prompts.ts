/**
 * Prompt templates for the Term Extraction Agent.
 *
 * Both variants ask for every distinguishable symptom with a self-reported
 * confidence and return the same JSON shape; the Chinese variant also asks
 * for an English translation, which becomes the retrieval query.
 */

import { InputLanguage } from "../types";

export const TERM_EXTRACTION_SYSTEM_PROMPT =
  "You are a medical expert specializing in clinical phenotype descriptions. " +
  "You analyze clinical text and extract symptoms with high accuracy. " +
  "Respond only with the JSON object described in the request: no markdown, no code fences, no extra text.";

const OUTPUT_SHAPE = `{
  "extracted_symptoms": [
    {
      "original_text": "exact phrase from the clinical text",
      "standardized_text": "standard medical term",
      "english_translation": "precise English medical term, or null for English input",
      "category": "neurological | cardiovascular | respiratory | digestive | musculoskeletal | dermatological | constitutional | other",
      "severity": "mild | moderate | severe | unknown",
      "temporal": "acute | chronic | recurrent | unknown",
      "context": "additional context (body site, onset, triggers), or an empty string",
      "confidence": 0.95
    }
  ],
  "diagnostic_information": {
    "lab_values": [],
    "imaging_findings": [],
    "physical_examination": [],
    "temporal_information": [],
    "severity_indicators": []
  },
  "processing_notes": "anything uncertain or ambiguous about the text"
}`;

export const englishTermExtractionPrompt = (clinicalText: string): string => {
  return `Analyze the following English clinical text and perform these tasks:

1. **Symptom identification**: Extract ALL symptom descriptions, clinical signs, and phenotypic observations. Split compound phrases into separate symptoms.
2. **Standardization**: Convert each symptom to standard English medical terminology.
3. **Categorization**: Assign each symptom exactly one clinical category.
4. **Diagnostic information**: Preserve lab values, imaging findings, physical examination findings, temporal information and severity indicators.
5. **Confidence**: Give each symptom a confidence between 0.0 and 1.0. Include uncertain symptoms with a lower confidence rather than leaving them out.

English Clinical Text:
${clinicalText}

Return this JSON object only:
${OUTPUT_SHAPE}

For English input set "english_translation" to null.
Focus on medical accuracy and completeness.`;
};

export const chineseTermExtractionPrompt = (clinicalText: string): string => {
  return `Analyze the following Chinese clinical text and perform these tasks:

1. **症状识别**: Extract ALL symptom descriptions, clinical signs, and phenotypic observations. Split compound phrases into separate symptoms.
2. **标准化**: Convert each symptom to standard medical terminology in Chinese.
3. **分类整理**: Assign each symptom exactly one clinical category.
4. **重要信息保留**: Preserve diagnostic information (lab values, imaging, physical examination, temporal info, severity indicators).
5. **英文翻译**: Translate each symptom to precise English medical terminology in "english_translation".

Chinese Clinical Text:
${clinicalText}

Return this JSON object only:
${OUTPUT_SHAPE}

"original_text" and "standardized_text" stay in Chinese; "english_translation" is required.
Focus on medical accuracy and completeness. If uncertain about a translation, indicate lower confidence.`;
};

export const termExtractionPrompt = (clinicalText: string, language: InputLanguage): string =>
  language === "zh" ? chineseTermExtractionPrompt(clinicalText) : englishTermExtractionPrompt(clinicalText);
