/**
 * MCP tool surface.
 *
 * Handlers are plain functions over injected collaborators; the stdio server
 * only routes requests to them. Tool results are JSON text payloads. An empty
 * lookup and a failed one are both reported in-band as `{ error }`, with
 * different messages.
 */

import { z } from "zod";

import { DocumentResult } from "../agents/types";
import { errorMessage } from "../agents/errors";
import { SINGLE_SYMPTOM_K } from "../services/candidate-retriever";
import { WorkflowLogger } from "../logging/logging";
import { CandidateSource, TransformOptions } from "../workflow/workflow-orchestrator";
import {
  SEARCH_TOOL_NAME,
  WorkflowDescriptor,
  getChinesePhenotypeWorkflow,
  getEnglishPhenotypeWorkflow,
} from "../workflow/workflow-descriptors";

export const TOOL_NAMES = {
  SEARCH: SEARCH_TOOL_NAME,
  ENGLISH_WORKFLOW: "english_phenotype_analysis_workflow",
  CHINESE_WORKFLOW: "chinese_phenotype_analysis_workflow",
  MAP_TEXT: "map_clinical_text",
} as const;

export interface ToolContext {
  retriever: CandidateSource;
  transform(text: string, options?: TransformOptions): Promise<DocumentResult>;
  logger: WorkflowLogger;
}

export type ToolTextResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

// ============================================================================
// ARGUMENT SCHEMAS
// ============================================================================

const SearchArgsSchema = z.object({
  english_symptom: z.string().trim().min(1),
  k: z.number().int().positive().max(50).default(SINGLE_SYMPTOM_K),
});

const MapTextArgsSchema = z.object({
  text: z.string(),
  threshold: z.number().min(0).max(1).optional(),
});

const NoArgsSchema = z.object({}).passthrough();

export const TOOL_DEFINITIONS = [
  {
    name: TOOL_NAMES.SEARCH,
    description:
      "Search HPO terms for a single English symptom or medical term. Returns the top K candidates with similarity scores.",
    inputSchema: {
      type: "object" as const,
      properties: {
        english_symptom: { type: "string", description: "Single English symptom or medical term" },
        k: { type: "number", description: "Number of candidates to return", default: SINGLE_SYMPTOM_K },
      },
      required: ["english_symptom"],
    },
  },
  {
    name: TOOL_NAMES.ENGLISH_WORKFLOW,
    description:
      "Get step-by-step instructions for mapping English clinical text to HPO terms. Complete the workflow as a whole.",
    inputSchema: { type: "object" as const, properties: {} },
  },
  {
    name: TOOL_NAMES.CHINESE_WORKFLOW,
    description:
      "Get step-by-step instructions for mapping Chinese clinical text to HPO terms. Complete the workflow as a whole.",
    inputSchema: { type: "object" as const, properties: {} },
  },
  {
    name: TOOL_NAMES.MAP_TEXT,
    description: "Run the full extraction, retrieval and selection pipeline on clinical text and return the mapping result.",
    inputSchema: {
      type: "object" as const,
      properties: {
        text: { type: "string", description: "English or Chinese clinical text" },
        threshold: { type: "number", description: "Minimum confidence for an accepted mapping (0-1)" },
      },
      required: ["text"],
    },
  },
];

// ============================================================================
// HANDLERS
// ============================================================================

export interface SymptomSearchCandidate {
  hpo_id: string;
  hpo_name: string;
  description: string;
  similarity_score: number;
}

export type SymptomSearchResult =
  | { symptom: string; candidates: SymptomSearchCandidate[]; total_found: number }
  | { error: string };

export async function searchHpoForSymptom(
  context: ToolContext,
  englishSymptom: string,
  k: number = SINGLE_SYMPTOM_K,
): Promise<SymptomSearchResult> {
  try {
    const candidates = await context.retriever.retrieve(englishSymptom, k, {
      logger: context.logger,
      throwOnError: true,
    });
    if (candidates.length === 0) {
      return { error: `No HPO candidates found for symptom: ${englishSymptom}` };
    }

    return {
      symptom: englishSymptom,
      candidates: candidates.map((candidate) => ({
        hpo_id: candidate.termId,
        hpo_name: candidate.termLabel,
        description: candidate.description,
        similarity_score: candidate.similarityScore,
      })),
      total_found: candidates.length,
    };
  } catch (error) {
    context.logger.logError("searchHpoForSymptom", "Symptom search failed", { englishSymptom, error: errorMessage(error) });
    return { error: `Failed to search HPO terms for symptom '${englishSymptom}': ${errorMessage(error)}` };
  }
}

export function englishPhenotypeAnalysisWorkflow(): WorkflowDescriptor {
  return getEnglishPhenotypeWorkflow();
}

export function chinesePhenotypeAnalysisWorkflow(): WorkflowDescriptor {
  return getChinesePhenotypeWorkflow();
}

export async function mapClinicalText(context: ToolContext, text: string, threshold?: number): Promise<DocumentResult> {
  return context.transform(text, { confidenceThreshold: threshold });
}

// ============================================================================
// DISPATCH
// ============================================================================

function jsonResult(payload: unknown, isError = false): ToolTextResult {
  const result: ToolTextResult = { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
  if (isError) {
    result.isError = true;
  }
  return result;
}

function invalidArguments(name: string, error: z.ZodError): ToolTextResult {
  const issues = error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
  return jsonResult({ error: `Invalid arguments for ${name}: ${issues}` }, true);
}

export async function handleToolCall(context: ToolContext, name: string, args: unknown): Promise<ToolTextResult> {
  context.logger.logInfo("handleToolCall", `Tool called: ${name}`);

  switch (name) {
    case TOOL_NAMES.SEARCH: {
      const parsed = SearchArgsSchema.safeParse(args ?? {});
      if (!parsed.success) {
        return invalidArguments(name, parsed.error);
      }
      const result = await searchHpoForSymptom(context, parsed.data.english_symptom, parsed.data.k);
      return jsonResult(result, "error" in result);
    }
    case TOOL_NAMES.ENGLISH_WORKFLOW:
    case TOOL_NAMES.CHINESE_WORKFLOW: {
      const parsed = NoArgsSchema.safeParse(args ?? {});
      if (!parsed.success) {
        return invalidArguments(name, parsed.error);
      }
      return jsonResult(
        name === TOOL_NAMES.ENGLISH_WORKFLOW ? englishPhenotypeAnalysisWorkflow() : chinesePhenotypeAnalysisWorkflow(),
      );
    }
    case TOOL_NAMES.MAP_TEXT: {
      const parsed = MapTextArgsSchema.safeParse(args ?? {});
      if (!parsed.success) {
        return invalidArguments(name, parsed.error);
      }
      const result = await mapClinicalText(context, parsed.data.text, parsed.data.threshold);
      return jsonResult(result, result.state === "FAILED");
    }
    default:
      return jsonResult({ error: `Unknown tool: ${name}` }, true);
  }
}
