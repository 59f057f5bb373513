/**
 * Term Selection Agent
 *
 * Re-ranks retrieved ontology candidates for one clinical term with a single
 * LLM call and applies the confidence gate. The agent holds no per-call
 * state: the same term, candidates and model response always produce the
 * same decision.
 */

import { Agent, AgentContext } from "./agent-core";
import { SelectionError, errorMessage, isPipelineError } from "./errors";
import { TERM_SELECTION_SYSTEM_PROMPT, termSelectionPrompt } from "./prompts/term-selection-prompts";
import { TermSelectionResponse, TermSelectionSchema } from "./schemas";
import { ClinicalTerm, OntologyCandidate, OntologyMapping, SelectionDecision } from "./types";
import { normalizeTermId } from "../services/ontology-index";
import { AIModelService } from "../services/service-types";
import { WorkflowLogger } from "../logging/logging";

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.7;

export class TermSelectionAgent extends Agent {
  readonly name = "term_selection_agent";
  readonly description = "Selects the best HPO term for a clinical term from retrieved candidates";

  constructor(aiModel: AIModelService, logger?: WorkflowLogger) {
    super(aiModel, logger);
  }

  /**
   * Returns the accepted mapping, or null when nothing was accepted.
   */
  async select(
    term: ClinicalTerm,
    candidates: readonly OntologyCandidate[],
    threshold: number = DEFAULT_CONFIDENCE_THRESHOLD,
    context?: Partial<AgentContext>,
  ): Promise<OntologyMapping | null> {
    const decision = await this.selectDetailed(term, candidates, threshold, context);
    return decision.kind === "selected" ? decision.mapping : null;
  }

  async selectDetailed(
    term: ClinicalTerm,
    candidates: readonly OntologyCandidate[],
    threshold: number = DEFAULT_CONFIDENCE_THRESHOLD,
    context?: Partial<AgentContext>,
  ): Promise<SelectionDecision> {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      throw new RangeError(`Confidence threshold must be within [0, 1], got ${threshold}`);
    }

    const ctx = this.resolveContext(context);
    const { logger } = ctx;
    const fn = `${this.name}.select`;

    if (candidates.length === 0) {
      logger.logDebug(fn, "No candidates, skipping selection", { term: term.standardizedText });
      return { kind: "no-candidates" };
    }

    let response: TermSelectionResponse;
    try {
      response = await this.loggedApiCall(
        ctx,
        "aiModel",
        "generateStructuredOutput",
        () =>
          this.aiModel.generateStructuredOutput(termSelectionPrompt(term, candidates, threshold), TermSelectionSchema, {
            system: TERM_SELECTION_SYSTEM_PROMPT,
            signal: ctx.signal,
            callerName: fn,
          }),
        { term: term.standardizedText, candidateCount: candidates.length },
      );
    } catch (error) {
      const selectionError = new SelectionError(
        `Term selection failed: ${errorMessage(error)}`,
        { term: term.standardizedText, cause: isPipelineError(error) ? error.code : undefined },
        error,
      );
      logger.logWarn(fn, selectionError.message, {
        code: selectionError.code,
        causeCode: selectionError.context?.cause,
      });
      return { kind: "invalid-response", reason: selectionError.message };
    }

    return this.decide(term, candidates, threshold, response, ctx);
  }

  private decide(
    term: ClinicalTerm,
    candidates: readonly OntologyCandidate[],
    threshold: number,
    response: TermSelectionResponse,
    context: AgentContext,
  ): SelectionDecision {
    const { logger } = context;
    const fn = `${this.name}.select`;
    const { confidence, reasoning } = response;

    if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
      const reason = `Selection confidence ${confidence} is outside [0, 1]`;
      logger.logWarn(fn, reason, { term: term.standardizedText, selectedId: response.selected_hpo_id });
      return { kind: "invalid-response", reason };
    }

    if (response.selected_hpo_id === null) {
      logger.logInfo(fn, "No suitable candidate", { term: term.standardizedText, reasoning });
      return { kind: "declined", reasoning };
    }

    const selectedId = normalizeTermId(response.selected_hpo_id);
    const candidate = candidates.find((c) => c.termId === selectedId);
    if (!candidate) {
      const reason = `Selected id ${selectedId} is not among the retrieved candidates`;
      logger.logWarn(fn, reason, {
        term: term.standardizedText,
        candidateIds: candidates.map((c) => c.termId),
      });
      return { kind: "invalid-response", reason };
    }

    if (confidence < threshold) {
      logger.logInfo(fn, "Selection below confidence threshold", {
        term: term.standardizedText,
        selectedId,
        confidence,
        threshold,
      });
      return { kind: "below-threshold", confidence, threshold, reasoning };
    }

    const mapping: OntologyMapping = {
      sourceTerm: term,
      selectedTermId: candidate.termId,
      selectedTermLabel: candidate.termLabel,
      confidence,
      reasoning,
      mappingQuality: response.mapping_quality ?? undefined,
    };

    logger.logInfo(fn, "Term mapped", {
      term: term.standardizedText,
      selectedId: mapping.selectedTermId,
      selectedLabel: mapping.selectedTermLabel,
      confidence,
      mappingQuality: mapping.mappingQuality,
    });

    return { kind: "selected", mapping };
  }
}
