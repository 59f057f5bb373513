/**
 * Agent Core
 *
 * Abstract base class for the LLM-backed pipeline agents. It provides the
 * shared plumbing: per-call context resolution, logged external calls and
 * agent metadata.
 */

import { WorkflowLogger } from "../logging/logging";
import { AIModelService } from "../services/service-types";

export const AGENT_VERSION = "1.0.0";

/**
 * Per-call context. The orchestrator passes its document logger and the
 * batch cancellation signal; standalone callers may omit both.
 */
export interface AgentContext {
  logger: WorkflowLogger;
  signal?: AbortSignal;
}

export abstract class Agent {
  abstract readonly name: string;
  abstract readonly description: string;

  protected constructor(
    protected readonly aiModel: AIModelService,
    private readonly defaultLogger?: WorkflowLogger,
  ) {}

  protected resolveContext(context?: Partial<AgentContext>): AgentContext {
    const logger = context?.logger ?? this.defaultLogger ?? new WorkflowLogger(this.name);
    return { logger, signal: context?.signal };
  }

  /**
   * Wraps an external call with request/response logging. Errors are logged
   * and re-thrown for the agent to classify.
   */
  protected async loggedApiCall<T>(
    context: AgentContext,
    serviceName: string,
    methodName: string,
    apiCall: () => Promise<T>,
    input?: Record<string, unknown>,
  ): Promise<T> {
    const { logger } = context;
    const startTime = Date.now();
    const callId = logger.logApiCall(serviceName, methodName, input, startTime);

    try {
      const response = await apiCall();
      logger.logApiResponse(callId, serviceName, methodName, response, null, Date.now() - startTime);
      return response;
    } catch (error) {
      logger.logApiResponse(callId, serviceName, methodName, null, error, Date.now() - startTime);
      throw error;
    }
  }

  getAgentInfo(): { name: string; description: string; version: string; model: string } {
    return {
      name: this.name,
      description: this.description,
      version: AGENT_VERSION,
      model: this.aiModel.getConfig().model,
    };
  }
}
