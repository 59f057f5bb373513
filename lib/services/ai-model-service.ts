/**
 * AI Model Service
 *
 * Unified interface over the two chat-completion backends: the OpenAI API via
 * the `ai` SDK, and Azure OpenAI via the `openai` client. Every request runs
 * under a timeout, is logged with token usage and cost, and structured output
 * is validated against a zod schema before it is returned.
 */

import type { z } from 'zod';
import { createOpenAI } from '@ai-sdk/openai';
import { generateText as generateTextSDK } from 'ai';
import { AzureOpenAI } from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';

import {
  AIModelConfig,
  AIModelService as IAIModelService,
  AIModelUsageStats,
  LLMRequestOptions,
} from './service-types';
import {
  ERROR_CODES,
  ErrorCode,
  PipelineError,
  ProcessingErrorSeverity,
  errorMessage,
} from '../agents/errors';
import { parseStructuredResponse } from '../agents/schemas';
import { AIUsageData, WorkflowLogger } from '../logging/logging';
import { calculateTokenCost } from '../config/ai-model-pricing';
import { LLMProviderConfig } from '../config/pipeline-config';
import { createTimeoutSignal } from '../utils/abort';

const STRUCTURED_OUTPUT_SYSTEM_PROMPT = 'Respond only with a JSON object matching the requested format.';

interface CompletionResult {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

// ============================================================================
// AI MODEL SERVICE IMPLEMENTATION
// ============================================================================

export class AIModelService implements IAIModelService {
  private readonly config: AIModelConfig;
  private requestCount = 0;
  private totalTokensUsed = 0;
  private azureClient?: AzureOpenAI;

  constructor(
    private readonly provider: LLMProviderConfig,
    config: Partial<Omit<AIModelConfig, 'provider' | 'model'>> = {},
    private readonly logger?: WorkflowLogger,
  ) {
    this.config = {
      provider: provider.provider,
      model: provider.provider === 'azure' ? provider.deployment : provider.model,
      temperature: config.temperature ?? 0.1,
      maxTokens: config.maxTokens ?? 4096,
      timeout: config.timeout ?? 60000,
    };
  }

  async generateText(prompt: string, options: LLMRequestOptions = {}): Promise<string> {
    this.requestCount++;
    const startTime = Date.now();
    const callerName = options.callerName ?? 'AIModelService.generateText';
    const timeout = createTimeoutSignal(this.config.timeout, options.signal);

    try {
      const result =
        this.provider.provider === 'azure'
          ? await this.completeWithAzure(this.provider, prompt, options.system, timeout.signal)
          : await this.completeWithOpenAI(this.provider, prompt, options.system, timeout.signal);

      const totalTokens = result.inputTokens + result.outputTokens;
      this.totalTokensUsed += totalTokens;
      this.logAiUsage(callerName, result.inputTokens, result.outputTokens, Date.now() - startTime);

      return result.text;
    } catch (error) {
      if (timeout.timedOut()) {
        throw new AIModelServiceError(
          ERROR_CODES.TIMEOUT_EXCEEDED,
          `LLM request timed out after ${this.config.timeout}ms`,
          ProcessingErrorSeverity.HIGH,
          { model: this.config.model, timeout: this.config.timeout },
          error,
        );
      }
      throw new AIModelServiceError(
        ERROR_CODES.LLM_REQUEST_FAILED,
        `LLM request failed: ${errorMessage(error)}`,
        ProcessingErrorSeverity.HIGH,
        { model: this.config.model, provider: this.config.provider, status: statusOf(error) },
        error,
      );
    } finally {
      timeout.dispose();
    }
  }

  async generateStructuredOutput<T>(
    prompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: LLMRequestOptions = {},
  ): Promise<T> {
    const content = await this.generateText(prompt, {
      ...options,
      system: options.system ?? STRUCTURED_OUTPUT_SYSTEM_PROMPT,
      callerName: options.callerName ?? 'AIModelService.generateStructuredOutput',
    });

    const parsed = parseStructuredResponse(content, schema);
    if (!parsed.success) {
      throw new AIModelServiceError(
        ERROR_CODES.LLM_RESPONSE_INVALID,
        `LLM response did not match the expected format (${parsed.reason}): ${parsed.message}`,
        ProcessingErrorSeverity.MEDIUM,
        { reason: parsed.reason, responsePreview: content.substring(0, 200) },
      );
    }
    return parsed.data;
  }

  getUsageStats(): AIModelUsageStats {
    return {
      requestCount: this.requestCount,
      totalTokensUsed: this.totalTokensUsed,
      averageTokensPerRequest: this.requestCount > 0 ? this.totalTokensUsed / this.requestCount : 0,
    };
  }

  getConfig(): AIModelConfig {
    return { ...this.config };
  }

  private async completeWithOpenAI(
    provider: Extract<LLMProviderConfig, { provider: 'openai' }>,
    prompt: string,
    system: string | undefined,
    abortSignal: AbortSignal,
  ): Promise<CompletionResult> {
    const openai = createOpenAI({ apiKey: provider.apiKey, baseURL: provider.baseUrl });

    const result = await generateTextSDK({
      model: openai(provider.model),
      system,
      prompt,
      temperature: this.config.temperature,
      maxOutputTokens: this.config.maxTokens,
      abortSignal,
    });

    return {
      text: result.text,
      inputTokens: result.usage.inputTokens ?? 0,
      outputTokens: result.usage.outputTokens ?? 0,
    };
  }

  private async completeWithAzure(
    provider: Extract<LLMProviderConfig, { provider: 'azure' }>,
    prompt: string,
    system: string | undefined,
    signal: AbortSignal,
  ): Promise<CompletionResult> {
    if (!this.azureClient) {
      this.azureClient = new AzureOpenAI({
        apiKey: provider.apiKey,
        endpoint: provider.endpoint,
        apiVersion: provider.apiVersion,
        deployment: provider.deployment,
      });
    }

    const messages: ChatCompletionMessageParam[] = system
      ? [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ]
      : [{ role: 'user', content: prompt }];

    const response = await this.azureClient.chat.completions.create(
      {
        model: provider.deployment,
        messages,
        temperature: this.config.temperature,
        max_completion_tokens: this.config.maxTokens,
      },
      { signal },
    );

    return {
      text: response.choices[0]?.message?.content ?? '',
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
    };
  }

  private logAiUsage(
    functionName: string,
    inputTokens: number,
    outputTokens: number,
    requestDuration: number,
  ): void {
    if (!this.logger) return;

    const costs = calculateTokenCost(this.config.model, inputTokens, outputTokens);
    const aiUsage: AIUsageData = {
      model: this.config.model,
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      inputCost: costs.inputCost,
      outputCost: costs.outputCost,
      totalCost: costs.totalCost,
      provider: this.config.provider,
      requestDuration,
    };

    this.logger.logAiUsage(functionName, aiUsage);
  }
}

// ============================================================================
// ERROR HANDLING
// ============================================================================

export class AIModelServiceError extends PipelineError {
  constructor(
    code: ErrorCode,
    message: string,
    severity: ProcessingErrorSeverity,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(code, message, severity, context, { cause });
    this.name = 'AIModelServiceError';
  }
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function createAIModelService(
  provider: LLMProviderConfig,
  timeout: number,
  logger?: WorkflowLogger,
): AIModelService {
  return new AIModelService(provider, { temperature: 0.1, maxTokens: 4096, timeout }, logger);
}
