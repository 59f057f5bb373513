/**
 * Embedding Service
 *
 * Turns text into vectors for the ontology index. Two backends: the Voyage AI
 * REST API (the model the bundled index is built with) and the OpenAI
 * embeddings endpoint.
 */

import { z } from 'zod';
import OpenAI from 'openai';

import {
  EmbeddingRequestOptions,
  EmbeddingService,
} from './service-types';
import {
  ERROR_CODES,
  PipelineError,
  ProcessingErrorSeverity,
  errorMessage,
} from '../agents/errors';
import { EmbeddingProviderConfig } from '../config/pipeline-config';
import { WorkflowLogger } from '../logging/logging';
import { createTimeoutSignal } from '../utils/abort';

const VOYAGE_EMBEDDINGS_URL = 'https://api.voyageai.com/v1/embeddings';

const VoyageResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
  model: z.string().optional(),
  usage: z.object({ total_tokens: z.number() }).optional(),
});

export class EmbeddingServiceError extends PipelineError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    const timedOut = context?.timedOut === true;
    super(
      timedOut ? ERROR_CODES.TIMEOUT_EXCEEDED : ERROR_CODES.EMBEDDING_REQUEST_FAILED,
      message,
      ProcessingErrorSeverity.MEDIUM,
      context,
      { cause },
    );
    this.name = 'EmbeddingServiceError';
  }
}

abstract class BaseEmbeddingService implements EmbeddingService {
  abstract readonly provider: string;
  abstract readonly model: string;

  constructor(
    protected readonly timeoutMs: number,
    protected readonly logger?: WorkflowLogger,
  ) {}

  protected abstract requestEmbeddings(
    texts: string[],
    options: EmbeddingRequestOptions & { signal: AbortSignal },
  ): Promise<number[][]>;

  async embed(texts: string[], options: EmbeddingRequestOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const startTime = Date.now();
    const callId = this.logger?.logApiCall(this.provider, 'embed', { count: texts.length, model: this.model }, startTime);
    const timeout = createTimeoutSignal(this.timeoutMs, options.signal);

    try {
      const vectors = await this.requestEmbeddings(texts, { ...options, signal: timeout.signal });
      if (vectors.length !== texts.length) {
        throw new EmbeddingServiceError(
          `Expected ${texts.length} embeddings, received ${vectors.length}`,
          { provider: this.provider, model: this.model },
        );
      }
      if (callId) {
        this.logger?.logApiResponse(callId, this.provider, 'embed', { count: vectors.length }, null, Date.now() - startTime);
      }
      return vectors;
    } catch (error) {
      if (callId) {
        this.logger?.logApiResponse(callId, this.provider, 'embed', null, error, Date.now() - startTime);
      }
      if (error instanceof EmbeddingServiceError) {
        throw error;
      }
      const timedOut = timeout.timedOut();
      throw new EmbeddingServiceError(
        timedOut
          ? `Embedding request timed out after ${this.timeoutMs}ms`
          : `Embedding request failed: ${errorMessage(error)}`,
        { provider: this.provider, model: this.model, timedOut },
        error,
      );
    } finally {
      timeout.dispose();
    }
  }

  async embedQuery(text: string, options: Omit<EmbeddingRequestOptions, 'inputType'> = {}): Promise<number[]> {
    const [vector] = await this.embed([text], { ...options, inputType: 'query' });
    if (!vector) {
      throw new EmbeddingServiceError('Embedding response was empty', { provider: this.provider });
    }
    return vector;
  }
}

export class VoyageEmbeddingService extends BaseEmbeddingService {
  readonly provider = 'voyage';

  constructor(
    private readonly apiKey: string,
    readonly model: string,
    timeoutMs: number,
    logger?: WorkflowLogger,
  ) {
    super(timeoutMs, logger);
  }

  protected async requestEmbeddings(
    texts: string[],
    options: EmbeddingRequestOptions & { signal: AbortSignal },
  ): Promise<number[][]> {
    const response = await fetch(VOYAGE_EMBEDDINGS_URL, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        input: texts,
        model: this.model,
        input_type: options.inputType ?? 'query',
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      throw new EmbeddingServiceError(`Voyage request failed: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    const parsed = VoyageResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new EmbeddingServiceError('Voyage response did not match the expected format', {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}

export class OpenAIEmbeddingService extends BaseEmbeddingService {
  readonly provider = 'openai';
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    readonly model: string,
    timeoutMs: number,
    logger?: WorkflowLogger,
    baseUrl?: string,
  ) {
    super(timeoutMs, logger);
    this.client = new OpenAI({ apiKey, baseURL: baseUrl });
  }

  protected async requestEmbeddings(
    texts: string[],
    options: EmbeddingRequestOptions & { signal: AbortSignal },
  ): Promise<number[][]> {
    const response = await this.client.embeddings.create(
      { model: this.model, input: texts },
      { signal: options.signal },
    );

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}

export function createEmbeddingService(
  config: EmbeddingProviderConfig,
  timeoutMs: number,
  logger?: WorkflowLogger,
): EmbeddingService {
  switch (config.provider) {
    case 'voyage':
      return new VoyageEmbeddingService(config.apiKey, config.model, timeoutMs, logger);
    case 'openai':
      return new OpenAIEmbeddingService(config.apiKey, config.model, timeoutMs, logger, config.baseUrl);
  }
}
