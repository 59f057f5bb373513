import { ERROR_CODES } from '../lib/agents/errors';
import { TermSelectionSchema } from '../lib/agents/schemas';
import { AIModelService, createAIModelService } from '../lib/services/ai-model-service';
import { quietLogger } from './helpers/fakes';

const mockAzureCreate = jest.fn();

jest.mock('ai', () => ({ generateText: jest.fn() }));
jest.mock('@ai-sdk/openai', () => ({
  createOpenAI: jest.fn(() => (modelId: string) => ({ modelId })),
}));
jest.mock('openai', () => ({
  AzureOpenAI: jest.fn().mockImplementation(() => ({ chat: { completions: { create: mockAzureCreate } } })),
}));

const { generateText } = jest.requireMock<{ generateText: jest.Mock }>('ai');
const { createOpenAI } = jest.requireMock<{ createOpenAI: jest.Mock }>('@ai-sdk/openai');

const OPENAI_PROVIDER = { provider: 'openai', apiKey: 'test-secret', model: 'gpt-4o' } as const;

function sdkReply(text: string, inputTokens = 10, outputTokens = 5) {
  return { text, usage: { inputTokens, outputTokens } };
}

describe('AIModelService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('sends the prompt through the ai SDK', async () => {
    generateText.mockResolvedValueOnce(sdkReply('hello'));
    const service = new AIModelService(OPENAI_PROVIDER, { timeout: 1000 });

    await expect(service.generateText('hi', { system: 'be brief' })).resolves.toBe('hello');

    expect(createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret', baseURL: undefined });
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        model: { modelId: 'gpt-4o' },
        system: 'be brief',
        prompt: 'hi',
        temperature: 0.1,
        maxOutputTokens: 4096,
      }),
    );
  });

  it('parses fenced structured output against the schema', async () => {
    generateText.mockResolvedValueOnce(
      sdkReply('```json\n{"selected_hpo_id": "HP:0001250", "confidence": 0.8, "reasoning": "exact"}\n```'),
    );
    const service = new AIModelService(OPENAI_PROVIDER);

    const parsed = await service.generateStructuredOutput('pick one', TermSelectionSchema);

    expect(parsed).toEqual({ selected_hpo_id: 'HP:0001250', confidence: 0.8, reasoning: 'exact' });
    expect(generateText).toHaveBeenCalledWith(
      expect.objectContaining({ system: 'Respond only with a JSON object matching the requested format.' }),
    );
  });

  it('rejects output that is not JSON', async () => {
    generateText.mockResolvedValueOnce(sdkReply('I think it is a seizure.'));
    const service = new AIModelService(OPENAI_PROVIDER);

    const failure = service.generateStructuredOutput('pick one', TermSelectionSchema);

    await expect(failure).rejects.toMatchObject({ code: ERROR_CODES.LLM_RESPONSE_INVALID });
    await expect(failure).rejects.toThrow(/^LLM response did not match the expected format \(invalid-json\)/);
  });

  it('rejects JSON that does not match the schema', async () => {
    generateText.mockResolvedValueOnce(sdkReply('{"selected_hpo_id": 7}'));
    const service = new AIModelService(OPENAI_PROVIDER);

    await expect(service.generateStructuredOutput('pick one', TermSelectionSchema)).rejects.toThrow(
      /\(schema-mismatch\)/,
    );
  });

  it('wraps SDK failures', async () => {
    generateText.mockRejectedValueOnce(Object.assign(new Error('rate limited'), { status: 429 }));
    const service = new AIModelService(OPENAI_PROVIDER);

    await expect(service.generateText('hi')).rejects.toMatchObject({
      name: 'AIModelServiceError',
      code: ERROR_CODES.LLM_REQUEST_FAILED,
      message: 'LLM request failed: rate limited',
      context: { model: 'gpt-4o', provider: 'openai', status: 429 },
    });
  });

  it('times out slow requests', async () => {
    generateText.mockImplementationOnce(
      ({ abortSignal }: { abortSignal: AbortSignal }) =>
        new Promise((_resolve, reject) => {
          abortSignal.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );
    const service = new AIModelService(OPENAI_PROVIDER, { timeout: 20 });

    await expect(service.generateText('hi')).rejects.toMatchObject({
      code: ERROR_CODES.TIMEOUT_EXCEEDED,
      message: 'LLM request timed out after 20ms',
    });
  });

  it('tracks token usage and logs cost', async () => {
    generateText.mockResolvedValueOnce(sdkReply('a', 1000, 500)).mockResolvedValueOnce(sdkReply('b', 0, 0));
    const logger = quietLogger('usage-test');
    const service = createAIModelService(OPENAI_PROVIDER, 1000, logger);

    await service.generateText('one');
    await service.generateText('two');

    expect(service.getUsageStats()).toEqual({
      requestCount: 2,
      totalTokensUsed: 1500,
      averageTokensPerRequest: 750,
    });
    expect(logger.generateExecutionSummary().totalAiCost).toBeCloseTo(0.0075, 6);
  });

  it('uses the Azure client for Azure deployments', async () => {
    mockAzureCreate.mockResolvedValueOnce({
      choices: [{ message: { content: '{"ok": true}' } }],
      usage: { prompt_tokens: 7, completion_tokens: 3 },
    });
    const service = new AIModelService({
      provider: 'azure',
      apiKey: 'test-secret',
      endpoint: 'https://example.openai.azure.com',
      deployment: 'mapping-gpt4o',
      apiVersion: '2025-01-01-preview',
    });

    await expect(service.generateText('hi')).resolves.toBe('{"ok": true}');

    expect(service.getConfig()).toMatchObject({ provider: 'azure', model: 'mapping-gpt4o' });
    expect(mockAzureCreate).toHaveBeenCalledWith(
      {
        model: 'mapping-gpt4o',
        messages: [{ role: 'user', content: 'hi' }],
        temperature: 0.1,
        max_completion_tokens: 4096,
      },
      { signal: expect.any(AbortSignal) },
    );
    expect(generateText).not.toHaveBeenCalled();
    expect(service.getUsageStats().totalTokensUsed).toBe(10);
  });
});
