import { ERROR_CODES, ExtractionError, ProcessingErrorSeverity } from '../lib/agents/errors';
import { TermExtractionAgent, detectLanguage } from '../lib/agents/term-extraction-agent';
import { queryTextFor } from '../lib/agents/types';
import { AIModelServiceError } from '../lib/services/ai-model-service';
import { ScriptedAIModelService, extractionResponse, quietLogger } from './helpers/fakes';

function agentReturning(response: string | Error): { agent: TermExtractionAgent; llm: ScriptedAIModelService } {
  const llm = new ScriptedAIModelService(() => {
    if (response instanceof Error) {
      throw response;
    }
    return response;
  });
  return { agent: new TermExtractionAgent(llm, quietLogger()), llm };
}

describe('detectLanguage', () => {
  it('detects Chinese by CJK ideographs', () => {
    expect(detectLanguage('患儿发育迟缓')).toBe('zh');
    expect(detectLanguage('short stature, 身材矮小')).toBe('zh');
  });

  it('defaults to English', () => {
    expect(detectLanguage('developmental delay, short stature')).toBe('en');
    expect(detectLanguage('')).toBe('en');
  });
});

describe('TermExtractionAgent', () => {
  it('extracts English terms without translations', async () => {
    const { agent, llm } = agentReturning(
      extractionResponse(
        [
          {
            original_text: 'developmental delay',
            standardized_text: 'global developmental delay',
            category: 'neurological',
            confidence: 0.95,
          },
          {
            original_text: 'short stature',
            standardized_text: 'short stature',
            category: 'musculoskeletal',
            severity: 'moderate',
            confidence: 0.9,
          },
        ],
        {
          diagnostic_information: { lab_values: ['IGF-1 low'] },
          processing_notes: 'Two symptoms found',
        },
      ),
    );

    const result = await agent.extract('developmental delay, short stature');

    expect(result.language).toBe('en');
    expect(result.terms).toHaveLength(2);
    expect(result.terms[0]).toEqual({
      originalText: 'developmental delay',
      standardizedText: 'global developmental delay',
      translatedText: undefined,
      category: 'neurological',
      severity: 'unknown',
      temporal: 'unknown',
      context: '',
      extractionConfidence: 0.95,
    });
    expect(Object.isFrozen(result.terms[0])).toBe(true);
    expect(result.categorySummary.neurological).toEqual(['global developmental delay']);
    expect(result.categorySummary.musculoskeletal).toEqual(['short stature']);
    expect(result.categorySummary.cardiovascular).toEqual([]);
    expect(result.diagnosticNotes.labValues).toEqual(['IGF-1 low']);
    expect(result.diagnosticNotes.imagingFindings).toEqual([]);
    expect(result.processingNotes).toBe('Two symptoms found');
    expect(llm.prompts[0]).toContain('English Clinical Text:\ndevelopmental delay, short stature');
  });

  it('keeps English translations of Chinese terms as the retrieval query', async () => {
    const { agent, llm } = agentReturning(
      extractionResponse([
        {
          original_text: '发育迟缓',
          standardized_text: '生长发育迟缓',
          english_translation: 'developmental delay',
          category: 'constitutional',
        },
      ]),
    );

    const result = await agent.extract('患儿发育迟缓');

    expect(result.language).toBe('zh');
    expect(result.terms[0].translatedText).toBe('developmental delay');
    expect(queryTextFor(result.terms[0])).toBe('developmental delay');
    expect(llm.prompts[0]).toContain('Chinese Clinical Text:\n患儿发育迟缓');
  });

  it('falls back to the standardized text when a Chinese term has no translation', async () => {
    const { agent } = agentReturning(
      extractionResponse([{ original_text: '抽搐', standardized_text: '癫痫发作', english_translation: null }]),
    );

    const result = await agent.extract('反复抽搐');

    expect(result.terms[0].translatedText).toBeUndefined();
    expect(queryTextFor(result.terms[0])).toBe('癫痫发作');
  });

  it('accepts a response wrapped in a markdown code fence', async () => {
    const fenced = '```json\n' + extractionResponse([{ original_text: 'seizures', standardized_text: 'seizures' }]) + '\n```';
    const { agent } = agentReturning(fenced);

    const result = await agent.extract('recurrent seizures');

    expect(result.terms.map((t) => t.standardizedText)).toEqual(['seizures']);
  });

  it('returns an empty result for blank text without calling the model', async () => {
    const { agent, llm } = agentReturning('unused');

    const result = await agent.extract('   ');

    expect(result.terms).toEqual([]);
    expect(llm.prompts).toHaveLength(0);
  });

  it('returns no terms when the model finds none', async () => {
    const { agent } = agentReturning(extractionResponse([]));
    const result = await agent.extract('The patient is well.');
    expect(result.terms).toEqual([]);
  });

  it('raises ExtractionError for a response that is not JSON', async () => {
    const { agent } = agentReturning('I found two symptoms.');

    const error: unknown = await agent.extract('developmental delay').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    if (error instanceof ExtractionError) {
      expect(error.code).toBe(ERROR_CODES.EXTRACTION_FAILED);
      expect(error.context?.cause).toBe(ERROR_CODES.LLM_RESPONSE_INVALID);
    }
  });

  it('raises ExtractionError when a symptom fails the schema', async () => {
    const { agent } = agentReturning(
      extractionResponse([{ original_text: 'fever', standardized_text: 'fever', category: 'infectious' }]),
    );
    await expect(agent.extract('fever')).rejects.toBeInstanceOf(ExtractionError);
  });

  it('raises ExtractionError when a confidence is out of range', async () => {
    const { agent } = agentReturning(
      extractionResponse([{ original_text: 'fever', standardized_text: 'fever', confidence: 1.2 }]),
    );
    await expect(agent.extract('fever')).rejects.toBeInstanceOf(ExtractionError);
  });

  it('raises ExtractionError when the model request fails', async () => {
    const { agent } = agentReturning(
      new AIModelServiceError(ERROR_CODES.TIMEOUT_EXCEEDED, 'LLM request timed out after 1000ms', ProcessingErrorSeverity.HIGH),
    );

    await expect(agent.extract('fever')).rejects.toThrow('Term extraction failed: LLM request timed out after 1000ms');
  });
});
