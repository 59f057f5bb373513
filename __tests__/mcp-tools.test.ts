import { DocumentResult } from '../lib/agents/types';
import { CandidateRetriever } from '../lib/services/candidate-retriever';
import {
  TOOL_DEFINITIONS,
  TOOL_NAMES,
  ToolContext,
  ToolTextResult,
  handleToolCall,
  searchHpoForSymptom,
} from '../lib/mcp/tools';
import { createFailedResult, emptyMappingSummary } from '../lib/workflow/state-manager';
import { TransformOptions } from '../lib/workflow/workflow-orchestrator';
import { loadFixtureIndex, quietLogger } from './helpers/fakes';

function payloadOf(result: ToolTextResult): unknown {
  return JSON.parse(result.content[0].text);
}

function doneResult(text: string): DocumentResult {
  return { ...createFailedResult(text, '', 0.1), state: 'DONE', error: undefined, summary: emptyMappingSummary() };
}

async function buildContext(
  transform: (text: string, options?: TransformOptions) => Promise<DocumentResult> = async (text) => doneResult(text),
): Promise<ToolContext> {
  const logger = quietLogger('mcp-test');
  const index = await loadFixtureIndex();
  return { retriever: new CandidateRetriever(index, logger), transform, logger };
}

describe('TOOL_DEFINITIONS', () => {
  it('lists the four tools', () => {
    expect(TOOL_DEFINITIONS.map((tool) => tool.name)).toEqual([
      'search_hpo_for_symptom',
      'english_phenotype_analysis_workflow',
      'chinese_phenotype_analysis_workflow',
      'map_clinical_text',
    ]);
  });
});

describe('searchHpoForSymptom', () => {
  it('returns the top five candidates by default', async () => {
    const context = await buildContext();

    const result = await searchHpoForSymptom(context, 'short stature');

    if ('error' in result) {
      throw new Error(result.error);
    }
    expect(result.symptom).toBe('short stature');
    expect(result.total_found).toBe(5);
    expect(result.candidates.map((candidate) => candidate.hpo_id)).toEqual([
      'HP:0004322',
      'HP:0003510',
      'HP:0000750',
      'HP:0001263',
      'HP:0001250',
    ]);
    expect(result.candidates[0]).toMatchObject({ hpo_name: 'Short stature', similarity_score: 1 });
    expect(result.candidates[1].similarity_score).toBeCloseTo(0.2, 10);
  });

  it('reports a symptom with no candidates in-band', async () => {
    const context: ToolContext = { ...(await buildContext()), retriever: { retrieve: async () => [] } };

    await expect(searchHpoForSymptom(context, 'hair whorl')).resolves.toEqual({
      error: 'No HPO candidates found for symptom: hair whorl',
    });
  });

  it('reports an embedding failure as a search failure', async () => {
    const context = await buildContext();

    await expect(searchHpoForSymptom(context, 'hair whorl')).resolves.toEqual({
      error: `Failed to search HPO terms for symptom 'hair whorl': Failed to embed query: No embedding for "hair whorl"`,
    });
  });

  it('reports a failing retriever in-band', async () => {
    const context: ToolContext = {
      ...(await buildContext()),
      retriever: { retrieve: () => Promise.reject(new Error('index offline')) },
    };

    await expect(searchHpoForSymptom(context, 'seizures')).resolves.toEqual({
      error: "Failed to search HPO terms for symptom 'seizures': index offline",
    });
  });
});

describe('handleToolCall', () => {
  it('runs the search tool with an explicit k', async () => {
    const context = await buildContext();

    const result = await handleToolCall(context, TOOL_NAMES.SEARCH, { english_symptom: ' seizures ', k: 2 });

    expect(result.isError).toBeUndefined();
    expect(payloadOf(result)).toMatchObject({
      symptom: 'seizures',
      total_found: 2,
      candidates: [{ hpo_id: 'HP:0001250' }, { hpo_id: 'HP:0002069' }],
    });
  });

  it('flags in-band search errors', async () => {
    const context = await buildContext();

    const result = await handleToolCall(context, TOOL_NAMES.SEARCH, { english_symptom: 'hair whorl' });

    expect(result.isError).toBe(true);
    expect(payloadOf(result)).toEqual({
      error: `Failed to search HPO terms for symptom 'hair whorl': Failed to embed query: No embedding for "hair whorl"`,
    });
  });

  it('rejects invalid arguments', async () => {
    const context = await buildContext();

    const missing = await handleToolCall(context, TOOL_NAMES.SEARCH, { k: 3 });
    const badK = await handleToolCall(context, TOOL_NAMES.SEARCH, { english_symptom: 'seizures', k: 0 });

    expect(missing.isError).toBe(true);
    expect(payloadOf(missing)).toEqual({
      error: 'Invalid arguments for search_hpo_for_symptom: english_symptom: Required',
    });
    expect(badK.isError).toBe(true);
  });

  it('returns the workflow descriptors', async () => {
    const context = await buildContext();

    const english = payloadOf(await handleToolCall(context, TOOL_NAMES.ENGLISH_WORKFLOW, undefined));
    const chinese = payloadOf(await handleToolCall(context, TOOL_NAMES.CHINESE_WORKFLOW, {}));

    expect(english).toMatchObject({ workflow_name: 'English Phenotype to HPO Analysis' });
    expect(chinese).toMatchObject({ workflow_name: 'Chinese Phenotype to HPO Analysis' });
  });

  it('sends workflow descriptors with snake_case keys', async () => {
    const context = await buildContext();

    const payload = payloadOf(await handleToolCall(context, TOOL_NAMES.ENGLISH_WORKFLOW, {}));

    expect(payload).toMatchObject({
      workflow_name: 'English Phenotype to HPO Analysis',
      expected_output: { format: 'Structured JSON with symptom mappings and summary' },
      tools_to_use: ['search_hpo_for_symptom'],
      steps: [
        { step_number: 1, llm_prompt: expect.stringContaining('{english_text}'), next_step: expect.any(String) },
        { step_number: 2, parameters: { tool_name: 'search_hpo_for_symptom', k_results: 5 } },
        { step_number: 3, expected_output: expect.any(String) },
        { step_number: 4, final_format: expect.objectContaining({ original_text: expect.any(String) }) },
      ],
    });
    expect(JSON.stringify(payload)).not.toMatch(/"(workflowName|stepNumber|llmPrompt|toolsToUse)"/);
  });

  it('passes the threshold through to the pipeline', async () => {
    const transform = jest.fn(async (text: string) => doneResult(text));
    const context = await buildContext(transform);

    const result = await handleToolCall(context, TOOL_NAMES.MAP_TEXT, { text: 'short stature', threshold: 0.9 });

    expect(transform).toHaveBeenCalledWith('short stature', { confidenceThreshold: 0.9 });
    expect(result.isError).toBeUndefined();
    expect(payloadOf(result)).toMatchObject({ sourceText: 'short stature', state: 'DONE' });
  });

  it('flags a failed document', async () => {
    const context = await buildContext(async (text) => createFailedResult(text, 'Term extraction failed: boom', 0));

    const result = await handleToolCall(context, TOOL_NAMES.MAP_TEXT, { text: 'note' });

    expect(result.isError).toBe(true);
    expect(payloadOf(result)).toMatchObject({ state: 'FAILED', error: 'Term extraction failed: boom' });
  });

  it('rejects an out-of-range threshold', async () => {
    const transform = jest.fn(async (text: string) => doneResult(text));
    const context = await buildContext(transform);

    const result = await handleToolCall(context, TOOL_NAMES.MAP_TEXT, { text: 'note', threshold: 2 });

    expect(result.isError).toBe(true);
    expect(transform).not.toHaveBeenCalled();
  });

  it('reports unknown tools', async () => {
    const context = await buildContext();

    const result = await handleToolCall(context, 'summarize_note', {});

    expect(result.isError).toBe(true);
    expect(payloadOf(result)).toEqual({ error: 'Unknown tool: summarize_note' });
  });
});
