import { TermSelectionAgent } from '../lib/agents/term-selection-agent';
import { OntologyCandidate } from '../lib/agents/types';
import { ScriptedAIModelService, makeTerm, quietLogger, selectionResponse } from './helpers/fakes';

const CANDIDATES: OntologyCandidate[] = [
  {
    termId: 'HP:0001263',
    termLabel: 'Global developmental delay',
    description: 'A delay in the achievement of motor or mental milestones.',
    similarityScore: 1,
  },
  {
    termId: 'HP:0000750',
    termLabel: 'Delayed speech and language development',
    description: 'Language development below age norms.',
    similarityScore: 0.5,
  },
];

function selectorReturning(response: string): { selector: TermSelectionAgent; llm: ScriptedAIModelService } {
  const llm = new ScriptedAIModelService(() => response);
  return { selector: new TermSelectionAgent(llm, quietLogger()), llm };
}

describe('TermSelectionAgent', () => {
  const term = makeTerm();

  it('returns null for no candidates without calling the model', async () => {
    const { selector, llm } = selectorReturning(selectionResponse('HP:0001263', 0.9));

    await expect(selector.select(term, [])).resolves.toBeNull();
    await expect(selector.selectDetailed(term, [])).resolves.toEqual({ kind: 'no-candidates' });
    expect(llm.prompts).toHaveLength(0);
  });

  it('accepts a candidate at or above the threshold', async () => {
    const { selector } = selectorReturning(
      selectionResponse('HP:0001263', 0.9, 'Precise clinical mapping', { mapping_quality: 'excellent' }),
    );

    const mapping = await selector.select(term, CANDIDATES, 0.7);

    expect(mapping).toEqual({
      sourceTerm: term,
      selectedTermId: 'HP:0001263',
      selectedTermLabel: 'Global developmental delay',
      confidence: 0.9,
      reasoning: 'Precise clinical mapping',
      mappingQuality: 'excellent',
    });
  });

  it('accepts a confidence exactly equal to the threshold', async () => {
    const { selector } = selectorReturning(selectionResponse('HP:0001263', 0.7));
    const mapping = await selector.select(term, CANDIDATES, 0.7);
    expect(mapping?.confidence).toBe(0.7);
  });

  it('rejects a confidence just below the threshold', async () => {
    const { selector } = selectorReturning(selectionResponse('HP:0001263', 0.69, 'Partial match'));

    const decision = await selector.selectDetailed(term, CANDIDATES, 0.7);

    expect(decision).toEqual({ kind: 'below-threshold', confidence: 0.69, threshold: 0.7, reasoning: 'Partial match' });
    await expect(selector.select(term, CANDIDATES, 0.7)).resolves.toBeNull();
  });

  it('reports the label from the candidate list, not from the model', async () => {
    const { selector } = selectorReturning(
      selectionResponse('HP:0001263', 0.9, 'Match', { selected_hpo_name: 'Developmental delay (paraphrased)' }),
    );
    const mapping = await selector.select(term, CANDIDATES);
    expect(mapping?.selectedTermLabel).toBe('Global developmental delay');
  });

  it('normalizes an IRI-form selection to the candidate id', async () => {
    const { selector } = selectorReturning(
      selectionResponse('http://purl.obolibrary.org/obo/HP_0000750', 0.8),
    );
    const mapping = await selector.select(term, CANDIDATES);
    expect(mapping?.selectedTermId).toBe('HP:0000750');
  });

  it('treats a null selection as a decline', async () => {
    const { selector } = selectorReturning(selectionResponse(null, 0, 'No HPO term meets the confidence threshold'));

    await expect(selector.selectDetailed(term, CANDIDATES)).resolves.toEqual({
      kind: 'declined',
      reasoning: 'No HPO term meets the confidence threshold',
    });
  });

  it('rejects an id that was not among the candidates', async () => {
    const { selector } = selectorReturning(selectionResponse('HP:0004322', 0.95));

    await expect(selector.selectDetailed(term, CANDIDATES)).resolves.toEqual({
      kind: 'invalid-response',
      reason: 'Selected id HP:0004322 is not among the retrieved candidates',
    });
  });

  it('rejects a confidence above 1', async () => {
    const { selector } = selectorReturning(selectionResponse('HP:0001263', 1.5));

    await expect(selector.selectDetailed(term, CANDIDATES)).resolves.toEqual({
      kind: 'invalid-response',
      reason: 'Selection confidence 1.5 is outside [0, 1]',
    });
  });

  it('rejects a negative confidence', async () => {
    const { selector } = selectorReturning(selectionResponse('HP:0001263', -0.1));
    await expect(selector.select(term, CANDIDATES)).resolves.toBeNull();
  });

  it('returns null for malformed model output', async () => {
    const { selector } = selectorReturning('{"selected_hpo_id": "HP:0001263", ');

    const decision = await selector.selectDetailed(term, CANDIDATES);

    expect(decision.kind).toBe('invalid-response');
  });

  it('returns null when a required field is missing', async () => {
    const { selector } = selectorReturning(JSON.stringify({ selected_hpo_id: 'HP:0001263', confidence: 0.9 }));
    await expect(selector.select(term, CANDIDATES)).resolves.toBeNull();
  });

  it('returns null when the model request fails', async () => {
    const llm = new ScriptedAIModelService(() => {
      throw new Error('connection reset');
    });
    const selector = new TermSelectionAgent(llm, quietLogger());

    await expect(selector.selectDetailed(term, CANDIDATES)).resolves.toEqual({
      kind: 'invalid-response',
      reason: 'Term selection failed: connection reset',
    });
  });

  it('presents every candidate and the threshold in the prompt', async () => {
    const { selector, llm } = selectorReturning(selectionResponse('HP:0001263', 0.9));

    await selector.select(term, CANDIDATES, 0.75);

    expect(llm.prompts).toHaveLength(1);
    expect(llm.prompts[0]).toContain('"hpo_id": "HP:0001263"');
    expect(llm.prompts[0]).toContain('"hpo_id": "HP:0000750"');
    expect(llm.prompts[0]).toContain('"similarity_score": 0.5');
    expect(llm.prompts[0]).toContain('Confidence threshold: 0.75');
  });

  it('gives the same decision for the same inputs and response', async () => {
    const { selector } = selectorReturning(selectionResponse('HP:0001263', 0.85, 'Consistent'));

    const first = await selector.selectDetailed(term, CANDIDATES);
    const second = await selector.selectDetailed(term, CANDIDATES);

    expect(second).toEqual(first);
  });

  it('rejects a threshold outside [0, 1]', async () => {
    const { selector } = selectorReturning(selectionResponse('HP:0001263', 0.9));
    await expect(selector.select(term, CANDIDATES, 1.2)).rejects.toBeInstanceOf(RangeError);
  });
});
