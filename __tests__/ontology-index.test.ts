import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { ConfigurationError, RetrievalError } from '../lib/agents/errors';
import {
  INDEX_FILE_NAME,
  LocalOntologyIndex,
  normalizeTermId,
  squaredEuclideanDistance,
} from '../lib/services/ontology-index';
import { FakeEmbeddingService, loadFixtureIndex } from './helpers/fakes';

describe('normalizeTermId', () => {
  it('converts IRIs and underscore ids to CURIEs', () => {
    expect(normalizeTermId('http://purl.obolibrary.org/obo/HP_0001263')).toBe('HP:0001263');
    expect(normalizeTermId('HP_0001263')).toBe('HP:0001263');
    expect(normalizeTermId(' HP:0001263 ')).toBe('HP:0001263');
  });
});

describe('squaredEuclideanDistance', () => {
  it('sums squared component differences', () => {
    expect(squaredEuclideanDistance([0, 0], [3, 4])).toBe(25);
    expect(squaredEuclideanDistance([1, 2, 3], [1, 2, 3])).toBe(0);
  });
});

describe('LocalOntologyIndex', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ontology-index-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeIndex(content: string): void {
    fs.writeFileSync(path.join(tempDir, INDEX_FILE_NAME), content, 'utf8');
  }

  it('loads the artifact and normalizes term ids', async () => {
    const index = await loadFixtureIndex();

    expect(index.size).toBe(6);
    expect(index.dimension).toBe(2);
    expect(index.model).toBe('voyage-3');
    expect(index.getTerm('HP:0000750')?.label).toBe('Delayed speech and language development');
    expect(index.getTerm('HP_0002069')?.label).toBe('Bilateral tonic-clonic seizure');
    expect(index.getTerm('HP:9999999')).toBeUndefined();
  });

  it('returns the k nearest terms with squared distances', async () => {
    const index = await loadFixtureIndex();

    const hits = await index.search('seizures', 3);

    expect(hits.map((h) => [h.termId, h.distance])).toEqual([
      ['HP:0001250', 0],
      ['HP:0002069', 4],
      ['HP:0001263', 100],
    ]);
    expect(hits[0].description).toBe(
      'HP:0001250 Seizure. An intermittent abnormality of nervous system physiology.',
    );
  });

  it('returns nothing for k <= 0', async () => {
    const index = await loadFixtureIndex();
    await expect(index.search('seizures', 0)).resolves.toEqual([]);
  });

  it('raises RetrievalError when the query cannot be embedded', async () => {
    const index = await loadFixtureIndex(new FakeEmbeddingService({}));
    await expect(index.search('seizures', 3)).rejects.toBeInstanceOf(RetrievalError);
  });

  it('raises RetrievalError when the query vector has the wrong dimension', async () => {
    const index = await loadFixtureIndex(new FakeEmbeddingService({ seizures: [0, 1, 2] }));
    await expect(index.search('seizures', 3)).rejects.toThrow(
      'Query embedding has 3 dimensions, index expects 2',
    );
  });

  it('raises ConfigurationError when the artifact is missing', async () => {
    await expect(LocalOntologyIndex.load(tempDir, new FakeEmbeddingService())).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it('explains that a FAISS store directory needs exporting', async () => {
    fs.writeFileSync(path.join(tempDir, 'index.faiss'), 'binary');
    fs.writeFileSync(path.join(tempDir, 'index.pkl'), 'binary');

    await expect(LocalOntologyIndex.load(tempDir, new FakeEmbeddingService())).rejects.toThrow(
      `Ontology index not found at ${path.join(tempDir, 'index.json')} (${tempDir} holds a FAISS store; export it to index.json)`,
    );
  });

  it('raises ConfigurationError for invalid JSON', async () => {
    writeIndex('{ not json');
    await expect(LocalOntologyIndex.load(tempDir, new FakeEmbeddingService())).rejects.toThrow(/is not valid JSON/);
  });

  it('raises ConfigurationError for a schema mismatch', async () => {
    writeIndex(JSON.stringify({ model: 'voyage-3', entries: [] }));
    await expect(LocalOntologyIndex.load(tempDir, new FakeEmbeddingService())).rejects.toThrow(
      /does not match the expected format/,
    );
  });

  it('raises ConfigurationError when an entry has the wrong dimension', async () => {
    writeIndex(
      JSON.stringify({
        model: 'voyage-3',
        dimension: 2,
        entries: [{ id: 'HP:0000001', label: 'All', content: 'All', vector: [1, 2, 3] }],
      }),
    );
    await expect(LocalOntologyIndex.load(tempDir, new FakeEmbeddingService())).rejects.toThrow(
      'Ontology index entry HP:0000001 has 3 dimensions, expected 2',
    );
  });
});
