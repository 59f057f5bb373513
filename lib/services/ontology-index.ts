/**
 * Ontology Index
 *
 * Read-only nearest-neighbour index over precomputed HPO term embeddings.
 * The artifact is a directory holding `index.json`; it is built elsewhere and
 * loaded once. Search is an exact scan with squared Euclidean distance, the
 * same metric as the flat L2 index the embeddings were produced for.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import {
  EmbeddingService,
  OntologyIndex,
  OntologyIndexEntry,
  OntologySearchHit,
  OntologySearchOptions,
} from './service-types';
import { ConfigurationError, RetrievalError, errorMessage } from '../agents/errors';
import { WorkflowLogger } from '../logging/logging';

export const INDEX_FILE_NAME = 'index.json';
/** A FAISS store directory holds this file; it is not readable here. */
const FAISS_FILE_NAME = 'index.faiss';

const HPO_PURL_PREFIX = 'http://purl.obolibrary.org/obo/';

const IndexFileSchema = z.object({
  model: z.string(),
  dimension: z.number().int().positive(),
  entries: z.array(
    z.object({
      id: z.string().min(1),
      label: z.string(),
      content: z.string(),
      vector: z.array(z.number()),
    }),
  ),
});

/**
 * Converts the ontology's IRI form to a CURIE:
 * `http://purl.obolibrary.org/obo/HP_0001263` and `HP_0001263` both become `HP:0001263`.
 */
export function normalizeTermId(id: string): string {
  const trimmed = id.trim();
  const local = trimmed.startsWith(HPO_PURL_PREFIX) ? trimmed.slice(HPO_PURL_PREFIX.length) : trimmed;
  return local.replace(/^([A-Za-z]+)_(\d+)$/, '$1:$2');
}

export function squaredEuclideanDistance(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return sum;
}

export class LocalOntologyIndex implements OntologyIndex {
  private readonly byId: Map<string, OntologyIndexEntry>;

  constructor(
    readonly model: string,
    readonly dimension: number,
    private readonly entries: readonly OntologyIndexEntry[],
    private readonly embeddings: EmbeddingService,
    private readonly logger?: WorkflowLogger,
  ) {
    this.byId = new Map(entries.map((entry) => [entry.id, entry]));
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Loads `<indexPath>/index.json`:
   *
   * ```json
   * { "model": "voyage-3", "dimension": 1024,
   *   "entries": [{ "id": "HP:0001263", "label": "...", "content": "...", "vector": [0.01, ...] }] }
   * ```
   *
   * Ids may be CURIEs or OBO PURLs. A FAISS store (`index.faiss` + `index.pkl`)
   * must be exported to this format first. A missing or malformed artifact is a
   * configuration problem, not a per-document one.
   */
  static async load(
    indexPath: string,
    embeddings: EmbeddingService,
    logger?: WorkflowLogger,
  ): Promise<LocalOntologyIndex> {
    const filePath = path.join(indexPath, INDEX_FILE_NAME);

    let raw: string;
    try {
      raw = await fs.promises.readFile(filePath, 'utf8');
    } catch (error) {
      const hint = fs.existsSync(path.join(indexPath, FAISS_FILE_NAME))
        ? ` (${indexPath} holds a FAISS store; export it to ${INDEX_FILE_NAME})`
        : '';
      throw new ConfigurationError(`Ontology index not found at ${filePath}${hint}`, { indexPath }, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigurationError(`Ontology index at ${filePath} is not valid JSON: ${errorMessage(error)}`, { indexPath }, error);
    }

    const parsed = IndexFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(`Ontology index at ${filePath} does not match the expected format`, {
        indexPath,
        issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const { model, dimension } = parsed.data;
    const mismatched = parsed.data.entries.find((entry) => entry.vector.length !== dimension);
    if (mismatched) {
      throw new ConfigurationError(
        `Ontology index entry ${mismatched.id} has ${mismatched.vector.length} dimensions, expected ${dimension}`,
        { indexPath },
      );
    }

    if (model !== embeddings.model) {
      logger?.logWarn('LocalOntologyIndex.load', 'Index was built with a different embedding model', {
        indexModel: model,
        embeddingModel: embeddings.model,
      });
    }

    const entries = parsed.data.entries.map((entry) => ({ ...entry, id: normalizeTermId(entry.id) }));
    logger?.logInfo('LocalOntologyIndex.load', 'Ontology index loaded', {
      indexPath,
      entries: entries.length,
      dimension,
      model,
    });

    return new LocalOntologyIndex(model, dimension, entries, embeddings, logger);
  }

  async search(queryText: string, k: number, options: OntologySearchOptions = {}): Promise<OntologySearchHit[]> {
    if (k <= 0 || this.entries.length === 0) {
      return [];
    }

    let queryVector: number[];
    try {
      queryVector = await this.embeddings.embedQuery(queryText, { signal: options.signal });
    } catch (error) {
      throw new RetrievalError(`Failed to embed query: ${errorMessage(error)}`, { queryText }, error);
    }

    if (queryVector.length !== this.dimension) {
      throw new RetrievalError(
        `Query embedding has ${queryVector.length} dimensions, index expects ${this.dimension}`,
        { queryText, model: this.embeddings.model },
      );
    }

    const hits = this.entries.map((entry) => ({
      entry,
      distance: squaredEuclideanDistance(queryVector, entry.vector),
    }));
    hits.sort((a, b) => a.distance - b.distance);

    const top = hits.slice(0, k).map(({ entry, distance }) => ({
      termId: entry.id,
      termLabel: entry.label,
      description: entry.content,
      distance,
    }));

    this.logger?.logDebug('LocalOntologyIndex.search', 'Index search completed', {
      queryText,
      k,
      returned: top.length,
    });

    return top;
  }

  getTerm(termId: string): OntologyIndexEntry | undefined {
    return this.byId.get(normalizeTermId(termId));
  }
}
