import { ConfigurationError } from '../lib/agents/errors';
import { loadPipelineConfig } from '../lib/config/pipeline-config';
import { createPipelineServices } from '../lib/services/service-registry';
import { FakeEmbeddingService, FIXTURE_INDEX_PATH, ScriptedAIModelService, quietLogger } from './helpers/fakes';

const config = loadPipelineConfig({
  OPENAI_API_KEY: 'test-secret',
  VOYAGE_API_KEY: 'test-secret',
  HPO_INDEX_PATH: FIXTURE_INDEX_PATH,
});

describe('createPipelineServices', () => {
  it('loads the index with the supplied embedding service', async () => {
    const embeddings = new FakeEmbeddingService();
    const aiModel = new ScriptedAIModelService(() => '{}');
    const logger = quietLogger('registry-test');

    const services = await createPipelineServices(config, logger, { aiModel, embeddings });

    expect(services.aiModel).toBe(aiModel);
    expect(services.embeddings).toBe(embeddings);
    expect(services.logger).toBe(logger);
    expect(services.ontologyIndex.size).toBe(6);
    expect(services.ontologyIndex.dimension).toBe(2);
  });

  it('builds real clients when nothing is supplied', async () => {
    const services = await createPipelineServices(config, quietLogger('registry-test'));

    expect(services.aiModel.getConfig()).toMatchObject({ provider: 'openai', model: 'gpt-4o', timeout: 60000 });
    expect([services.embeddings.provider, services.embeddings.model]).toEqual(['voyage', 'voyage-3']);
  });

  it('fails before processing when the index is missing', async () => {
    await expect(
      createPipelineServices({ ...config, indexPath: '/nonexistent/hpo-index' }, quietLogger('registry-test'), {
        embeddings: new FakeEmbeddingService(),
      }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});
