/**
 * Service Registry
 *
 * Builds the collaborators the pipeline needs from a PipelineConfig. Any
 * service may be supplied by the caller instead; the rest are constructed
 * here. Nothing is cached at module level: each call yields a fresh set.
 */

import { PipelineServices } from './service-types';
import { createAIModelService } from './ai-model-service';
import { createEmbeddingService } from './embedding-service';
import { LocalOntologyIndex } from './ontology-index';
import { PipelineConfig, describePipelineConfig } from '../config/pipeline-config';
import { WorkflowLogger } from '../logging/logging';

export type ServiceOverrides = Partial<Omit<PipelineServices, 'logger'>>;

/**
 * Loads the ontology index eagerly, so a missing or malformed artifact
 * surfaces as a ConfigurationError before any document is processed.
 */
export async function createPipelineServices(
  config: PipelineConfig,
  logger: WorkflowLogger = new WorkflowLogger('pipeline-services'),
  overrides: ServiceOverrides = {},
): Promise<PipelineServices> {
  logger.logInfo('createPipelineServices', 'Initializing pipeline services', describePipelineConfig(config));

  const aiModel = overrides.aiModel ?? createAIModelService(config.llm, config.requestTimeoutMs, logger);
  const embeddings =
    overrides.embeddings ?? createEmbeddingService(config.embedding, config.requestTimeoutMs, logger);
  const ontologyIndex = overrides.ontologyIndex ?? (await LocalOntologyIndex.load(config.indexPath, embeddings, logger));

  logger.logInfo('createPipelineServices', 'Pipeline services ready', {
    llmModel: aiModel.getConfig().model,
    embeddingModel: embeddings.model,
    indexSize: ontologyIndex.size,
    indexDimension: ontologyIndex.dimension,
  });

  return { aiModel, embeddings, ontologyIndex, logger };
}
