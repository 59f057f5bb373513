export type {
  AIModelConfig,
  AIModelService as AIModelServiceContract,
  AIModelUsageStats,
  EmbeddingInputType,
  EmbeddingRequestOptions,
  EmbeddingService,
  LLMRequestOptions,
  OntologyIndex,
  OntologyIndexEntry,
  OntologySearchHit,
  OntologySearchOptions,
  PipelineServices,
} from './service-types';
export { AIModelService, AIModelServiceError, createAIModelService } from './ai-model-service';
export {
  EmbeddingServiceError,
  OpenAIEmbeddingService,
  VoyageEmbeddingService,
  createEmbeddingService,
} from './embedding-service';
export { INDEX_FILE_NAME, LocalOntologyIndex, normalizeTermId, squaredEuclideanDistance } from './ontology-index';
export {
  CandidateRetriever,
  DEFAULT_RETRIEVAL_K,
  SINGLE_SYMPTOM_K,
  toSimilarityScore,
  type RetrieveOptions,
} from './candidate-retriever';
export { createPipelineServices } from './service-registry';
