export type { RelevanceModel, RelevanceModelConfig } from './types';
export { TeiRelevanceModel, CohereRelevanceModel, JinaRelevanceModel } from './http-rerank';
export {
  createRelevanceModel,
  createRelevanceCache,
  getSupportedRerankProviders,
} from './factory';
