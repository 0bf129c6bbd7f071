export { NoopSimilarityStore, type SimilarityStore } from './types';
