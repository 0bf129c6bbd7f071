export type { PipelinePersistence } from './types';
