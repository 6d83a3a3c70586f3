export { HybridSearchEngine } from './HybridSearchEngine';
export type { HybridSearchConfig } from './HybridSearchEngine';
