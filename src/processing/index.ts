export { DataProcessor } from './DataProcessor';
export type { DataProcessorConfig } from './DataProcessor';
