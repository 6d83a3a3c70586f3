export {
  extractVibeTags,
  inferAttributes,
  cleanTags,
  getVibeScores,
  getAllVibes,
  getVibesByCategory,
  findRelatedVibes,
  scoreVibesFromText,
  scoreVibesFromMaterial,
  scoreVibesFromColors,
  scoreVibesFromType,
  vocabulary,
} from './rules';
export type { RuleInput, Vocabulary, VibeCategory } from './rules';
export { LLMVibeGenerator, LLMVibeSchema } from './LLMVibeGenerator';
export type {
  LLMVibeResult,
  LLMVibeGeneratorConfig,
  GenerateOptions,
  StructuredVibeGenerator,
} from './LLMVibeGenerator';
export { VibeGenerator, mergeTags } from './VibeGenerator';
export type { VibeGeneratorConfig } from './VibeGenerator';
