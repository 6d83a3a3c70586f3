export { ProductStore, productDocumentText } from './ProductStore';
export { VibeStore, vibeDocumentText } from './VibeStore';
export { ProductCatalog } from './ProductCatalog';
export type { CatalogStats } from './ProductCatalog';
export { ProductSchema, ProductVibeSchema, GenerationMethodSchema } from './schemas';
