import type { ProductRow, ProductVibe, StockRecord } from '../../src/types';

export function productRow(overrides: Partial<ProductRow> = {}): ProductRow {
  return {
    productId: 'prod_0001',
    name: 'Aria Midi Dress',
    type: 'Dress',
    description: 'A flowing midi dress',
    colors: 'Black, Navy',
    material: 'Polyester',
    priceMin: 120,
    priceMax: 150,
    currency: 'MYR',
    url: 'https://shop.test/aria',
    imageUrl: 'https://shop.test/aria.jpg',
    ...overrides,
  };
}

export function productVibe(overrides: Partial<ProductVibe> = {}): ProductVibe {
  return {
    productId: 'prod_0001',
    vibeTags: ['elegant'],
    moodSummary: '',
    idealFor: '',
    stylingTip: '',
    occasions: [],
    category: 'Clothing',
    subcategory: 'Dress',
    materials: [],
    hasEmbellishment: false,
    styleAttributes: [],
    silhouette: '',
    generationMethod: 'rule_based',
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function stockRecord(overrides: Partial<StockRecord> = {}): StockRecord {
  return {
    productId: 'prod_0001',
    productName: 'Coco Dress',
    variants: [{ size: 'M', color: 'Black', quantity: 5, status: 'in_stock' }],
    totalInventory: 5,
    lastUpdated: '2026-01-01T00:00:00.000Z',
    version: 1,
    ...overrides,
  };
}
