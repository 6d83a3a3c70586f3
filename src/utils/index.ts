import { createHash, randomBytes } from 'node:crypto';

export { KeyedMutex } from './KeyedMutex';

/**
 * MD5 hex digest of the fields that define what a product is.
 * Price, url and image do not participate.
 */
export function computeContentHash(product: {
  name: string;
  description: string;
  colors: string;
  material: string;
}): string {
  const content = `${product.name}${product.description}${product.colors}${product.material}`;
  return createHash('md5').update(content, 'utf8').digest('hex');
}

/**
 * Order id in the form ORD-YYYYMMDD-XXXXXX (UTC date, 6 upper-case hex chars)
 */
export function generateOrderId(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, '');
  const suffix = randomBytes(3).toString('hex').toUpperCase();
  return `ORD-${date}-${suffix}`;
}
