import type { StockCheckedProduct } from '../product';

/** Keeps offers tagged available, in their original order. */
export function filterAvailable<T extends StockCheckedProduct>(products: readonly T[]): T[] {
  return products.filter((product) => product.available === true);
}

/** Prefix of at most `maxCount` entries. */
export function limitSize<T>(products: readonly T[], maxCount: number): T[] {
  const limit = Number.isFinite(maxCount) ? Math.max(0, Math.floor(maxCount)) : products.length;
  return products.slice(0, limit);
}

export function payloadSizeKb(value: unknown): number {
  return Buffer.byteLength(JSON.stringify(value), 'utf8') / 1024;
}

/**
 * Drops trailing entries until the serialized list fits in `maxKb`.
 * A non-positive limit disables the check.
 */
export function limitPayloadSize<T>(products: readonly T[], maxKb: number): T[] {
  const limited = [...products];
  if (!Number.isFinite(maxKb) || maxKb <= 0) {
    return limited;
  }

  while (limited.length > 0 && payloadSizeKb(limited) > maxKb) {
    limited.pop();
  }

  return limited;
}
