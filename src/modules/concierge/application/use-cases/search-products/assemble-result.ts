import { productIdentityKey, type Product, type StockCheckedProduct } from '../../../domain/product';
import type { SearchContext } from '../../../domain/search-context';
import type { ConciergeResult } from '../../../domain/search-result';

export const REGION_MESSAGE_KEY = 'regionMessage';

/**
 * Re-applies the checked availability after `afterStockCheck` hooks ran.
 * Hooks may reorder, drop or annotate offers, but cannot add offers that
 * were never checked or mark an unavailable offer available.
 */
export function reconcileStockTags(
  folded: readonly StockCheckedProduct[],
  checked: readonly StockCheckedProduct[],
): StockCheckedProduct[] {
  const checkedByKey = new Map(checked.map((product) => [productIdentityKey(product), product]));
  const reconciled: StockCheckedProduct[] = [];

  for (const product of folded) {
    const original = checkedByKey.get(productIdentityKey(product));
    if (!original) {
      continue;
    }

    reconciled.push({ ...product, available: original.available && product.available });
  }

  return reconciled;
}

/** Drops any offer that did not come out of the filter stage. */
export function retainFilteredProducts<T extends Product>(
  products: readonly T[],
  filtered: readonly Product[],
): T[] {
  const allowed = new Set(filtered.map((product) => productIdentityKey(product)));
  return products.filter((product) => allowed.has(productIdentityKey(product)));
}

export function assembleResult(products: Product[], context: SearchContext): ConciergeResult {
  return {
    products,
    extras: {
      ...context.extraData,
      ...(context.regionError ? { [REGION_MESSAGE_KEY]: context.regionError } : {}),
    },
  };
}
