import { productIdentityKey, type StockCheckedProduct } from '../../domain/product';
import type { SearchContext } from '../../domain/search-context';
import type { FixedPrice } from '../ports/commerce-query.port';
import type { ConciergePlugin, PluginServices } from './plugin';

/** Attaches the seller's fixed wholesale price to every available offer. */
export class WholesalePlugin implements ConciergePlugin {
  readonly name = 'wholesale';

  async afterStockCheck(
    products: StockCheckedProduct[],
    _context: SearchContext,
    services: PluginServices,
  ): Promise<StockCheckedProduct[]> {
    const lookups = new Map<string, Promise<FixedPrice | null>>();

    return Promise.all(
      products.map(async (product) => {
        if (!product.available || product.sellerId.length === 0) {
          return product;
        }

        const key = productIdentityKey(product);
        let lookup = lookups.get(key);
        if (!lookup) {
          lookup = services.commerce.getFixedPrice({
            sellerId: product.sellerId,
            skuId: product.productId,
          });
          lookups.set(key, lookup);
        }

        const fixedPrice = await lookup;
        if (!fixedPrice) {
          return product;
        }

        return {
          ...product,
          attributes: {
            ...product.attributes,
            minQuantity: fixedPrice.minQuantity,
            wholesalePrice: fixedPrice.value,
          },
        };
      }),
    );
  }
}
