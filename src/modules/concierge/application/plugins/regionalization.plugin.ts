import { DELIVERY_TYPE_REQUIRED_MESSAGE } from '../../../../common/constants/error-messages.constants';
import { isStringArray } from '../../../../common/utils/object.utils';
import type { Product } from '../../domain/product';
import {
  addToResult,
  getContextValue,
  setContextValue,
  type SearchContext,
} from '../../domain/search-context';
import type { ConciergePlugin, PluginServices } from './plugin';

export const PICKUP_DELIVERY_TYPE = 'Retirada';
export const HOME_DELIVERY_TYPE = 'Entrega';

/**
 * Seller groups keyed by rule name. `restricted_sellers` marks the region
 * whose sellers are narrowed by delivery type to `pickup_sellers` or
 * `delivery_sellers`.
 */
export interface SellerRules {
  restricted_sellers?: string[];
  pickup_sellers?: string[];
  delivery_sellers?: string[];
}

export interface RegionalizationOptions {
  defaultSeller?: string;
  sellerRules?: SellerRules;
  priorityCategories?: string[];
  requireDeliveryTypeForPriority?: boolean;
}

export const DELIVERY_TYPE_REQUIRED_KEY = 'deliveryTypeRequired';
/** Context value holding the sellers the region resolved to, before delivery narrowing. */
export const REGION_SELLERS_KEY = 'regionSellers';

/** Resolves region and sellers from the postal code before the search. */
export class RegionalizationPlugin implements ConciergePlugin {
  readonly name = 'regionalization';
  private readonly defaultSeller: string;
  private readonly sellerRules: SellerRules;
  private readonly priorityCategories: ReadonlySet<string>;
  private readonly requireDeliveryTypeForPriority: boolean;

  constructor(options: RegionalizationOptions = {}) {
    this.defaultSeller = options.defaultSeller ?? '1';
    this.sellerRules = options.sellerRules ?? {};
    this.priorityCategories = new Set(options.priorityCategories ?? []);
    this.requireDeliveryTypeForPriority = options.requireDeliveryTypeForPriority ?? false;
  }

  async beforeSearch(context: SearchContext, services: PluginServices): Promise<SearchContext> {
    if (!context.postalCode) {
      context.sellers = [this.defaultSeller];
      return context;
    }

    const region = await services.commerce.resolveRegion({
      postalCode: context.postalCode,
      countryCode: context.countryCode,
      tradePolicy: context.tradePolicy,
    });

    if (region.regionId) {
      context.regionId = region.regionId;
    }

    if (region.error) {
      context.regionError = region.error;
      context.sellers = [this.defaultSeller];
      return context;
    }

    setContextValue(context, REGION_SELLERS_KEY, [...region.sellers]);
    context.sellers = this.applySellerRules(region.sellers, context.deliveryType);
    return context;
  }

  afterSearch(products: Product[], context: SearchContext): Product[] {
    if (!this.requireDeliveryTypeForPriority || context.deliveryType || products.length === 0) {
      return products;
    }

    const hasPriorityProduct = products.some((product) =>
      product.categories.some((category) => this.priorityCategories.has(category)),
    );

    const regionSellers = getContextValue(context, REGION_SELLERS_KEY, isStringArray) ?? context.sellers;
    if (hasPriorityProduct && this.isRestrictedRegion(regionSellers)) {
      addToResult(context, DELIVERY_TYPE_REQUIRED_KEY, DELIVERY_TYPE_REQUIRED_MESSAGE);
    }

    return products;
  }

  private applySellerRules(sellers: string[], deliveryType: string | undefined): string[] {
    if (!this.isRestrictedRegion(sellers)) {
      return sellers;
    }

    if (deliveryType === PICKUP_DELIVERY_TYPE) {
      return this.sellerRules.pickup_sellers ?? sellers;
    }

    if (deliveryType === HOME_DELIVERY_TYPE) {
      return this.sellerRules.delivery_sellers ?? sellers;
    }

    return sellers;
  }

  private isRestrictedRegion(sellers: readonly string[]): boolean {
    const restricted = this.sellerRules.restricted_sellers ?? [];
    return (
      restricted.length > 0 &&
      sellers.length > 0 &&
      sellers.every((seller) => restricted.includes(seller))
    );
  }
}
