import type { Product, StockCheckedProduct } from '../../domain/product';
import { isProductList, isStockCheckedProductList } from '../../domain/product';
import type { SearchContext } from '../../domain/search-context';
import { isSearchContext } from '../../domain/search-context';
import type { ConciergeResult, HookStage } from '../../domain/search-result';
import { isConciergeResult } from '../../domain/search-result';
import type { CommerceQueryPort } from '../ports/commerce-query.port';
import type { MessagingPort } from '../ports/messaging.port';

export type MaybePromise<T> = T | Promise<T>;

/** Collaborators handed to every hook. */
export interface PluginServices {
  readonly commerce: CommerceQueryPort;
  readonly messaging: MessagingPort;
}

/**
 * A named set of optional hooks. A missing hook leaves its stage input
 * untouched. Implementations must not keep per-request state on the instance:
 * one instance serves every concurrent request.
 */
export interface ConciergePlugin {
  readonly name: string;

  beforeSearch?(context: SearchContext, services: PluginServices): MaybePromise<SearchContext>;

  afterSearch?(
    products: Product[],
    context: SearchContext,
    services: PluginServices,
  ): MaybePromise<Product[]>;

  /** Sees every checked offer, unavailable ones included. */
  afterStockCheck?(
    products: StockCheckedProduct[],
    context: SearchContext,
    services: PluginServices,
  ): MaybePromise<StockCheckedProduct[]>;

  enrichProducts?(
    products: Product[],
    context: SearchContext,
    services: PluginServices,
  ): MaybePromise<Product[]>;

  finalizeResult?(
    result: ConciergeResult,
    context: SearchContext,
    services: PluginServices,
  ): MaybePromise<ConciergeResult>;
}

export interface HookValueMap {
  before_search: SearchContext;
  after_search: Product[];
  after_stock_check: StockCheckedProduct[];
  enrich_products: Product[];
  finalize_result: ConciergeResult;
}

export type BoundHook<T> = (
  value: T,
  context: SearchContext,
  services: PluginServices,
) => MaybePromise<T>;

export interface HookDescriptor<S extends HookStage> {
  readonly stage: S;
  /** The plugin's hook for this stage, or undefined when it has none. */
  resolve(plugin: ConciergePlugin): BoundHook<HookValueMap[S]> | undefined;
  /** Shape check applied to whatever the hook returned. */
  accepts(value: unknown): value is HookValueMap[S];
}

export const PLUGIN_HOOKS: { readonly [S in HookStage]: HookDescriptor<S> } = {
  before_search: {
    stage: 'before_search',
    resolve: (plugin) => {
      const hook = plugin.beforeSearch;
      return hook ? (value, _context, services) => hook.call(plugin, value, services) : undefined;
    },
    accepts: isSearchContext,
  },
  after_search: {
    stage: 'after_search',
    resolve: (plugin) => {
      const hook = plugin.afterSearch;
      return hook ? (value, context, services) => hook.call(plugin, value, context, services) : undefined;
    },
    accepts: isProductList,
  },
  after_stock_check: {
    stage: 'after_stock_check',
    resolve: (plugin) => {
      const hook = plugin.afterStockCheck;
      return hook ? (value, context, services) => hook.call(plugin, value, context, services) : undefined;
    },
    accepts: isStockCheckedProductList,
  },
  enrich_products: {
    stage: 'enrich_products',
    resolve: (plugin) => {
      const hook = plugin.enrichProducts;
      return hook ? (value, context, services) => hook.call(plugin, value, context, services) : undefined;
    },
    accepts: isProductList,
  },
  finalize_result: {
    stage: 'finalize_result',
    resolve: (plugin) => {
      const hook = plugin.finalizeResult;
      return hook ? (value, context, services) => hook.call(plugin, value, context, services) : undefined;
    },
    accepts: isConciergeResult,
  },
};
