import { isRecord } from '../../../../common/utils/object.utils';
import { isProductList, type Product } from '../product';

export type PipelineStage =
  | 'before_search'
  | 'intelligent_search'
  | 'after_search'
  | 'check_availability'
  | 'filter_products'
  | 'enrich_products';

export type HookStage =
  | 'before_search'
  | 'after_search'
  | 'after_stock_check'
  | 'enrich_products'
  | 'finalize_result';

/** Result under construction, as seen by `finalizeResult` hooks. */
export interface ConciergeResult {
  products: Product[];
  extras: Record<string, unknown>;
}

export interface PluginFailure {
  plugin: string;
  stage: HookStage;
  message: string;
}

export interface SearchError {
  code: string;
  message: string;
}

export type SearchOutcome =
  | {
      status: 'complete';
      products: Product[];
      extras: Record<string, unknown>;
    }
  | {
      status: 'partial';
      products: Product[];
      extras: Record<string, unknown>;
      pluginFailures: PluginFailure[];
    }
  | {
      status: 'failed';
      stage: PipelineStage;
      error: SearchError;
      pluginFailures: PluginFailure[];
    };

export type SearchStatus = SearchOutcome['status'];

export function isConciergeResult(value: unknown): value is ConciergeResult {
  return isRecord(value) && isProductList(value.products) && isRecord(value.extras);
}

export function buildSearchOutcome(
  result: ConciergeResult,
  pluginFailures: readonly PluginFailure[],
): SearchOutcome {
  if (pluginFailures.length === 0) {
    return {
      status: 'complete',
      products: result.products,
      extras: result.extras,
    };
  }

  return {
    status: 'partial',
    products: result.products,
    extras: result.extras,
    pluginFailures: [...pluginFailures],
  };
}

export function buildFailedOutcome(
  stage: PipelineStage,
  error: SearchError,
  pluginFailures: readonly PluginFailure[],
): SearchOutcome {
  return {
    status: 'failed',
    stage,
    error,
    pluginFailures: [...pluginFailures],
  };
}

/** Plugin names in first-failure order, without repeats. */
export function failedPluginNames(pluginFailures: readonly PluginFailure[]): string[] {
  return [...new Set(pluginFailures.map((failure) => failure.plugin))];
}
