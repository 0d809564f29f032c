import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../../common/utils/logger';
import { PipelineStageError } from '../../../domain/errors';
import {
  buildSearchQuery,
  cloneSearchContext,
  createSearchContext,
  type SearchContext,
} from '../../../domain/search-context';
import {
  buildFailedOutcome,
  buildSearchOutcome,
  failedPluginNames,
  type ConciergeResult,
  type HookStage,
  type PipelineStage,
  type PluginFailure,
  type SearchOutcome,
} from '../../../domain/search-result';
import type { CommerceQueryPort } from '../../ports/commerce-query.port';
import type { MessagingPort } from '../../ports/messaging.port';
import type { MetricsPort } from '../../ports/metrics.port';
import { COMMERCE_QUERY_PORT, MESSAGING_PORT, METRICS_PORT } from '../../ports/tokens';
import {
  PLUGIN_HOOKS,
  type ConciergePlugin,
  type HookValueMap,
  type PluginServices,
} from '../../plugins/plugin';
import { PluginRegistry } from '../../plugins/plugin-registry';
import { StockEvaluator } from '../../services/stock-evaluator';
import { assembleResult, reconcileStockTags, retainFilteredProducts } from './assemble-result';
import { runHookFold, type HookFoldOutput } from './run-hook-fold';
import type { SearchProductsInput, SearchProductsSettings } from './types';
import { validateSearchInput } from './validate-search-input';

interface PipelineRun {
  requestId?: string;
  plugins: readonly ConciergePlugin[];
  failures: PluginFailure[];
}

/**
 * Runs one product search through the fixed stage sequence:
 * before_search, intelligent_search, after_search, check_availability
 * (with after_stock_check), filter_products, enrich_products (with
 * finalize_result).
 *
 * Plugin failures degrade the outcome to `partial`. Commerce or stock
 * failures end it as `failed` with the stage name. Invalid input throws
 * `SearchValidationError` before any stage runs.
 */
@Injectable()
export class SearchProductsUseCase {
  private readonly logger = createLogger(SearchProductsUseCase.name);
  private readonly settings: SearchProductsSettings;
  private readonly services: PluginServices;

  constructor(
    configService: ConfigService,
    private readonly registry: PluginRegistry,
    private readonly stockEvaluator: StockEvaluator,
    @Inject(COMMERCE_QUERY_PORT)
    private readonly commerce: CommerceQueryPort,
    @Inject(MESSAGING_PORT)
    messaging: MessagingPort,
    @Inject(METRICS_PORT)
    private readonly metricsPort: MetricsPort,
  ) {
    this.settings = {
      defaultMaxProducts: configService.get<number>('CONCIERGE_MAX_PRODUCTS') ?? 20,
      maxPayloadKb: configService.get<number>('CONCIERGE_MAX_PAYLOAD_KB') ?? 20,
    };
    this.services = Object.freeze({ commerce, messaging });
  }

  async execute(
    input: SearchProductsInput,
    plugins: readonly ConciergePlugin[] = this.registry.list(),
  ): Promise<SearchOutcome> {
    const validated = validateSearchInput(input, this.settings.defaultMaxProducts);
    const run: PipelineRun = { requestId: input.requestId, plugins, failures: [] };
    const startedAt = Date.now();

    try {
      const result = await this.runPipeline(run, createSearchContext(validated.context), validated.maxProducts);
      const outcome = buildSearchOutcome(result, run.failures);

      this.metricsPort.incrementSearch({ status: outcome.status });
      this.logger.search('search_completed', {
        event: 'search_completed',
        request_id: run.requestId ?? null,
        status: outcome.status,
        product_count: result.products.length,
        failed_plugins: failedPluginNames(run.failures),
        latency_ms: Date.now() - startedAt,
      });

      return outcome;
    } catch (error: unknown) {
      if (!(error instanceof PipelineStageError)) {
        throw error;
      }

      this.metricsPort.incrementSearch({ status: 'failed' });
      this.logger.warn('search_failed', {
        event: 'search_failed',
        request_id: run.requestId ?? null,
        stage: error.stage,
        error_code: error.code,
        error_message: error.message,
        latency_ms: Date.now() - startedAt,
      });

      return buildFailedOutcome(
        error.stage,
        { code: error.code, message: error.message },
        run.failures,
      );
    }
  }

  private async runPipeline(
    run: PipelineRun,
    initialContext: SearchContext,
    maxProducts: number,
  ): Promise<ConciergeResult> {
    const beforeSearch = await this.runStage('before_search', () =>
      this.fold(run, 'before_search', initialContext, initialContext),
    );
    let context = beforeSearch.value;

    const found = await this.runStage('intelligent_search', () =>
      this.commerce.search({
        query: buildSearchQuery(context),
        maxCount: maxProducts,
        context: cloneSearchContext(context),
      }),
    );

    const afterSearch = await this.runStage('after_search', () =>
      this.fold(run, 'after_search', found, context),
    );
    context = afterSearch.context;

    const stockChecked = await this.runStage('check_availability', async () => {
      const checked = await this.stockEvaluator.check(afterSearch.value, context);
      const folded = await this.fold(run, 'after_stock_check', checked, context);
      return { value: reconcileStockTags(folded.value, checked), context: folded.context };
    });
    context = stockChecked.context;

    const filtered = await this.runStage('filter_products', async () =>
      this.stockEvaluator.limitSize(this.stockEvaluator.filter(stockChecked.value), maxProducts),
    );

    return this.runStage('enrich_products', async () => {
      const enriched = await this.fold(run, 'enrich_products', filtered, context);
      const products = this.stockEvaluator.limitPayloadSize(
        retainFilteredProducts(enriched.value, filtered),
        this.settings.maxPayloadKb,
      );

      const finalized = await this.fold(
        run,
        'finalize_result',
        assembleResult(products, enriched.context),
        enriched.context,
      );

      return {
        products: retainFilteredProducts(finalized.value.products, filtered),
        extras: finalized.value.extras,
      };
    });
  }

  private fold<S extends HookStage>(
    run: PipelineRun,
    stage: S,
    value: HookValueMap[S],
    context: SearchContext,
  ): Promise<HookFoldOutput<S>> {
    return runHookFold({
      hook: PLUGIN_HOOKS[stage],
      plugins: run.plugins,
      value,
      context,
      services: this.services,
      failures: run.failures,
      requestId: run.requestId,
      metrics: this.metricsPort,
    });
  }

  private async runStage<T>(stage: PipelineStage, execute: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();

    try {
      return await execute();
    } catch (error: unknown) {
      throw error instanceof PipelineStageError ? error : new PipelineStageError(stage, error);
    } finally {
      this.metricsPort.observeStageLatency({
        stage,
        seconds: (Date.now() - startedAt) / 1000,
      });
    }
  }
}
