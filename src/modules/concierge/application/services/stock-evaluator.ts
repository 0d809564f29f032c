import { Inject, Injectable, Optional } from '@nestjs/common';
import { createLogger } from '../../../../common/utils/logger';
import { ExternalServiceError } from '../../domain/errors';
import type { Product, StockCheckedProduct } from '../../domain/product';
import type { SearchContext } from '../../domain/search-context';
import { filterAvailable, limitPayloadSize, limitSize } from '../../domain/stock';
import type { MetricsPort } from '../ports/metrics.port';
import type { StockAvailability, StockAvailabilityPort } from '../ports/stock-availability.port';
import { METRICS_PORT, STOCK_AVAILABILITY_PORT } from '../ports/tokens';

@Injectable()
export class StockEvaluator {
  private readonly logger = createLogger(StockEvaluator.name);

  constructor(
    @Inject(STOCK_AVAILABILITY_PORT)
    private readonly stockPort: StockAvailabilityPort,
    @Optional()
    @Inject(METRICS_PORT)
    private readonly metricsPort?: MetricsPort,
  ) {}

  /**
   * Tags every offer with its availability. Output order and length match
   * the input. When the context carries resolved sellers, each offer is
   * simulated against those sellers only and re-tagged with the seller that
   * answered; otherwise its own seller is queried.
   *
   * A lookup failure marks only that offer unavailable, unless every lookup
   * failed because the stock service is unreachable, in which case the first
   * such error is rethrown.
   */
  async check(products: readonly Product[], context: SearchContext): Promise<StockCheckedProduct[]> {
    if (products.length === 0) {
      return [];
    }

    const outcomes = await Promise.allSettled(
      products.map((product) =>
        this.stockPort.queryAvailability({
          productId: product.productId,
          sellers: context.sellers.length > 0 ? [...context.sellers] : [product.sellerId],
          postalCode: context.postalCode,
          quantity: context.quantity,
          countryCode: context.countryCode,
        }),
      ),
    );

    const unavailableService = resolveServiceOutage(outcomes);
    if (unavailableService) {
      throw unavailableService;
    }

    return outcomes.map((outcome, index) => {
      const product = products[index];

      if (outcome.status === 'fulfilled') {
        const { available, sellerId } = outcome.value;
        if (!available) {
          this.metricsPort?.incrementStockUnavailable({ reason: 'out_of_stock' });
        }
        return { ...product, sellerId, available };
      }

      const message =
        outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
      this.metricsPort?.incrementStockUnavailable({ reason: 'lookup_failed' });
      this.logger.warn('stock_item_lookup_failed', {
        event: 'stock_item_lookup_failed',
        product_id: product.productId,
        seller_id: product.sellerId,
        error_message: message,
      });

      return { ...product, available: false, availabilityError: message };
    });
  }

  filter<T extends StockCheckedProduct>(products: readonly T[]): T[] {
    return filterAvailable(products);
  }

  limitSize<T>(products: readonly T[], maxCount: number): T[] {
    return limitSize(products, maxCount);
  }

  limitPayloadSize<T>(products: readonly T[], maxKb: number): T[] {
    return limitPayloadSize(products, maxKb);
  }
}

function resolveServiceOutage(
  outcomes: ReadonlyArray<PromiseSettledResult<StockAvailability>>,
): ExternalServiceError | undefined {
  const reasons: ExternalServiceError[] = [];

  for (const outcome of outcomes) {
    if (
      outcome.status === 'fulfilled' ||
      !(outcome.reason instanceof ExternalServiceError) ||
      !outcome.reason.isUnavailable
    ) {
      return undefined;
    }

    reasons.push(outcome.reason);
  }

  return reasons[0];
}
