import { StockEvaluator } from '@/modules/concierge/application/services/stock-evaluator';
import type {
  AvailabilityQuery,
  StockAvailability,
  StockAvailabilityPort,
} from '@/modules/concierge/application/ports/stock-availability.port';
import { ExternalServiceError } from '@/modules/concierge/domain/errors';
import { createSearchContext } from '@/modules/concierge/domain/search-context';
import { buildCheckedProduct, buildProduct } from '../../../fixtures/concierge/products';
import { buildMetricsFake } from '../../../fixtures/concierge/fakes';

function networkError(): ExternalServiceError {
  return new ExternalServiceError('Commerce backend network error', 0, 'network', undefined, {
    service: 'commerce',
    endpointGroup: 'simulation',
    endpointPath: '/api/checkout/pub/orderForms/simulation',
  });
}

describe('StockEvaluator', () => {
  const context = createSearchContext({
    productName: 'drill',
    postalCode: '01310-100',
    quantity: 2,
  });

  function buildSubject(
    answer: (query: AvailabilityQuery) => Promise<boolean | StockAvailability>,
  ): { evaluator: StockEvaluator; stockPort: StockAvailabilityPort; metrics: ReturnType<typeof buildMetricsFake> } {
    const stockPort: StockAvailabilityPort = {
      queryAvailability: jest.fn(async (query: AvailabilityQuery) => {
        const answered = await answer(query);
        return typeof answered === 'boolean'
          ? { available: answered, sellerId: query.sellers[0] }
          : answered;
      }),
    };
    const metrics = buildMetricsFake();
    return { evaluator: new StockEvaluator(stockPort, metrics), stockPort, metrics };
  }

  it('tags every offer and preserves order and length', async () => {
    const { evaluator, stockPort } = buildSubject(async (query) => query.productId !== 'b');
    const products = [
      buildProduct({ productId: 'a' }),
      buildProduct({ productId: 'b' }),
      buildProduct({ productId: 'c' }),
    ];

    const checked = await evaluator.check(products, context);

    expect(checked.map((product) => [product.productId, product.available])).toEqual([
      ['a', true],
      ['b', false],
      ['c', true],
    ]);
    expect(stockPort.queryAvailability).toHaveBeenCalledWith({
      productId: 'a',
      sellers: ['1'],
      postalCode: '01310-100',
      quantity: 2,
      countryCode: 'BRA',
    });
  });

  it('queries the resolved sellers and re-tags offers with the seller that answered', async () => {
    const { evaluator, stockPort } = buildSubject(async (query) => ({
      available: query.productId === 'a',
      sellerId: query.sellers[1],
    }));
    const regional = { ...context, sellers: ['storeA', 'storeB'] };

    const checked = await evaluator.check(
      [buildProduct({ productId: 'a', sellerId: '1' }), buildProduct({ productId: 'b', sellerId: '1' })],
      regional,
    );

    expect(checked.map((product) => [product.productId, product.sellerId, product.available])).toEqual([
      ['a', 'storeB', true],
      ['b', 'storeB', false],
    ]);
    expect(stockPort.queryAvailability).toHaveBeenCalledWith(
      expect.objectContaining({ productId: 'a', sellers: ['storeA', 'storeB'] }),
    );
  });

  it('marks a failed lookup unavailable without failing the batch', async () => {
    const { evaluator, metrics } = buildSubject(async (query) => {
      if (query.productId === 'b') {
        throw networkError();
      }
      return true;
    });

    const checked = await evaluator.check(
      [buildProduct({ productId: 'a' }), buildProduct({ productId: 'b' })],
      context,
    );

    expect(checked).toHaveLength(2);
    expect(checked[1].available).toBe(false);
    expect(checked[1].availabilityError).toBe('Commerce backend network error');
    expect(metrics.incrementStockUnavailable).toHaveBeenCalledWith({ reason: 'lookup_failed' });
  });

  it('counts out-of-stock answers', async () => {
    const { evaluator, metrics } = buildSubject(async () => false);

    await evaluator.check([buildProduct()], context);

    expect(metrics.incrementStockUnavailable).toHaveBeenCalledWith({ reason: 'out_of_stock' });
  });

  it('rethrows when every lookup fails because the service is unreachable', async () => {
    const { evaluator } = buildSubject(async () => {
      throw networkError();
    });

    await expect(
      evaluator.check([buildProduct({ productId: 'a' }), buildProduct({ productId: 'b' })], context),
    ).rejects.toBeInstanceOf(ExternalServiceError);
  });

  it('does not query anything for an empty list', async () => {
    const { evaluator, stockPort } = buildSubject(async () => true);

    await expect(evaluator.check([], context)).resolves.toEqual([]);
    expect(stockPort.queryAvailability).not.toHaveBeenCalled();
  });

  it('filters, limits and trims by payload size', () => {
    const { evaluator } = buildSubject(async () => true);
    const products = [
      buildCheckedProduct({ productId: 'a' }),
      buildCheckedProduct({ productId: 'b', available: false }),
      buildCheckedProduct({ productId: 'c' }),
    ];

    expect(evaluator.filter(products).map((product) => product.productId)).toEqual(['a', 'c']);
    expect(evaluator.limitSize(products, 1)).toHaveLength(1);
    expect(evaluator.limitPayloadSize(products, 0)).toHaveLength(3);
  });
});
