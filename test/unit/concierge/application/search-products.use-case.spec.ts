import type {
  CommerceQueryPort,
  ProductSearchInput,
} from '@/modules/concierge/application/ports/commerce-query.port';
import type { MessagingPort } from '@/modules/concierge/application/ports/messaging.port';
import type {
  AvailabilityQuery,
  StockAvailabilityPort,
} from '@/modules/concierge/application/ports/stock-availability.port';
import {
  CarouselPlugin,
  PluginRegistry,
  RegionalizationPlugin,
  type ConciergePlugin,
} from '@/modules/concierge/application/plugins';
import { StockEvaluator } from '@/modules/concierge/application/services/stock-evaluator';
import { SearchProductsUseCase } from '@/modules/concierge/application/use-cases/search-products';
import { ExternalServiceError, SearchValidationError, StockItemError } from '@/modules/concierge/domain/errors';
import type { Product } from '@/modules/concierge/domain/product';
import type { SearchContext } from '@/modules/concierge/domain/search-context';
import type { SearchOutcome } from '@/modules/concierge/domain/search-result';
import { buildConfigService } from '../../../fixtures/concierge/config';
import { buildCommerceFake, buildMessagingFake, buildMetricsFake } from '../../../fixtures/concierge/fakes';
import { buildProduct } from '../../../fixtures/concierge/products';

interface SubjectDeps {
  commerce: CommerceQueryPort;
  messaging: MessagingPort;
  stockPort: StockAvailabilityPort;
  plugins: ConciergePlugin[];
  config: Record<string, unknown>;
}

function buildSubject(deps: Partial<SubjectDeps> = {}) {
  const commerce = deps.commerce ?? buildCommerceFake();
  const messaging = deps.messaging ?? buildMessagingFake();
  const stockPort = deps.stockPort ?? {
    queryAvailability: jest.fn(async (query: AvailabilityQuery) => ({
      available: true,
      sellerId: query.sellers[0],
    })),
  };
  const metrics = buildMetricsFake();
  const useCase = new SearchProductsUseCase(
    buildConfigService(deps.config ?? { CONCIERGE_MAX_PRODUCTS: 20, CONCIERGE_MAX_PAYLOAD_KB: 20 }),
    new PluginRegistry(deps.plugins ?? []),
    new StockEvaluator(stockPort, metrics),
    commerce,
    messaging,
    metrics,
  );

  return { useCase, commerce, messaging, metrics };
}

function productIds(outcome: SearchOutcome): string[] {
  return outcome.status === 'failed' ? [] : outcome.products.map((product) => product.productId);
}

function offers(count: number) {
  return Array.from({ length: count }, (_, index) => buildProduct({ productId: `p${index + 1}` }));
}

describe('SearchProductsUseCase', () => {
  it('searches with the product name and requested limit when no plugins are registered', async () => {
    const search = jest.fn().mockResolvedValue(offers(3));
    const { useCase, metrics } = buildSubject({ commerce: buildCommerceFake({ search }) });

    const outcome = await useCase.execute({ productName: 'drill', maxProducts: 10 });

    expect(search).toHaveBeenCalledTimes(1);
    expect(search.mock.calls[0][0]).toMatchObject({ query: 'drill', maxCount: 10 });
    expect(outcome).toEqual({
      status: 'complete',
      products: offers(3).map((product) => ({ ...product, available: true })),
      extras: {},
    });
    expect(metrics.incrementSearch).toHaveBeenCalledWith({ status: 'complete' });
  });

  it('resolves the region before searching', async () => {
    let searchedContext: SearchContext | undefined;
    const commerce = buildCommerceFake({
      resolveRegion: jest.fn().mockResolvedValue({ regionId: 'v2.REGION01', sellers: ['1'], error: null }),
      search: jest.fn(async (input: ProductSearchInput) => {
        searchedContext = input.context;
        return offers(1);
      }),
    });
    const { useCase } = buildSubject({ commerce, plugins: [new RegionalizationPlugin()] });

    const outcome = await useCase.execute({ productName: 'drill', postalCode: '01310-100' });

    expect(searchedContext?.regionId).toBe('v2.REGION01');
    expect(searchedContext?.sellers).toEqual(['1']);
    expect(outcome.status).toBe('complete');
  });

  it('checks stock only against the pickup sellers of a restricted region', async () => {
    const queries: AvailabilityQuery[] = [];
    const stockPort: StockAvailabilityPort = {
      queryAvailability: jest.fn(async (query: AvailabilityQuery) => {
        queries.push(query);
        return { available: true, sellerId: query.sellers[0] };
      }),
    };
    const commerce = buildCommerceFake({
      resolveRegion: jest
        .fn()
        .mockResolvedValue({ regionId: 'R1', sellers: ['storeA', 'storeB'], error: null }),
      search: jest.fn().mockResolvedValue([
        buildProduct({ productId: 'p1', sellerId: 'storeB' }),
        buildProduct({ productId: 'p2', sellerId: 'storeB' }),
      ]),
    });
    const regionalization = new RegionalizationPlugin({
      sellerRules: { restricted_sellers: ['storeA', 'storeB'], pickup_sellers: ['storeA'] },
    });
    const { useCase } = buildSubject({ commerce, stockPort, plugins: [regionalization] });

    const outcome = await useCase.execute({
      productName: 'drill',
      postalCode: '01310-100',
      deliveryType: 'Retirada',
    });

    expect(queries.map((query) => query.sellers)).toEqual([['storeA'], ['storeA']]);
    expect(
      outcome.status === 'complete' &&
        outcome.products.map((product) => `${product.productId}:${product.sellerId}`),
    ).toEqual(['p1:storeA', 'p2:storeA']);
  });

  it('reports the region message when the postal code is not served', async () => {
    const commerce = buildCommerceFake({
      resolveRegion: jest.fn().mockResolvedValue({ regionId: null, sellers: [], error: 'region not served' }),
      search: jest.fn().mockResolvedValue(offers(1)),
    });
    const { useCase } = buildSubject({ commerce, plugins: [new RegionalizationPlugin()] });

    const outcome = await useCase.execute({ productName: 'drill', postalCode: '99999-999' });

    expect(outcome.status).toBe('complete');
    expect(outcome.status !== 'failed' && outcome.extras).toEqual({ regionMessage: 'region not served' });
  });

  it('drops the offer whose stock lookup failed and keeps the rest', async () => {
    const stockPort: StockAvailabilityPort = {
      queryAvailability: jest.fn(async (query: AvailabilityQuery) => {
        if (query.productId === 'p3') {
          throw new StockItemError('p3', '1', 'item missing from simulation');
        }
        return { available: true, sellerId: query.sellers[0] };
      }),
    };
    const { useCase } = buildSubject({
      commerce: buildCommerceFake({ search: jest.fn().mockResolvedValue(offers(5)) }),
      stockPort,
    });

    const outcome = await useCase.execute({ productName: 'drill' });

    expect(productIds(outcome)).toEqual(['p1', 'p2', 'p4', 'p5']);
  });

  it('returns a partial result with intact products when a finalize send fails', async () => {
    const messaging = buildMessagingFake({
      sendMessage: jest.fn().mockRejectedValue(new Error('broadcast failed')),
    });
    const { useCase, metrics } = buildSubject({
      commerce: buildCommerceFake({ search: jest.fn().mockResolvedValue(offers(2)) }),
      messaging,
      plugins: [new CarouselPlugin()],
    });

    const outcome = await useCase.execute({
      productName: 'drill',
      contactInfo: { urn: 'whatsapp:5511000000000' },
    });

    expect(outcome).toEqual({
      status: 'partial',
      products: offers(2).map((product) => ({ ...product, available: true })),
      extras: {},
      pluginFailures: [{ plugin: 'carousel', stage: 'finalize_result', message: 'broadcast failed' }],
    });
    expect(metrics.incrementSearch).toHaveBeenCalledWith({ status: 'partial' });
  });

  it('runs the next plugin on the pre-failure context when a before-search hook throws', async () => {
    let seenByB: SearchContext | undefined;
    const pluginA: ConciergePlugin = {
      name: 'a',
      beforeSearch: (context) => {
        context.values.fromA = true;
        throw new Error('a failed');
      },
      afterSearch: jest.fn((products: Product[]) => products),
    };
    const pluginB: ConciergePlugin = {
      name: 'b',
      beforeSearch: (context) => {
        seenByB = context;
        context.values.fromB = true;
        return context;
      },
    };
    const search = jest.fn().mockResolvedValue(offers(1));
    const { useCase } = buildSubject({
      commerce: buildCommerceFake({ search }),
      plugins: [pluginA, pluginB],
    });

    const outcome = await useCase.execute({ productName: 'drill' });

    expect(seenByB?.values).toEqual({ fromB: true });
    expect(search.mock.calls[0][0].context.values).toEqual({ fromB: true });
    expect(pluginA.afterSearch).not.toHaveBeenCalled();
    expect(outcome.status).toBe('partial');
    expect(outcome.status === 'partial' && outcome.pluginFailures).toEqual([
      { plugin: 'a', stage: 'before_search', message: 'a failed' },
    ]);
  });

  it('keeps out-of-stock offers out even when a stock hook marks them available', async () => {
    const stockPort: StockAvailabilityPort = {
      queryAvailability: jest.fn(async (query: AvailabilityQuery) => ({
        available: query.productId !== 'p2',
        sellerId: query.sellers[0],
      })),
    };
    const optimist: ConciergePlugin = {
      name: 'optimist',
      afterStockCheck: (products) => products.map((product) => ({ ...product, available: true })),
    };
    const { useCase } = buildSubject({
      commerce: buildCommerceFake({ search: jest.fn().mockResolvedValue(offers(3)) }),
      stockPort,
      plugins: [optimist],
    });

    const outcome = await useCase.execute({ productName: 'drill' });

    expect(productIds(outcome)).toEqual(['p1', 'p3']);
  });

  it('limits the result to the requested number of offers', async () => {
    const { useCase } = buildSubject({
      commerce: buildCommerceFake({ search: jest.fn().mockResolvedValue(offers(5)) }),
    });

    const outcome = await useCase.execute({ productName: 'drill', maxProducts: 2 });

    expect(productIds(outcome)).toEqual(['p1', 'p2']);
  });

  it('fails at the search stage when the commerce backend times out', async () => {
    const timeout = new ExternalServiceError('Commerce backend request timeout', 0, 'timeout', undefined, {
      service: 'commerce',
      endpointGroup: 'search',
      endpointPath: '/api/io/_v/api/intelligent-search/product_search/',
    });
    const { useCase, metrics } = buildSubject({
      commerce: buildCommerceFake({ search: jest.fn().mockRejectedValue(timeout) }),
    });

    const outcome = await useCase.execute({ productName: 'drill' });

    expect(outcome).toEqual({
      status: 'failed',
      stage: 'intelligent_search',
      error: { code: 'commerce_timeout', message: 'Commerce backend request timeout' },
      pluginFailures: [],
    });
    expect(metrics.incrementSearch).toHaveBeenCalledWith({ status: 'failed' });
  });

  it('fails at the availability stage when the stock service is unreachable', async () => {
    const stockPort: StockAvailabilityPort = {
      queryAvailability: jest.fn().mockRejectedValue(
        new ExternalServiceError('Commerce backend error 503', 503, 'http'),
      ),
    };
    const { useCase } = buildSubject({
      commerce: buildCommerceFake({ search: jest.fn().mockResolvedValue(offers(2)) }),
      stockPort,
    });

    const outcome = await useCase.execute({ productName: 'drill' });

    expect(outcome.status === 'failed' && outcome.stage).toBe('check_availability');
    expect(outcome.status === 'failed' && outcome.error.code).toBe('external_http');
  });

  it('rejects invalid input before any stage runs', async () => {
    const search = jest.fn().mockResolvedValue([]);
    const { useCase } = buildSubject({ commerce: buildCommerceFake({ search }) });

    await expect(useCase.execute({ productName: '' })).rejects.toBeInstanceOf(SearchValidationError);
    expect(search).not.toHaveBeenCalled();
  });

  it('keeps plugin additions out of the final products', async () => {
    const injector: ConciergePlugin = {
      name: 'injector',
      enrichProducts: (products) => [...products, buildProduct({ productId: 'injected' })],
      finalizeResult: (result) => ({
        products: [...result.products, buildProduct({ productId: 'late' })],
        extras: { ...result.extras, enriched: true },
      }),
    };
    const { useCase } = buildSubject({
      commerce: buildCommerceFake({ search: jest.fn().mockResolvedValue(offers(1)) }),
      plugins: [injector],
    });

    const outcome = await useCase.execute({ productName: 'drill' });

    expect(productIds(outcome)).toEqual(['p1']);
    expect(outcome.status !== 'failed' && outcome.extras).toEqual({ enriched: true });
  });
});
