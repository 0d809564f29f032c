import { DELIVERY_TYPE_REQUIRED_MESSAGE } from '@/common/constants/error-messages.constants';
import type { RegionResolution } from '@/modules/concierge/application/ports/commerce-query.port';
import { REGION_SELLERS_KEY, RegionalizationPlugin } from '@/modules/concierge/application/plugins';
import { createSearchContext, getContextValue } from '@/modules/concierge/domain/search-context';
import { buildProduct } from '../../../../fixtures/concierge/products';
import { buildCommerceFake, buildServices } from '../../../../fixtures/concierge/fakes';

describe('RegionalizationPlugin', () => {
  function buildSubject(region: RegionResolution, plugin = new RegionalizationPlugin({
    defaultSeller: '1',
    sellerRules: {
      restricted_sellers: ['store01', 'store01pickup'],
      pickup_sellers: ['store01pickup'],
      delivery_sellers: ['store01'],
    },
    priorityCategories: ['/Construction/Cement/'],
    requireDeliveryTypeForPriority: true,
  })) {
    const resolveRegion = jest.fn().mockResolvedValue(region);
    const services = buildServices({ commerce: buildCommerceFake({ resolveRegion }) });
    return { plugin, services, resolveRegion };
  }

  it('uses the default seller when there is no postal code', async () => {
    const { plugin, services, resolveRegion } = buildSubject({ regionId: null, sellers: [], error: null });

    const context = await plugin.beforeSearch(createSearchContext({ productName: 'drill' }), services);

    expect(context.sellers).toEqual(['1']);
    expect(resolveRegion).not.toHaveBeenCalled();
  });

  it('stores the region id and sellers resolved from the postal code', async () => {
    const { plugin, services, resolveRegion } = buildSubject({
      regionId: 'v2.REGION01',
      sellers: ['store02', 'store03'],
      error: null,
    });

    const context = await plugin.beforeSearch(
      createSearchContext({ productName: 'drill', postalCode: '01310-100' }),
      services,
    );

    expect(resolveRegion).toHaveBeenCalledWith({
      postalCode: '01310-100',
      countryCode: 'BRA',
      tradePolicy: 1,
    });
    expect(context.regionId).toBe('v2.REGION01');
    expect(context.sellers).toEqual(['store02', 'store03']);
  });

  it('narrows restricted sellers by delivery type', async () => {
    const region = { regionId: 'v2.R', sellers: ['store01', 'store01pickup'], error: null };
    const { plugin, services } = buildSubject(region);

    const pickup = await plugin.beforeSearch(
      createSearchContext({ productName: 'cement', postalCode: '01310-100', deliveryType: 'Retirada' }),
      services,
    );
    const delivery = await plugin.beforeSearch(
      createSearchContext({ productName: 'cement', postalCode: '01310-100', deliveryType: 'Entrega' }),
      services,
    );

    expect(pickup.sellers).toEqual(['store01pickup']);
    expect(delivery.sellers).toEqual(['store01']);
  });

  it('keeps the region error and falls back to the default seller', async () => {
    const { plugin, services } = buildSubject({
      regionId: null,
      sellers: [],
      error: 'region not served',
    });

    const context = await plugin.beforeSearch(
      createSearchContext({ productName: 'drill', postalCode: '99999-999' }),
      services,
    );

    expect(context.regionError).toBe('region not served');
    expect(context.regionId).toBeUndefined();
    expect(context.sellers).toEqual(['1']);
  });

  it('propagates lookup failures to the caller', async () => {
    const { plugin } = buildSubject({ regionId: null, sellers: [], error: null });
    const services = buildServices({
      commerce: buildCommerceFake({
        resolveRegion: jest.fn().mockRejectedValue(new Error('regions down')),
      }),
    });

    await expect(
      plugin.beforeSearch(createSearchContext({ productName: 'drill', postalCode: '01310-100' }), services),
    ).rejects.toThrow('regions down');
  });

  it('asks for a delivery type when a priority product is found in a restricted region', () => {
    const { plugin } = buildSubject({ regionId: null, sellers: [], error: null });
    const context = createSearchContext({ productName: 'cement' });
    context.sellers = ['store01'];
    const products = [buildProduct({ categories: ['/Construction/Cement/'] })];

    const returned = plugin.afterSearch(products, context);

    expect(returned).toBe(products);
    expect(context.extraData).toEqual({ deliveryTypeRequired: DELIVERY_TYPE_REQUIRED_MESSAGE });
  });

  it('judges the region by its resolved sellers after the seller list changes', async () => {
    const region = { regionId: 'v2.R', sellers: ['store01', 'store01pickup'], error: null };
    const { plugin, services } = buildSubject(region);
    const context = await plugin.beforeSearch(
      createSearchContext({ productName: 'cement', postalCode: '01310-100' }),
      services,
    );
    context.sellers = ['store99'];

    plugin.afterSearch([buildProduct({ categories: ['/Construction/Cement/'] })], context);

    expect(getContextValue(context, REGION_SELLERS_KEY)).toEqual(['store01', 'store01pickup']);
    expect(context.extraData).toEqual({ deliveryTypeRequired: DELIVERY_TYPE_REQUIRED_MESSAGE });
  });

  it('does not ask when the delivery type is already known', () => {
    const { plugin } = buildSubject({ regionId: null, sellers: [], error: null });
    const context = createSearchContext({ productName: 'cement', deliveryType: 'Entrega' });
    context.sellers = ['store01'];

    plugin.afterSearch([buildProduct({ categories: ['/Construction/Cement/'] })], context);

    expect(context.extraData).toEqual({});
  });
});
