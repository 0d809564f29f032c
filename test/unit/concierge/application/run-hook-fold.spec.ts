import { PLUGIN_HOOKS, type ConciergePlugin } from '@/modules/concierge/application/plugins';
import { runHookFold } from '@/modules/concierge/application/use-cases/search-products/run-hook-fold';
import type { Product } from '@/modules/concierge/domain/product';
import { createSearchContext, type SearchContext } from '@/modules/concierge/domain/search-context';
import type { PluginFailure } from '@/modules/concierge/domain/search-result';
import { buildProduct } from '../../../fixtures/concierge/products';
import { buildMetricsFake, buildServices } from '../../../fixtures/concierge/fakes';

describe('runHookFold', () => {
  function foldBeforeSearch(plugins: ConciergePlugin[], failures: PluginFailure[] = []) {
    return runHookFold({
      hook: PLUGIN_HOOKS.before_search,
      plugins,
      value: createSearchContext({ productName: 'drill' }),
      context: createSearchContext({ productName: 'drill' }),
      services: buildServices(),
      failures,
    });
  }

  it('threads each return value into the next plugin', async () => {
    const seen: string[][] = [];
    const plugins: ConciergePlugin[] = [
      {
        name: 'a',
        beforeSearch: (context) => ({ ...context, sellers: [...context.sellers, 'a'] }),
      },
      {
        name: 'b',
        beforeSearch: async (context) => {
          seen.push([...context.sellers]);
          return { ...context, sellers: [...context.sellers, 'b'] };
        },
      },
    ];

    const output = await foldBeforeSearch(plugins);

    expect(seen).toEqual([['a']]);
    expect(output.value.sellers).toEqual(['a', 'b']);
  });

  it('gives the next plugin the pre-failure context when a plugin throws', async () => {
    let receivedBySecond: SearchContext | undefined;
    const failures: PluginFailure[] = [];
    const plugins: ConciergePlugin[] = [
      {
        name: 'a',
        beforeSearch: (context) => {
          context.sellers.push('mutated');
          context.values.marker = 'from-a';
          throw new Error('region service down');
        },
      },
      {
        name: 'b',
        beforeSearch: (context) => {
          receivedBySecond = context;
          return context;
        },
      },
    ];

    const output = await foldBeforeSearch(plugins, failures);

    expect(receivedBySecond?.sellers).toEqual([]);
    expect(receivedBySecond?.values).toEqual({});
    expect(output.value.sellers).toEqual([]);
    expect(failures).toEqual([{ plugin: 'a', stage: 'before_search', message: 'region service down' }]);
  });

  it('records an invalid return value as a failure and keeps the previous value', async () => {
    const failures: PluginFailure[] = [];
    const metrics = buildMetricsFake();
    const products = [buildProduct({ productId: 'a' })];
    const plugin: ConciergePlugin = {
      name: 'broken',
      afterSearch: () => [buildProduct({ productId: '' })],
    };

    const output = await runHookFold({
      hook: PLUGIN_HOOKS.after_search,
      plugins: [plugin],
      value: products,
      context: createSearchContext({ productName: 'drill' }),
      services: buildServices(),
      failures,
      metrics,
    });

    expect(output.value).toEqual(products);
    expect(failures).toEqual([
      {
        plugin: 'broken',
        stage: 'after_search',
        message: 'Plugin "broken" returned an invalid value from after_search',
      },
    ]);
    expect(metrics.incrementPluginFailure).toHaveBeenCalledWith({
      plugin: 'broken',
      stage: 'after_search',
    });
  });

  it('skips plugins that already failed earlier in the request', async () => {
    const hook = jest.fn((products: Product[]) => products);
    const failures: PluginFailure[] = [{ plugin: 'a', stage: 'before_search', message: 'boom' }];

    await runHookFold({
      hook: PLUGIN_HOOKS.after_search,
      plugins: [{ name: 'a', afterSearch: hook }],
      value: [buildProduct()],
      context: createSearchContext({ productName: 'drill' }),
      services: buildServices(),
      failures,
    });

    expect(hook).not.toHaveBeenCalled();
    expect(failures).toHaveLength(1);
  });

  it('commits context edits made by value hooks', async () => {
    const output = await runHookFold({
      hook: PLUGIN_HOOKS.after_search,
      plugins: [
        {
          name: 'annotator',
          afterSearch: (products, context) => {
            context.extraData.note = 'seen';
            return products.slice(0, 1);
          },
        },
      ],
      value: [buildProduct({ productId: 'a' }), buildProduct({ productId: 'b' })],
      context: createSearchContext({ productName: 'drill' }),
      services: buildServices(),
      failures: [],
    });

    expect(output.value.map((product) => product.productId)).toEqual(['a']);
    expect(output.context.extraData).toEqual({ note: 'seen' });
  });

  it('leaves the input value untouched when a hook mutates its argument', async () => {
    const products = [buildProduct({ productId: 'a', name: 'original' })];

    await runHookFold({
      hook: PLUGIN_HOOKS.after_search,
      plugins: [
        {
          name: 'mutator',
          afterSearch: (received) => {
            received[0].name = 'changed';
            return received;
          },
        },
      ],
      value: products,
      context: createSearchContext({ productName: 'drill' }),
      services: buildServices(),
      failures: [],
    });

    expect(products[0].name).toBe('original');
  });
});
