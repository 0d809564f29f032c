import type { ConfigService } from '@nestjs/config';
import type { ConversionEventType } from '../ports/messaging.port';
import { CarouselPlugin } from './carousel.plugin';
import { ConversionEventPlugin } from './conversion-event.plugin';
import { FlowTriggerPlugin } from './flow-trigger.plugin';
import type { ConciergePlugin } from './plugin';
import { PluginRegistry } from './plugin-registry';
import { RegionalizationPlugin, type SellerRules } from './regionalization.plugin';
import { WholesalePlugin } from './wholesale.plugin';

export interface PluginFactoryOptions {
  defaultSeller: string;
  sellerRules: SellerRules;
  priorityCategories: string[];
  requireDeliveryTypeForPriority: boolean;
  conversionEventType: ConversionEventType;
  flowUuid?: string;
  carouselMaxItems: number;
  currencySymbol: string;
}

type PluginFactory = (options: PluginFactoryOptions) => ConciergePlugin;

const PLUGIN_FACTORIES = new Map<string, PluginFactory>([
  [
    'regionalization',
    (options) =>
      new RegionalizationPlugin({
        defaultSeller: options.defaultSeller,
        sellerRules: options.sellerRules,
        priorityCategories: options.priorityCategories,
        requireDeliveryTypeForPriority: options.requireDeliveryTypeForPriority,
      }),
  ],
  ['wholesale', () => new WholesalePlugin()],
  [
    'conversion_event',
    (options) => new ConversionEventPlugin({ eventType: options.conversionEventType }),
  ],
  ['flow_trigger', (options) => new FlowTriggerPlugin({ flowUuid: options.flowUuid })],
  [
    'carousel',
    (options) =>
      new CarouselPlugin({
        maxItems: options.carouselMaxItems,
        currencySymbol: options.currencySymbol,
      }),
  ],
]);

export const AVAILABLE_PLUGIN_NAMES: readonly string[] = [...PLUGIN_FACTORIES.keys()];

/** Builds the registry in the order the names are listed. */
export function buildPluginRegistry(
  names: readonly string[],
  options: PluginFactoryOptions,
): PluginRegistry {
  const registry = new PluginRegistry();

  for (const name of names) {
    const factory = PLUGIN_FACTORIES.get(name);
    if (!factory) {
      throw new Error(
        `Unknown concierge plugin "${name}". Available: ${AVAILABLE_PLUGIN_NAMES.join(', ')}`,
      );
    }

    registry.register(factory(options));
  }

  return registry;
}

export function resolvePluginFactoryOptions(
  configService: Pick<ConfigService, 'get'>,
): PluginFactoryOptions {
  return {
    defaultSeller: configService.get<string>('CONCIERGE_DEFAULT_SELLER') ?? '1',
    sellerRules: configService.get<SellerRules>('CONCIERGE_SELLER_RULES') ?? {},
    priorityCategories: configService.get<string[]>('CONCIERGE_PRIORITY_CATEGORIES') ?? [],
    requireDeliveryTypeForPriority:
      configService.get<boolean>('CONCIERGE_REQUIRE_DELIVERY_TYPE') ?? false,
    conversionEventType:
      configService.get<ConversionEventType>('CONCIERGE_CONVERSION_EVENT_TYPE') ?? 'lead',
    flowUuid: configService.get<string>('CONCIERGE_FLOW_UUID'),
    carouselMaxItems: configService.get<number>('CONCIERGE_CAROUSEL_MAX_ITEMS') ?? 10,
    currencySymbol: configService.get<string>('CONCIERGE_CURRENCY_SYMBOL') ?? 'R$',
  };
}
