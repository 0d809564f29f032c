export { CarouselPlugin, type CarouselOptions } from './carousel.plugin';
export { ConversionEventPlugin, type ConversionEventOptions } from './conversion-event.plugin';
export { FlowTriggerPlugin, type FlowTriggerOptions } from './flow-trigger.plugin';
export {
  PLUGIN_HOOKS,
  type BoundHook,
  type ConciergePlugin,
  type HookDescriptor,
  type HookValueMap,
  type MaybePromise,
  type PluginServices,
} from './plugin';
export {
  AVAILABLE_PLUGIN_NAMES,
  buildPluginRegistry,
  resolvePluginFactoryOptions,
  type PluginFactoryOptions,
} from './plugin-factory';
export { PluginRegistry } from './plugin-registry';
export {
  REGION_SELLERS_KEY,
  RegionalizationPlugin,
  type RegionalizationOptions,
  type SellerRules,
} from './regionalization.plugin';
export { WholesalePlugin } from './wholesale.plugin';
