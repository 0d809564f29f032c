export { SearchProductsUseCase } from './search-products.use-case';
export type { SearchProductsInput, SearchProductsSettings } from './types';
