export {
  addToResult,
  buildSearchQuery,
  cloneSearchContext,
  createSearchContext,
  DEFAULT_COUNTRY_CODE,
  DEFAULT_TRADE_POLICY,
  getContact,
  getContextValue,
  getCredential,
  isSearchContext,
  setContextValue,
  type CreateSearchContextInput,
  type SearchContext,
} from './search-context';
