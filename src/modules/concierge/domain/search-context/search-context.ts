import { isRecord, isStringRecord } from '../../../../common/utils/object.utils';

export const DEFAULT_COUNTRY_CODE = 'BRA';
export const DEFAULT_TRADE_POLICY = 1;

/**
 * Per-request state threaded through every pipeline stage and plugin hook.
 *
 * Known keys are typed; plugins exchange anything else through `values`.
 * A missing key means "not resolved yet", never an error.
 */
export interface SearchContext {
  productName: string;
  brandName: string;
  postalCode?: string;
  countryCode: string;
  tradePolicy: number;
  quantity: number;
  deliveryType?: string;
  regionId?: string;
  sellers: string[];
  regionError?: string;
  credentials: Record<string, string>;
  contactInfo: Record<string, string>;
  extraData: Record<string, unknown>;
  values: Record<string, unknown>;
}

export interface CreateSearchContextInput {
  productName: string;
  brandName?: string;
  postalCode?: string;
  countryCode?: string;
  tradePolicy?: number;
  quantity?: number;
  deliveryType?: string;
  credentials?: Record<string, string>;
  contactInfo?: Record<string, string>;
}

export function createSearchContext(input: CreateSearchContextInput): SearchContext {
  return {
    productName: input.productName,
    brandName: input.brandName ?? '',
    ...(input.postalCode ? { postalCode: input.postalCode } : {}),
    countryCode: input.countryCode ?? DEFAULT_COUNTRY_CODE,
    tradePolicy: input.tradePolicy ?? DEFAULT_TRADE_POLICY,
    quantity: input.quantity ?? 1,
    ...(input.deliveryType ? { deliveryType: input.deliveryType } : {}),
    sellers: [],
    credentials: { ...input.credentials },
    contactInfo: { ...input.contactInfo },
    extraData: {},
    values: {},
  };
}

/** Deep copy; throws when a plugin stored a value that cannot be cloned. */
export function cloneSearchContext(context: SearchContext): SearchContext {
  return structuredClone(context);
}

/** Search query sent to the commerce backend. */
export function buildSearchQuery(context: Pick<SearchContext, 'productName' | 'brandName'>): string {
  return `${context.productName} ${context.brandName}`.trim();
}

export function setContextValue(context: SearchContext, key: string, value: unknown): SearchContext {
  context.values[key] = value;
  return context;
}

export function getContextValue(context: SearchContext, key: string): unknown;
export function getContextValue<T>(
  context: SearchContext,
  key: string,
  guard: (value: unknown) => value is T,
): T | undefined;
export function getContextValue<T>(
  context: SearchContext,
  key: string,
  guard?: (value: unknown) => value is T,
): unknown {
  const value = context.values[key];
  if (guard && !guard(value)) {
    return undefined;
  }

  return value;
}

/** Side-channel data copied into the result extras. */
export function addToResult(context: SearchContext, key: string, value: unknown): SearchContext {
  context.extraData[key] = value;
  return context;
}

export function getCredential(context: SearchContext, key: string): string | undefined {
  return context.credentials[key];
}

export function getContact(context: SearchContext, key: string): string | undefined {
  return context.contactInfo[key];
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

export function isSearchContext(value: unknown): value is SearchContext {
  return (
    isRecord(value) &&
    typeof value.productName === 'string' &&
    typeof value.brandName === 'string' &&
    typeof value.countryCode === 'string' &&
    typeof value.tradePolicy === 'number' &&
    typeof value.quantity === 'number' &&
    isOptionalString(value.postalCode) &&
    isOptionalString(value.deliveryType) &&
    isOptionalString(value.regionId) &&
    isOptionalString(value.regionError) &&
    Array.isArray(value.sellers) &&
    value.sellers.every((seller) => typeof seller === 'string') &&
    isStringRecord(value.credentials) &&
    isStringRecord(value.contactInfo) &&
    isRecord(value.extraData) &&
    isRecord(value.values)
  );
}
