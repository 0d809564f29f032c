/**
 * Commerce backend endpoints, relative to the configured base URL.
 */

export interface ProductSearchPathInput {
  query: string;
  tradePolicy?: number;
  regionId?: string;
  hideUnavailableItems?: boolean;
}

export function productSearchEndpoint(input: ProductSearchPathInput): string {
  const segments: string[] = [];
  if (input.tradePolicy) {
    segments.push(`trade-policy/${encodeURIComponent(String(input.tradePolicy))}`);
  }
  if (input.regionId) {
    segments.push(`region-id/${encodeURIComponent(input.regionId)}`);
  }

  const path = segments.length > 0 ? `${segments.join('/')}/` : '';
  const params = new URLSearchParams({
    query: input.query,
    simulationBehavior: 'default',
    hideUnavailableItems: String(input.hideUnavailableItems ?? true),
    allowRedirect: 'false',
  });

  return `/api/io/_v/api/intelligent-search/product_search/${path}?${params.toString()}`;
}

export function cartSimulationEndpoint(): string {
  return '/api/checkout/pub/orderForms/simulation';
}

export function regionsEndpoint(input: {
  countryCode: string;
  postalCode: string;
  tradePolicy: number;
}): string {
  const params = new URLSearchParams({
    country: input.countryCode,
    postalCode: input.postalCode,
    sc: String(input.tradePolicy),
  });

  return `/api/checkout/pub/regions?${params.toString()}`;
}

/** Relative to the storefront URL, not the API base URL. */
export function fixedPriceEndpoint(sellerId: string, skuId: string): string {
  return `/fixedprices/${encodeURIComponent(sellerId)}/${encodeURIComponent(skuId)}/1`;
}
