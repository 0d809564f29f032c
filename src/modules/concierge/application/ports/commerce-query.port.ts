import type { Product } from '../../domain/product';
import type { SearchContext } from '../../domain/search-context';

export interface ProductSearchInput {
  query: string;
  maxCount: number;
  context: SearchContext;
}

export interface CartItem {
  id: string;
  quantity: number;
  seller: string;
}

export interface CartSimulationInput {
  items: CartItem[];
  countryCode: string;
  postalCode?: string;
}

export interface SimulatedCartItem {
  id: string;
  seller: string;
  quantity: number;
  availability: string;
  price: number | null;
  listPrice: number | null;
}

export interface CartSimulationResult {
  items: SimulatedCartItem[];
}

export interface RegionLookupInput {
  postalCode: string;
  countryCode: string;
  tradePolicy: number;
}

export interface RegionResolution {
  regionId: string | null;
  sellers: string[];
  error: string | null;
}

export interface FixedPrice {
  minQuantity: number | null;
  value: number | null;
}

export interface CommerceQueryPort {
  /** Offers in backend relevance order, at most `maxCount` parent products. */
  search(input: ProductSearchInput): Promise<Product[]>;

  simulateCart(input: CartSimulationInput): Promise<CartSimulationResult>;

  /** An unserved region is reported through `error`, not thrown. */
  resolveRegion(input: RegionLookupInput): Promise<RegionResolution>;

  /** Null when the seller has no fixed price for the SKU. */
  getFixedPrice(input: { sellerId: string; skuId: string }): Promise<FixedPrice | null>;
}
