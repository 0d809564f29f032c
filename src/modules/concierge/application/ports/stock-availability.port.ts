export interface AvailabilityQuery {
  productId: string;
  /** Sellers to simulate against, in preference order. Never empty. */
  sellers: string[];
  postalCode?: string;
  quantity: number;
  countryCode: string;
}

export interface StockAvailability {
  available: boolean;
  /** Seller whose simulated item decided the answer. */
  sellerId: string;
}

export interface StockAvailabilityPort {
  queryAvailability(query: AvailabilityQuery): Promise<StockAvailability>;
}
