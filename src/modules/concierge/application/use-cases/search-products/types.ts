export interface SearchProductsInput {
  productName: string;
  brandName?: string;
  maxProducts?: number;
  postalCode?: string;
  quantity?: number;
  deliveryType?: string;
  countryCode?: string;
  tradePolicy?: number;
  credentials?: Record<string, string>;
  contactInfo?: Record<string, string>;
  requestId?: string;
}

export interface SearchProductsSettings {
  defaultMaxProducts: number;
  maxPayloadKb: number;
}
