import { isRecord } from '../../../../common/utils/object.utils';

/**
 * One purchasable offer: a SKU sold by one seller. The same SKU sold by two
 * sellers is two products.
 */
export interface Product {
  productId: string;
  sellerId: string;
  name: string;
  skuName: string;
  brand: string;
  description: string;
  categories: string[];
  link: string;
  imageUrl: string;
  price: number | null;
  listPrice: number | null;
  spotPrice: number | null;
  variations: string;
  attributes: Record<string, unknown>;
}

export interface StockCheckedProduct extends Product {
  available: boolean;
  availabilityError?: string;
}

export function productIdentityKey(product: Pick<Product, 'productId' | 'sellerId'>): string {
  return `${product.productId}:${product.sellerId}`;
}

function isNullableNumber(value: unknown): boolean {
  return value === null || (typeof value === 'number' && Number.isFinite(value));
}

export function isProduct(value: unknown): value is Product {
  return (
    isRecord(value) &&
    typeof value.productId === 'string' &&
    value.productId.length > 0 &&
    typeof value.sellerId === 'string' &&
    typeof value.name === 'string' &&
    typeof value.skuName === 'string' &&
    typeof value.brand === 'string' &&
    typeof value.description === 'string' &&
    Array.isArray(value.categories) &&
    typeof value.link === 'string' &&
    typeof value.imageUrl === 'string' &&
    isNullableNumber(value.price) &&
    isNullableNumber(value.listPrice) &&
    isNullableNumber(value.spotPrice) &&
    typeof value.variations === 'string' &&
    isRecord(value.attributes)
  );
}

export function isStockCheckedProduct(value: unknown): value is StockCheckedProduct {
  return isRecord(value) && typeof value.available === 'boolean' && isProduct(value);
}

export function isProductList(value: unknown): value is Product[] {
  return Array.isArray(value) && value.every((entry) => isProduct(entry));
}

export function isStockCheckedProductList(value: unknown): value is StockCheckedProduct[] {
  return Array.isArray(value) && value.every((entry) => isStockCheckedProduct(entry));
}
