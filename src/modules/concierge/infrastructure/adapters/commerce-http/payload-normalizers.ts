import { isRecord } from '../../../../../common/utils/object.utils';
import { REGION_NOT_SERVED_MESSAGE } from '../../../../../common/constants/error-messages.constants';
import type {
  CartSimulationResult,
  FixedPrice,
  RegionResolution,
  SimulatedCartItem,
} from '../../../application/ports/commerce-query.port';
import { ExternalServiceError } from '../../../domain/errors';
import type { Product } from '../../../domain/product';
import { resolveCommerceErrorContext } from './commerce-client';

const DESCRIPTION_MAX_LENGTH = 200;

export interface SearchNormalizationOptions {
  storeUrl: string;
  maxProducts: number;
  maxVariations: number;
  utmSource?: string;
  endpointPath: string;
}

interface SellerOffer {
  sellerId: string;
  offer: Record<string, unknown>;
}

export function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return null;
}

export function coerceString(value: unknown): string {
  if (typeof value === 'string') {
    return value.trim();
  }

  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }

  return '';
}

function asRecords(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function asStrings(value: unknown): string[] {
  return Array.isArray(value)
    ? value.filter((entry): entry is string => typeof entry === 'string')
    : [];
}

/**
 * Flattens the intelligent-search payload into one product per SKU and best
 * seller, at most `maxProducts` parents and `maxVariations` SKUs each.
 */
export function normalizeSearchPayload(
  payload: unknown,
  options: SearchNormalizationOptions,
): Product[] {
  if (!isRecord(payload) || !Array.isArray(payload.products)) {
    throw new ExternalServiceError(
      'Commerce backend returned an invalid search payload',
      0,
      'invalid_payload',
      payload,
      resolveCommerceErrorContext(options.endpointPath),
    );
  }

  const products: Product[] = [];
  let parentCount = 0;

  for (const raw of asRecords(payload.products)) {
    if (parentCount >= options.maxProducts) {
      break;
    }

    const offers = normalizeProductOffers(raw, options);
    if (offers.length === 0) {
      continue;
    }

    products.push(...offers);
    parentCount += 1;
  }

  return products;
}

function normalizeProductOffers(
  raw: Record<string, unknown>,
  options: SearchNormalizationOptions,
): Product[] {
  const items = asRecords(raw.items);
  if (items.length === 0) {
    return [];
  }

  const productName = coerceString(raw.productName);
  const productImage = pickImageUrl(items[0].images);
  const shared = {
    name: productName,
    brand: coerceString(raw.brand),
    description: truncateDescription(coerceString(raw.description)),
    categories: asStrings(raw.categories),
    link: buildProductLink(options.storeUrl, coerceString(raw.link), options.utmSource),
  };
  const parentProductId = coerceString(raw.productId);

  const offers: Product[] = [];
  for (const item of items) {
    if (offers.length >= options.maxVariations) {
      break;
    }

    const skuId = coerceString(item.itemId);
    const seller = selectBestSeller(asRecords(item.sellers));
    if (skuId.length === 0 || !seller) {
      continue;
    }

    const prices = extractPrices(seller.offer);
    offers.push({
      productId: skuId,
      sellerId: seller.sellerId,
      ...shared,
      skuName: coerceString(item.nameComplete) || productName,
      imageUrl: pickImageUrl(item.images) || productImage,
      price: prices.price,
      listPrice: prices.listPrice,
      spotPrice: prices.spotPrice,
      variations: formatVariations(item.variations),
      attributes: {
        ...(parentProductId ? { parentProductId } : {}),
        ...(prices.pixPrice !== null ? { pixPrice: prices.pixPrice } : {}),
        ...(prices.creditCardPrice !== null ? { creditCardPrice: prices.creditCardPrice } : {}),
      },
    });
  }

  return offers;
}

/** Default seller with stock, else first seller with stock, else the first seller. */
export function selectBestSeller(sellers: Record<string, unknown>[]): SellerOffer | undefined {
  const candidates = sellers
    .map((seller) => ({
      sellerId: coerceString(seller.sellerId),
      isDefault: seller.sellerDefault === true,
      offer: isRecord(seller.commertialOffer) ? seller.commertialOffer : {},
    }))
    .filter((seller) => seller.sellerId.length > 0);

  const hasStock = (candidate: { offer: Record<string, unknown> }): boolean =>
    (coerceNumber(candidate.offer.AvailableQuantity) ?? 0) > 0;

  const chosen =
    candidates.find((candidate) => candidate.isDefault && hasStock(candidate)) ??
    candidates.find(hasStock) ??
    candidates[0];

  return chosen ? { sellerId: chosen.sellerId, offer: chosen.offer } : undefined;
}

export function extractPrices(offer: Record<string, unknown>): {
  price: number | null;
  listPrice: number | null;
  spotPrice: number | null;
  pixPrice: number | null;
  creditCardPrice: number | null;
} {
  const installments = asRecords(offer.Installments);
  const pix = installments.find((installment) => installment.PaymentSystemName === 'Pix');
  const singleCardPayment = installments.find(
    (installment) =>
      installment.PaymentSystemName === 'Visa' &&
      coerceNumber(installment.NumberOfInstallments) === 1,
  );

  return {
    price: coerceNumber(offer.Price),
    listPrice: coerceNumber(offer.ListPrice),
    spotPrice: coerceNumber(offer.spotPrice),
    pixPrice: pix ? coerceNumber(pix.Value) : null,
    creditCardPrice: singleCardPayment ? coerceNumber(singleCardPayment.Value) : null,
  };
}

/** "[Color: White, Size: M]" from the SKU variation list. */
export function formatVariations(variations: unknown): string {
  const parts = asRecords(variations).flatMap((variation) => {
    const name = coerceString(variation.name);
    const [first] = asStrings(variation.values);
    return name && first ? [`${name}: ${first}`] : [];
  });

  return `[${parts.join(', ')}]`;
}

export function pickImageUrl(images: unknown): string {
  for (const image of asRecords(images)) {
    const url = coerceString(image.imageUrl);
    if (url.length > 0) {
      return url.split('?')[0].split('#')[0];
    }
  }

  return '';
}

function truncateDescription(description: string): string {
  return description.length > DESCRIPTION_MAX_LENGTH
    ? `${description.slice(0, DESCRIPTION_MAX_LENGTH)}...`
    : description;
}

function buildProductLink(storeUrl: string, path: string, utmSource?: string): string {
  const link = `${storeUrl}${path}`;
  return utmSource ? `${link}?utm_source=${encodeURIComponent(utmSource)}` : link;
}

/** Simulation prices arrive in cents. */
export function normalizeSimulationPayload(payload: unknown): CartSimulationResult {
  const items = isRecord(payload) ? asRecords(payload.items) : [];

  return {
    items: items.map(
      (item): SimulatedCartItem => ({
        id: coerceString(item.id),
        seller: coerceString(item.seller),
        quantity: coerceNumber(item.quantity) ?? 0,
        availability: coerceString(item.availability),
        price: centsToUnits(item.price),
        listPrice: centsToUnits(item.listPrice),
      }),
    ),
  };
}

function centsToUnits(value: unknown): number | null {
  const cents = coerceNumber(value);
  return cents === null ? null : cents / 100;
}

/** First region wins; an empty list or a region without sellers is not served. */
export function normalizeRegionsPayload(payload: unknown): RegionResolution {
  const [region] = asRecords(payload);
  const sellers = region
    ? asRecords(region.sellers)
        .map((seller) => coerceString(seller.id))
        .filter((sellerId) => sellerId.length > 0)
    : [];

  if (!region || sellers.length === 0) {
    return { regionId: null, sellers: [], error: REGION_NOT_SERVED_MESSAGE };
  }

  const regionId = coerceString(region.id);
  return { regionId: regionId.length > 0 ? regionId : null, sellers, error: null };
}

export function normalizeFixedPricePayload(payload: unknown): FixedPrice | null {
  const entry = Array.isArray(payload) ? asRecords(payload)[0] : payload;
  if (!isRecord(entry)) {
    return null;
  }

  const minQuantity = coerceNumber(entry.minQuantity);
  const value = coerceNumber(entry.value);
  if (minQuantity === null && value === null) {
    return null;
  }

  return { minQuantity, value };
}
