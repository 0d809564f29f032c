import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../../common/utils/logger';
import type {
  CartSimulationInput,
  CartSimulationResult,
  CommerceQueryPort,
  FixedPrice,
  ProductSearchInput,
  RegionLookupInput,
  RegionResolution,
} from '../../../application/ports/commerce-query.port';
import { ExternalServiceError } from '../../../domain/errors';
import type { Product } from '../../../domain/product';
import { getCommerceJson, postCommerceJson } from './commerce-client';
import {
  cartSimulationEndpoint,
  fixedPriceEndpoint,
  productSearchEndpoint,
  regionsEndpoint,
} from './endpoints';
import {
  normalizeFixedPricePayload,
  normalizeRegionsPayload,
  normalizeSearchPayload,
  normalizeSimulationPayload,
} from './payload-normalizers';

export const COMMERCE_APP_KEY_HEADER = 'X-VTEX-API-AppKey';
export const COMMERCE_APP_TOKEN_HEADER = 'X-VTEX-API-AppToken';

@Injectable()
export class CommerceHttpAdapter implements CommerceQueryPort {
  private readonly logger = createLogger(CommerceHttpAdapter.name);
  private readonly baseUrl: string;
  private readonly storeUrl: string;
  private readonly timeoutMs: number;
  private readonly maxVariations: number;
  private readonly utmSource?: string;
  private readonly authHeaders: Record<string, string>;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl = this.configService.get<string>('COMMERCE_BASE_URL') ?? '';
    this.storeUrl = this.configService.get<string>('COMMERCE_STORE_URL') ?? this.baseUrl;
    this.timeoutMs = this.configService.get<number>('COMMERCE_API_TIMEOUT_MS') ?? 8000;
    this.maxVariations = this.configService.get<number>('CONCIERGE_MAX_VARIATIONS') ?? 5;
    this.utmSource = this.configService.get<string>('CONCIERGE_UTM_SOURCE');

    const appKey = this.configService.get<string>('COMMERCE_APP_KEY');
    const appToken = this.configService.get<string>('COMMERCE_APP_TOKEN');
    this.authHeaders =
      appKey && appToken
        ? { [COMMERCE_APP_KEY_HEADER]: appKey, [COMMERCE_APP_TOKEN_HEADER]: appToken }
        : {};
  }

  async search(input: ProductSearchInput): Promise<Product[]> {
    const path = productSearchEndpoint({
      query: input.query,
      tradePolicy: input.context.tradePolicy,
      regionId: input.context.regionId,
    });
    const payload = await getCommerceJson({
      baseUrl: this.baseUrl,
      path,
      timeoutMs: this.timeoutMs,
      headers: this.authHeaders,
    });

    const products = normalizeSearchPayload(payload, {
      storeUrl: this.storeUrl,
      maxProducts: input.maxCount,
      maxVariations: this.maxVariations,
      utmSource: this.utmSource,
      endpointPath: path,
    });

    this.logger.search('commerce_search_completed', {
      event: 'commerce_search_completed',
      query: input.query,
      region_id: input.context.regionId ?? null,
      offers: products.length,
    });

    return products;
  }

  async simulateCart(input: CartSimulationInput): Promise<CartSimulationResult> {
    const payload = await postCommerceJson({
      baseUrl: this.baseUrl,
      path: cartSimulationEndpoint(),
      timeoutMs: this.timeoutMs,
      headers: this.authHeaders,
      body: {
        items: input.items,
        country: input.countryCode,
        ...(input.postalCode ? { postalCode: input.postalCode } : {}),
      },
    });

    return normalizeSimulationPayload(payload);
  }

  async resolveRegion(input: RegionLookupInput): Promise<RegionResolution> {
    const payload = await getCommerceJson({
      baseUrl: this.baseUrl,
      path: regionsEndpoint(input),
      timeoutMs: this.timeoutMs,
      headers: this.authHeaders,
    });

    const resolution = normalizeRegionsPayload(payload);
    if (resolution.error) {
      this.logger.info('commerce_region_not_served', {
        event: 'commerce_region_not_served',
        country_code: input.countryCode,
      });
    }

    return resolution;
  }

  async getFixedPrice(input: { sellerId: string; skuId: string }): Promise<FixedPrice | null> {
    try {
      const payload = await getCommerceJson({
        baseUrl: this.storeUrl,
        path: fixedPriceEndpoint(input.sellerId, input.skuId),
        timeoutMs: this.timeoutMs,
        headers: this.authHeaders,
      });

      return normalizeFixedPricePayload(payload);
    } catch (error: unknown) {
      if (error instanceof ExternalServiceError && error.errorCode === 'http' && !error.isUnavailable) {
        return null;
      }

      throw error;
    }
  }
}
