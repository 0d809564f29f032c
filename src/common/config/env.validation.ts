import { isStringArray } from '../utils/object.utils';

export interface SellerRulesConfig {
  restricted_sellers?: string[];
  pickup_sellers?: string[];
  delivery_sellers?: string[];
}

const SELLER_RULE_KEYS = ['restricted_sellers', 'pickup_sellers', 'delivery_sellers'] as const;

export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  PORT: number;
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
  ALLOWED_ORIGINS: string[];
  COMMERCE_BASE_URL: string;
  COMMERCE_STORE_URL: string;
  COMMERCE_API_TIMEOUT_MS: number;
  COMMERCE_APP_KEY?: string;
  COMMERCE_APP_TOKEN?: string;
  MESSAGING_API_URL: string;
  MESSAGING_API_TOKEN?: string;
  MESSAGING_TIMEOUT_MS: number;
  CONCIERGE_MAX_PRODUCTS: number;
  CONCIERGE_MAX_VARIATIONS: number;
  CONCIERGE_MAX_PAYLOAD_KB: number;
  CONCIERGE_UTM_SOURCE?: string;
  CONCIERGE_PLUGINS: string[];
  CONCIERGE_DEFAULT_SELLER: string;
  CONCIERGE_PRIORITY_CATEGORIES: string[];
  CONCIERGE_SELLER_RULES: SellerRulesConfig;
  CONCIERGE_REQUIRE_DELIVERY_TYPE: boolean;
  CONCIERGE_CURRENCY_SYMBOL: string;
  CONCIERGE_CONVERSION_EVENT_TYPE: 'lead' | 'purchase';
  CONCIERGE_FLOW_UUID?: string;
  CONCIERGE_CAROUSEL_MAX_ITEMS: number;
}

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function parsePositiveInteger(key: string, value: unknown, fallback: number): number {
  const parsed = parseNumber(value, fallback);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${key} must be a positive integer`);
  }

  return parsed;
}

function parseList(value: unknown): string[] {
  if (typeof value !== 'string' || value.trim() === '') {
    return [];
  }

  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function parseOptionalString(value: unknown): string | undefined {
  return String(value ?? '').trim() || undefined;
}

function parseBoolean(value: unknown, fallback: boolean): boolean {
  if (typeof value === 'boolean') {
    return value;
  }

  if (typeof value !== 'string') {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return true;
  }
  if (normalized === 'false' || normalized === '0' || normalized === 'no') {
    return false;
  }

  return fallback;
}

/** JSON object whose known keys hold seller id lists. */
function parseSellerRules(value: unknown): SellerRulesConfig {
  if (typeof value !== 'string' || value.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new Error('CONCIERGE_SELLER_RULES must be valid JSON');
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('CONCIERGE_SELLER_RULES must be a JSON object');
  }

  const rules: SellerRulesConfig = {};
  for (const key of SELLER_RULE_KEYS) {
    const sellers: unknown = Reflect.get(parsed, key);
    if (sellers === undefined) {
      continue;
    }
    if (!isStringArray(sellers)) {
      throw new Error(`CONCIERGE_SELLER_RULES.${key} must be an array of seller ids`);
    }
    rules[key] = sellers;
  }

  return rules;
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (
    value === 'debug' ||
    value === 'warn' ||
    value === 'error' ||
    value === 'info' ||
    value === 'log'
  ) {
    return value;
  }

  return 'log';
}

function parseConversionEventType(value: unknown): AppEnv['CONCIERGE_CONVERSION_EVENT_TYPE'] {
  if (value === undefined || value === null || value === '' || value === 'lead') {
    return 'lead';
  }
  if (value === 'purchase') {
    return value;
  }

  throw new Error('CONCIERGE_CONVERSION_EVENT_TYPE must be one of: lead, purchase');
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const NODE_ENV = parseNodeEnv(config.NODE_ENV);
  const COMMERCE_BASE_URL = stripTrailingSlash(String(config.COMMERCE_BASE_URL ?? '').trim());
  const ALLOWED_ORIGINS = parseList(config.ALLOWED_ORIGINS);

  if (COMMERCE_BASE_URL.length === 0) {
    throw new Error('COMMERCE_BASE_URL is required');
  }

  if (NODE_ENV === 'production' && ALLOWED_ORIGINS.length === 0) {
    throw new Error('ALLOWED_ORIGINS is required in production');
  }

  const COMMERCE_APP_KEY = parseOptionalString(config.COMMERCE_APP_KEY);
  const COMMERCE_APP_TOKEN = parseOptionalString(config.COMMERCE_APP_TOKEN);
  if (Boolean(COMMERCE_APP_KEY) !== Boolean(COMMERCE_APP_TOKEN)) {
    throw new Error('COMMERCE_APP_KEY and COMMERCE_APP_TOKEN must be set together');
  }

  return {
    NODE_ENV,
    PORT: parseNumber(config.PORT, 3090),
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
    ALLOWED_ORIGINS,
    COMMERCE_BASE_URL,
    COMMERCE_STORE_URL:
      stripTrailingSlash(String(config.COMMERCE_STORE_URL ?? '').trim()) || COMMERCE_BASE_URL,
    COMMERCE_API_TIMEOUT_MS: Math.max(1000, parseNumber(config.COMMERCE_API_TIMEOUT_MS, 8000)),
    COMMERCE_APP_KEY,
    COMMERCE_APP_TOKEN,
    MESSAGING_API_URL:
      stripTrailingSlash(String(config.MESSAGING_API_URL ?? '').trim()) ||
      'http://localhost:8000',
    MESSAGING_API_TOKEN: parseOptionalString(config.MESSAGING_API_TOKEN),
    MESSAGING_TIMEOUT_MS: Math.max(1000, parseNumber(config.MESSAGING_TIMEOUT_MS, 10_000)),
    CONCIERGE_MAX_PRODUCTS: parsePositiveInteger(
      'CONCIERGE_MAX_PRODUCTS',
      config.CONCIERGE_MAX_PRODUCTS,
      20,
    ),
    CONCIERGE_MAX_VARIATIONS: parsePositiveInteger(
      'CONCIERGE_MAX_VARIATIONS',
      config.CONCIERGE_MAX_VARIATIONS,
      5,
    ),
    CONCIERGE_MAX_PAYLOAD_KB: parsePositiveInteger(
      'CONCIERGE_MAX_PAYLOAD_KB',
      config.CONCIERGE_MAX_PAYLOAD_KB,
      20,
    ),
    CONCIERGE_UTM_SOURCE: parseOptionalString(config.CONCIERGE_UTM_SOURCE),
    CONCIERGE_PLUGINS: parseList(config.CONCIERGE_PLUGINS),
    CONCIERGE_DEFAULT_SELLER: parseOptionalString(config.CONCIERGE_DEFAULT_SELLER) ?? '1',
    CONCIERGE_PRIORITY_CATEGORIES: parseList(config.CONCIERGE_PRIORITY_CATEGORIES),
    CONCIERGE_SELLER_RULES: parseSellerRules(config.CONCIERGE_SELLER_RULES),
    CONCIERGE_REQUIRE_DELIVERY_TYPE: parseBoolean(config.CONCIERGE_REQUIRE_DELIVERY_TYPE, false),
    CONCIERGE_CURRENCY_SYMBOL: parseOptionalString(config.CONCIERGE_CURRENCY_SYMBOL) ?? 'R$',
    CONCIERGE_CONVERSION_EVENT_TYPE: parseConversionEventType(
      config.CONCIERGE_CONVERSION_EVENT_TYPE,
    ),
    CONCIERGE_FLOW_UUID: parseOptionalString(config.CONCIERGE_FLOW_UUID),
    CONCIERGE_CAROUSEL_MAX_ITEMS: parsePositiveInteger(
      'CONCIERGE_CAROUSEL_MAX_ITEMS',
      config.CONCIERGE_CAROUSEL_MAX_ITEMS,
      10,
    ),
  };
}
