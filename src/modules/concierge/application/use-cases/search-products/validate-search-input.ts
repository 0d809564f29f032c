import { isStringRecord } from '../../../../../common/utils/object.utils';
import { SearchValidationError } from '../../../domain/errors';
import type { CreateSearchContextInput } from '../../../domain/search-context';
import type { SearchProductsInput } from './types';

export interface ValidatedSearchInput {
  context: CreateSearchContextInput;
  maxProducts: number;
}

const COUNTRY_CODE_PATTERN = /^[A-Z]{3}$/;

/** Rejects malformed caller input before any stage runs. */
export function validateSearchInput(
  input: SearchProductsInput,
  defaultMaxProducts: number,
): ValidatedSearchInput {
  const productName = trimmedText(input.productName);
  if (!productName) {
    throw new SearchValidationError('productName', 'productName must be a non-empty string');
  }

  const maxProducts = resolvePositiveInteger('maxProducts', input.maxProducts) ?? defaultMaxProducts;
  const quantity = resolvePositiveInteger('quantity', input.quantity);
  const tradePolicy = resolvePositiveInteger('tradePolicy', input.tradePolicy);

  const countryCode = trimmedText(input.countryCode)?.toUpperCase();
  if (countryCode !== undefined && !COUNTRY_CODE_PATTERN.test(countryCode)) {
    throw new SearchValidationError('countryCode', 'countryCode must be a 3-letter country code');
  }

  if (input.credentials !== undefined && !isStringRecord(input.credentials)) {
    throw new SearchValidationError('credentials', 'credentials must map names to strings');
  }

  if (input.contactInfo !== undefined && !isStringRecord(input.contactInfo)) {
    throw new SearchValidationError('contactInfo', 'contactInfo must map names to strings');
  }

  return {
    maxProducts,
    context: {
      productName,
      brandName: trimmedText(input.brandName),
      postalCode: trimmedText(input.postalCode),
      countryCode,
      tradePolicy,
      quantity,
      deliveryType: trimmedText(input.deliveryType),
      credentials: input.credentials,
      contactInfo: input.contactInfo,
    },
  };
}

function resolvePositiveInteger(field: string, value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (!Number.isInteger(value) || value <= 0) {
    throw new SearchValidationError(field, `${field} must be a positive integer`);
  }

  return value;
}

/** Trimmed text field; blank or non-string input counts as absent. */
function trimmedText(value: unknown): string | undefined {
  const text = typeof value === 'string' ? value.trim() : '';
  return text === '' ? undefined : text;
}
