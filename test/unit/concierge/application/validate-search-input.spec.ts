import { validateSearchInput } from '@/modules/concierge/application/use-cases/search-products/validate-search-input';
import { SearchValidationError } from '@/modules/concierge/domain/errors';

describe('validateSearchInput', () => {
  it('trims fields and applies the default product limit', () => {
    const validated = validateSearchInput(
      { productName: '  drill ', brandName: ' ', postalCode: '01310-100', countryCode: 'bra' },
      20,
    );

    expect(validated).toEqual({
      maxProducts: 20,
      context: {
        productName: 'drill',
        brandName: undefined,
        postalCode: '01310-100',
        countryCode: 'BRA',
        tradePolicy: undefined,
        quantity: undefined,
        deliveryType: undefined,
        credentials: undefined,
        contactInfo: undefined,
      },
    });
  });

  it('rejects a blank product name', () => {
    expect(() => validateSearchInput({ productName: '   ' }, 20)).toThrow(
      new SearchValidationError('productName', 'productName must be a non-empty string'),
    );
  });

  it('rejects non-positive counts', () => {
    expect(() => validateSearchInput({ productName: 'drill', maxProducts: 0 }, 20)).toThrow(
      'maxProducts must be a positive integer',
    );
    expect(() => validateSearchInput({ productName: 'drill', quantity: 1.5 }, 20)).toThrow(
      'quantity must be a positive integer',
    );
  });

  it('rejects malformed country codes', () => {
    expect(() => validateSearchInput({ productName: 'drill', countryCode: 'BR' }, 20)).toThrow(
      'countryCode must be a 3-letter country code',
    );
  });

  it('keeps an explicit product limit', () => {
    expect(validateSearchInput({ productName: 'drill', maxProducts: 10 }, 20).maxProducts).toBe(10);
  });
});
