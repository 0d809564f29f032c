/**
 * User-facing error messages returned by the HTTP surface.
 */

export const BACKEND_ERROR_MESSAGE =
  'The product search is temporarily unavailable. Please try again in a moment.';

export const INVALID_PAYLOAD_MESSAGE = 'Invalid payload.';

export const TOO_MANY_REQUESTS_MESSAGE = 'Too many search requests. Please slow down.';

export const REGION_NOT_SERVED_MESSAGE =
  "We don't serve your region. Please visit our stores in person.";

export const DELIVERY_TYPE_REQUIRED_MESSAGE =
  'For these products in your region, please tell us the delivery type (Pickup or Delivery).';
