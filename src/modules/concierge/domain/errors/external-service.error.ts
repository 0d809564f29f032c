export type ExternalServiceName = 'commerce' | 'messaging';

export type ExternalServiceEndpointGroup =
  | 'search'
  | 'simulation'
  | 'regions'
  | 'fixed_prices'
  | 'broadcasts'
  | 'conversions'
  | 'flow_starts'
  | 'unknown';

export interface ExternalServiceErrorContext {
  service: ExternalServiceName;
  endpointGroup: ExternalServiceEndpointGroup;
  endpointPath: string;
}

export type ExternalServiceErrorCode = 'network' | 'timeout' | 'http' | 'invalid_payload';

/**
 * Thrown when the commerce backend or the messaging API fails.
 * Preserves status code and error classification for stage error mapping.
 */
export class ExternalServiceError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly errorCode: ExternalServiceErrorCode,
    public readonly responseBody?: unknown,
    public readonly context?: ExternalServiceErrorContext,
  ) {
    super(message);
    this.name = 'ExternalServiceError';
  }

  /** True when the backing service could not be reached or failed server-side. */
  get isUnavailable(): boolean {
    return (
      this.errorCode === 'network' || this.errorCode === 'timeout' || this.statusCode >= 500
    );
  }
}
