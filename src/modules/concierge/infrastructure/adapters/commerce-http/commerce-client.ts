import type {
  ExternalServiceEndpointGroup,
  ExternalServiceErrorContext,
} from '../../../domain/errors';
import { requestJson } from '../shared';

export interface CommerceRequest {
  baseUrl: string;
  path: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  body?: unknown;
}

export function getCommerceJson(request: CommerceRequest): Promise<unknown> {
  return requestJson({
    url: `${request.baseUrl}${request.path}`,
    method: 'GET',
    timeoutMs: request.timeoutMs,
    headers: request.headers,
    context: resolveCommerceErrorContext(request.path),
  });
}

export function postCommerceJson(request: CommerceRequest): Promise<unknown> {
  return requestJson({
    url: `${request.baseUrl}${request.path}`,
    method: 'POST',
    timeoutMs: request.timeoutMs,
    headers: request.headers,
    body: request.body ?? {},
    context: resolveCommerceErrorContext(request.path),
  });
}

export function resolveCommerceErrorContext(path: string): ExternalServiceErrorContext {
  const pathWithoutQuery = (path.split('?')[0] ?? '').trim();

  return {
    service: 'commerce',
    endpointGroup: resolveEndpointGroup(pathWithoutQuery),
    endpointPath: pathWithoutQuery.length > 0 ? pathWithoutQuery : '/',
  };
}

function resolveEndpointGroup(pathWithoutQuery: string): ExternalServiceEndpointGroup {
  if (pathWithoutQuery.includes('/intelligent-search/')) {
    return 'search';
  }

  if (pathWithoutQuery.startsWith('/api/checkout/pub/orderForms/simulation')) {
    return 'simulation';
  }

  if (pathWithoutQuery.startsWith('/api/checkout/pub/regions')) {
    return 'regions';
  }

  if (pathWithoutQuery.startsWith('/fixedprices/')) {
    return 'fixed_prices';
  }

  return 'unknown';
}
