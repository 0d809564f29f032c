import {
  ExternalServiceError,
  type ExternalServiceErrorContext,
} from '../../../domain/errors';
import { fetchWithTimeout, parseJson } from './http-client';

export interface ExternalRequest {
  url: string;
  method: 'GET' | 'POST';
  timeoutMs: number;
  context: ExternalServiceErrorContext;
  headers?: Record<string, string>;
  body?: unknown;
}

const SERVICE_LABELS: Record<ExternalServiceErrorContext['service'], string> = {
  commerce: 'Commerce backend',
  messaging: 'Messaging API',
};

/**
 * Performs one JSON request and returns the parsed body.
 * Every failure surfaces as an ExternalServiceError carrying the endpoint context.
 */
export async function requestJson(request: ExternalRequest): Promise<unknown> {
  const label = SERVICE_LABELS[request.context.service];

  try {
    const response = await fetchWithTimeout(
      request.url,
      {
        method: request.method,
        headers: {
          Accept: 'application/json',
          ...(request.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
          ...(request.headers ?? {}),
        },
        ...(request.body !== undefined ? { body: JSON.stringify(request.body) } : {}),
      },
      request.timeoutMs,
    );

    const body = await parseJson(response);

    if (!response.ok) {
      throw new ExternalServiceError(
        `${label} error ${response.status}`,
        response.status,
        'http',
        body,
        request.context,
      );
    }

    return body;
  } catch (error: unknown) {
    if (error instanceof ExternalServiceError) {
      throw error;
    }

    if (error instanceof Error && error.name === 'AbortError') {
      throw new ExternalServiceError(`${label} request timeout`, 0, 'timeout', undefined, request.context);
    }

    throw new ExternalServiceError(`${label} network error`, 0, 'network', undefined, request.context);
  }
}
