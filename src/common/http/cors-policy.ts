import type { CorsOptions } from '@nestjs/common/interfaces/external/cors-options.interface';
import type { AppEnv } from '../config/env.validation';
import { REQUEST_ID_HEADER } from '../middleware/request-id.middleware';
import { createLogger } from '../utils/logger';

export type CorsMode = 'development_permissive' | 'production_strict';

type CorsEnv = Pick<AppEnv, 'NODE_ENV' | 'ALLOWED_ORIGINS'>;

const corsLogger = createLogger('CorsPolicy');

/** Scheme and host of an origin, lowercased. */
export function normalizeOrigin(origin: string): string {
  const trimmed = origin.trim();
  if (trimmed.length === 0) {
    return trimmed;
  }

  try {
    const parsed = new URL(trimmed);
    return `${parsed.protocol}//${parsed.host}`.toLowerCase();
  } catch {
    return trimmed.replace(/\/+$/, '').toLowerCase();
  }
}

export function resolveCorsMode(env: Pick<AppEnv, 'NODE_ENV'>): CorsMode {
  return env.NODE_ENV === 'production' ? 'production_strict' : 'development_permissive';
}

/**
 * Storefront widgets call the search endpoint from the browser; the
 * messaging platform calls it server-to-server without an Origin header.
 * Outside production every origin passes.
 */
export function createOriginMatcher(env: CorsEnv): (origin: string | undefined) => boolean {
  if (resolveCorsMode(env) === 'development_permissive') {
    return () => true;
  }

  const allowedOrigins = new Set(env.ALLOWED_ORIGINS.map(normalizeOrigin));
  return (origin) => origin === undefined || allowedOrigins.has(normalizeOrigin(origin));
}

export function buildCorsOptions(env: CorsEnv): CorsOptions {
  const matches = createOriginMatcher(env);

  return {
    origin: (origin, callback) => {
      if (matches(origin)) {
        callback(null, true);
        return;
      }

      corsLogger.security('cors_origin_rejected', {
        event: 'cors_origin_rejected',
        origin,
        allowedOriginsCount: env.ALLOWED_ORIGINS.length,
      });
      callback(new Error('Origin not allowed by CORS'));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', REQUEST_ID_HEADER],
    exposedHeaders: [REQUEST_ID_HEADER],
    credentials: true,
  };
}
