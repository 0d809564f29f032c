import { isRecord } from './object.utils';

const HARD_REDACT_KEYS = new Set([
  'access_token',
  'accesstoken',
  'api_key',
  'apikey',
  'app_key',
  'appkey',
  'app_token',
  'apptoken',
  'auth_token',
  'authtoken',
  'authorization',
  'password',
  'token',
]);

const MASK_LAST4_KEYS = new Set(['phone', 'urn', 'contact_urn', 'contacturn', 'urns']);

const NAME_KEYS = new Set(['name', 'contact_name', 'contactname', 'first_name', 'last_name']);

const REDACTED_LITERAL = '[REDACTED]';

/**
 * Returns a deep copy of `value` with credentials, contact URNs and contact
 * names masked. Product `name` fields are only masked under a contact object.
 */
export function redactSensitiveData(value: unknown): unknown {
  return redactRecursive(value, undefined, new WeakSet<object>(), false);
}

function redactRecursive(
  value: unknown,
  key: string | undefined,
  visited: WeakSet<object>,
  insideContact: boolean,
): unknown {
  const normalizedKey = key ? normalizeKey(key) : '';

  if (shouldHardRedact(normalizedKey)) {
    return REDACTED_LITERAL;
  }

  if (MASK_LAST4_KEYS.has(normalizedKey)) {
    return Array.isArray(value) ? value.map((item) => maskWithLastFour(item)) : maskWithLastFour(value);
  }

  if (insideContact && NAME_KEYS.has(normalizedKey)) {
    return redactNameValue(value);
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactRecursive(item, key, visited, insideContact));
  }

  if (isRecord(value)) {
    if (visited.has(value)) {
      return '[CIRCULAR]';
    }

    visited.add(value);
    const childInsideContact = insideContact || normalizedKey.startsWith('contact');
    const output: Record<string, unknown> = {};
    for (const [childKey, childValue] of Object.entries(value)) {
      output[childKey] = redactRecursive(childValue, childKey, visited, childInsideContact);
    }
    return output;
  }

  if (typeof value === 'string') {
    return redactAuthorizationSchemes(value);
  }

  return value;
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/[^a-z0-9_]/g, '');
}

function shouldHardRedact(normalizedKey: string): boolean {
  if (normalizedKey.length === 0) {
    return false;
  }

  if (HARD_REDACT_KEYS.has(normalizedKey)) {
    return true;
  }

  return normalizedKey.includes('secret') || normalizedKey.endsWith('_token');
}

function maskWithLastFour(value: unknown): string {
  const raw = typeof value === 'string' || typeof value === 'number' ? String(value) : '';
  const digits = raw.replace(/\D+/g, '');
  if (digits.length === 0) {
    return REDACTED_LITERAL;
  }

  return `***${digits.slice(-4)}`;
}

function redactNameValue(value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return REDACTED_LITERAL;
  }

  return `${value.trim()[0]}***`;
}

function redactAuthorizationSchemes(value: string): string {
  return value.replace(/\b(Bearer|Token)\s+[A-Za-z0-9\-._~+/]+=*/g, '$1 [REDACTED]');
}
