const SENSITIVE_KEY_FRAGMENTS = [
  'token',
  'secret',
  'authorization',
  'cookie',
  'password',
  'passwd',
  'credential',
  'apikey',
  'api_key',
  'body',
  'template_context'
] as const;

// An echoed header line or a URL with user info can carry credentials in plain text.
const AUTH_SCHEME_CREDENTIALS_REGEX = /\b(Basic|Bearer|Digest)\s+[A-Za-z0-9._~+/=-]+/giu;
const URL_USERINFO_REGEX = /\b([a-z][a-z0-9+.-]*:\/\/)[^/@\s]+@/giu;

export const REDACTED = '[REDACTED]';
const MAX_DEPTH = 12;

const canonicalKey = (key: string) => key.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

export const redactText = (text: string): string =>
  text
    .replace(AUTH_SCHEME_CREDENTIALS_REGEX, (_match, scheme: string) => `${scheme} ${REDACTED}`)
    .replace(URL_USERINFO_REGEX, (_match, scheme: string) => `${scheme}${REDACTED}@`);

/**
 * Returns a JSON-safe copy of `value` with sensitive keys replaced by
 * `[REDACTED]` and credentials scrubbed from strings.
 */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: readonly string[];
}): unknown => {
  const extraKeys = new Set(extraSensitiveKeys.map(canonicalKey).filter(key => key.length > 0));
  const isSensitiveKey = (key: string) => {
    const canonical = canonicalKey(key);
    return extraKeys.has(canonical) || SENSITIVE_KEY_FRAGMENTS.some(fragment => canonical.includes(fragment));
  };
  const visited = new WeakSet<object>();

  const visit = (current: unknown, depth: number): unknown => {
    if (depth > MAX_DEPTH) {
      return '[TRUNCATED]';
    }

    switch (typeof current) {
      case 'string':
        return redactText(current);
      case 'bigint':
      case 'symbol':
        return current.toString();
      case 'function':
        return '[FUNCTION]';
      default:
        break;
    }

    if (current === null || typeof current !== 'object') {
      return current;
    }
    if (current instanceof Date) {
      return current.toISOString();
    }
    if (current instanceof Error) {
      return {
        name: current.name,
        message: redactText(current.message),
        ...(current.stack ? {stack: redactText(current.stack)} : {})
      };
    }
    if (visited.has(current)) {
      return '[CIRCULAR]';
    }
    visited.add(current);

    if (Array.isArray(current)) {
      return current.map((item: unknown) => visit(item, depth + 1));
    }

    return Object.fromEntries(
      Object.entries(current).map(([key, entry]: [string, unknown]) => [
        key,
        isSensitiveKey(key) ? REDACTED : visit(entry, depth + 1)
      ])
    );
  };

  return visit(value, 0);
};
