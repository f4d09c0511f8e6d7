// Key fragments matched against lowercased keys with punctuation removed, so
// `SecretAccessKey`, `x-aws-ec2-metadata-token` and `session_key` all match.
const SENSITIVE_KEY_FRAGMENTS = [
  'token',
  'secret',
  'authorization',
  'cookie',
  'password',
  'accesskey',
  'session_key',
  'privatekey',
  'private_key'
] as const;

const REDACTED = '[REDACTED]';
const TRUNCATED = '[TRUNCATED]';
const CIRCULAR = '[CIRCULAR]';
const MAX_DEPTH = 12;

const normalizeKey = (key: string) => key.trim().toLowerCase().replace(/[^a-z0-9_]/gu, '');

class LogValueSanitizer {
  private readonly visited = new WeakSet<object>();

  public constructor(private readonly extraKeys: ReadonlySet<string>) {}

  public sanitize(value: unknown, depth: number): unknown {
    if (depth > MAX_DEPTH) {
      return TRUNCATED;
    }

    switch (typeof value) {
      case 'undefined':
      case 'string':
      case 'number':
      case 'boolean':
        return value;
      case 'bigint':
      case 'symbol':
        return value.toString();
      case 'function':
        return '[FUNCTION]';
      case 'object':
        return value === null ? value : this.sanitizeObject(value, depth);
      default:
        return Object.prototype.toString.call(value);
    }
  }

  private sanitizeObject(value: object, depth: number): unknown {
    if (value instanceof Date) {
      return Number.isNaN(value.getTime()) ? '[INVALID_DATE]' : value.toISOString();
    }

    if (value instanceof Error) {
      return {
        name: value.name,
        message: value.message,
        ...(value.stack ? {stack: value.stack} : {})
      };
    }

    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.sanitize(item, depth + 1));
    }

    if (this.visited.has(value)) {
      return CIRCULAR;
    }
    this.visited.add(value);

    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      sanitized[key] = this.isSensitive(key) ? REDACTED : this.sanitize(entry, depth + 1);
    }

    return sanitized;
  }

  private isSensitive(key: string) {
    const normalized = normalizeKey(key);
    return this.extraKeys.has(normalized) || SENSITIVE_KEY_FRAGMENTS.some(fragment => normalized.includes(fragment));
  }
}

/**
 * Produces a JSON-safe copy of `value` with sensitive keys redacted. Credential
 * documents, metadata tokens and authorization headers never reach log output.
 */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => {
  const extraKeys = new Set(extraSensitiveKeys.map(normalizeKey).filter(key => key.length > 0));
  return new LogValueSanitizer(extraKeys).sanitize(value, 0);
};
