/**
 * Sensitive Data Redaction
 *
 * Field-name and value-pattern redaction applied to log metadata, so that
 * credentials from connection strings or search-engine auth never reach logs.
 */

// Patterns for detecting sensitive fields (by key name)
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /^password$/i,
  /^passwd$/i,
  /^secret$/i,
  /^token$/i,
  /^api[_-]?key$/i,
  /^authorization$/i,
  /^cookie$/i,
  /_key$/i,
  /_secret$/i,
  /_token$/i,
  /_password$/i,
];

// Patterns for detecting sensitive values (by content)
const SENSITIVE_VALUE_PATTERNS: readonly RegExp[] = [
  /^Bearer\s+[a-zA-Z0-9._-]+/,          // Bearer token
  /^Basic\s+[a-zA-Z0-9=]+$/,            // Basic auth
  /^ApiKey\s+[a-zA-Z0-9=]+$/,           // Elasticsearch API key header
  /^[a-zA-Z0-9_-]+\.eyJ/,               // JWT token
  /^[a-z][a-z0-9+.-]*:\/\/[^:/@\s]+:[^@\s]+@/i, // URL with inline credentials
];

/**
 * Check if a field name indicates sensitive data
 */
export function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

/**
 * Check if a value looks like sensitive data
 */
export function isSensitiveValue(value: unknown): boolean {
  if (typeof value !== 'string') {
    return false;
  }
  return SENSITIVE_VALUE_PATTERNS.some(pattern => pattern.test(value));
}

/**
 * Mask a sensitive value, showing only first 2 and last 2 characters
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '****';
  }
  return value.substring(0, 2) + '****' + value.substring(value.length - 2);
}

/** Type for sanitized output */
export type SanitizedData =
  | string
  | number
  | boolean
  | null
  | undefined
  | SanitizedData[]
  | { [key: string]: SanitizedData };

/**
 * Recursively sanitize a value for logging.
 * Removes or masks sensitive fields and values.
 */
export function sanitizeForLogging(
  data: unknown,
  options: { depth?: number; maxDepth?: number } = {}
): SanitizedData {
  const maxDepth = options.maxDepth ?? 10;
  const currentDepth = options.depth ?? 0;

  if (currentDepth > maxDepth) {
    return '[Max Depth Exceeded]';
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === 'string') {
    return isSensitiveValue(data) ? maskValue(data) : data;
  }

  if (typeof data === 'number' || typeof data === 'boolean') {
    return data;
  }

  if (typeof data === 'bigint') {
    return data.toString();
  }

  if (typeof data === 'function') {
    return '[Function]';
  }

  if (typeof data === 'symbol') {
    return '[Symbol]';
  }

  if (data instanceof Date) {
    return data.toISOString();
  }

  if (data instanceof Error) {
    return {
      name: data.name,
      message: data.message,
      stack: process.env['NODE_ENV'] === 'development' ? data.stack : undefined,
    };
  }

  const next = { ...options, depth: currentDepth + 1 };

  if (Array.isArray(data)) {
    return data.map(item => sanitizeForLogging(item, next));
  }

  if (data instanceof Map) {
    const sanitized: Record<string, SanitizedData> = {};
    for (const [key, value] of data.entries()) {
      const keyStr = String(key);
      sanitized[keyStr] = isSensitiveField(keyStr) ? '[REDACTED]' : sanitizeForLogging(value, next);
    }
    return sanitized;
  }

  const sanitized: Record<string, SanitizedData> = {};
  for (const [key, value] of Object.entries(data)) {
    sanitized[key] = isSensitiveField(key) ? '[REDACTED]' : sanitizeForLogging(value, next);
  }
  return sanitized;
}
