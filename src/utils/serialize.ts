/**
 * Copy a value replacing repeated object references with '[Circular]'.
 */
export function sanitizeCircularRefs(
  obj: unknown,
  seen = new WeakSet<object>()
): unknown {
  if (typeof obj === 'bigint') {
    return obj.toString();
  }
  if (obj === null || typeof obj !== 'object') {
    return obj;
  }
  if (seen.has(obj)) {
    return '[Circular]';
  }

  seen.add(obj);

  if (obj instanceof Date) {
    return obj.toISOString();
  }

  if (obj instanceof Error) {
    return { name: obj.name, message: obj.message };
  }

  if (Array.isArray(obj)) {
    return obj.map(item => sanitizeCircularRefs(item, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = sanitizeCircularRefs(value, seen);
  }

  return result;
}

/**
 * JSON.stringify that never throws.
 */
export function safeJson(data: unknown, space?: number): string {
  try {
    return JSON.stringify(sanitizeCircularRefs(data), null, space) ?? 'null';
  } catch {
    return '[Unserializable]';
  }
}

/**
 * Inline text form of an extra value, used by text formatters.
 */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object') {
    return safeJson(value);
  }
  return String(value);
}
