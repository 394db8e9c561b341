/**
 * Sanitize JSON values for PostgreSQL jsonb storage.
 *
 * jsonb rejects the \u0000 escape ("unsupported Unicode escape sequence"),
 * and metadata documents occasionally carry NUL characters from producers
 * that pad fixed-size on-chain strings.
 */

const NUL = /\u0000/g;

export function hasNullChars(value: string): boolean {
  return value.includes("\u0000");
}

/**
 * Deep copy of `value` with NUL characters removed from every string,
 * object keys included.
 */
export function stripNullChars(value: unknown): unknown {
  if (typeof value === "string") {
    return hasNullChars(value) ? value.replace(NUL, "") : value;
  }
  if (Array.isArray(value)) {
    return value.map(stripNullChars);
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, inner]) => [stripNullChars(key), stripNullChars(inner)])
    );
  }
  return value;
}

/**
 * Serialize for a jsonb parameter.
 */
export function toJsonb(value: unknown): string {
  return JSON.stringify(stripNullChars(value));
}
