const LONE_SURROGATE =
  /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

/**
 * Percent-encodes `value` as UTF-8, leaving only `A-Z a-z 0-9 _ . - ~` and
 * the characters in `safe` unescaped.
 *
 * Lone surrogates are replaced with U+FFFD first, so this never throws.
 */
export function percentEncode(value: string, safe = "/"): string {
  const encoded = encodeURIComponent(value.replace(LONE_SURROGATE, "\uFFFD")).replace(
    /[!'()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );

  if (!safe) {
    return encoded;
  }

  return encoded.replace(/%[0-9A-F]{2}/g, (escape) => {
    const ch = String.fromCharCode(parseInt(escape.slice(1), 16));
    return safe.includes(ch) ? ch : escape;
  });
}
