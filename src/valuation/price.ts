// $9.99, US $129.99, $1,234.56, $ 40
export const PRICE_PATTERN = /(?:US\s*)?\$\s*\d{1,3}(?:,\d{3})*(?:\.\d{2})?/;

const DECIMAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export function extractPriceText(text: string): string | null {
  return text.match(PRICE_PATTERN)?.[0] ?? null;
}

/**
 * Converts matched price text into a number.
 *
 * A range such as "$10.50 to $15.00" yields its low bound. Returns null when
 * nothing numeric is left; zero is returned as-is and left to the caller.
 */
export function cleanPrice(priceText: string): number | null {
  if (!priceText) return null;

  let s = priceText;
  const rangeAt = s.indexOf('to');
  if (rangeAt !== -1) {
    s = s.slice(0, rangeAt).trim();
  }

  s = s.replaceAll('US', '').replaceAll('$', '').replaceAll(',', '').trim();

  // Shipping or currency text glued onto the match
  const fragment = s.split(/\s+/)[0] ?? '';
  if (!DECIMAL_LITERAL.test(fragment)) return null;

  return parseFloat(fragment);
}
