const LISTING_URL = /^https?:\/\/(?:[a-z0-9-]+\.)?olx\.com\.br(?:[/?#:]|$)/i;
/** Ad id at the end of a listing path, as a regex source; group 1 is the id */
export const AD_ID_PATTERN = '-(\\d{8,10})(?:[/?#]|$)';
const AD_ID = new RegExp(AD_ID_PATTERN);

/**
 * Whether the URL points at the listing site (any subdomain, http or https)
 */
export function isListingUrl(url: string): boolean {
  return LISTING_URL.test(url.trim());
}

/**
 * Numeric ad id at the end of a listing path ("...-1457220451"), if any
 */
export function extractAdId(url: string): string | null {
  const path = url.split(/[?#]/)[0] ?? '';
  return AD_ID.exec(path)?.[1] ?? null;
}
