export { LISTING_FIELDS, LISTING_READY_SELECTOR, LISTING_REVEAL_TARGETS, plausibleSellerName } from './fields';
export { isListingUrl, extractAdId } from './url';
export { extractAdLinks, hasNextPageLink, nextPageUrl, collectAdLinks } from './links';
export type { CollectOptions, PageLoader } from './links';
