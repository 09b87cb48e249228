export type { ExtractedTimes } from './extract.js';
export { extractTimes, extractPricing, extractContact } from './extract.js';
export type { EnrichmentConfig } from './classify.js';
export {
  inferCategory,
  extractTags,
  detectCity,
  detectPrefecture,
  detectVenueType,
  DEFAULT_ENRICHMENT_CONFIG,
} from './classify.js';
