export { LookupClient, defaultClientOptions } from './client.js';
export type { CardSource, LookupCard, LookupClientOptions, LookupSet, NameMatchMode } from './client.js';
export { GroupCodeIndex } from './group-code-index.js';
export { classifyCard, cardImageUrl, DEFAULT_CLASSIFICATION } from './classification.js';
export type { ColorClass } from './classification.js';
export { CardLookupService, searchName } from './lookup-service.js';
export type { CardLookup, LookupMatch } from './lookup-service.js';
export { enrichRecords, unenriched } from './enrichment.js';
export type { EnrichedRecord, EnrichmentResult } from './enrichment.js';
