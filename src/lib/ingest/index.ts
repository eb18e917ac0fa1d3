/**
 * Ingestion module exports.
 */

export { checkDomainAllowed } from './domain';
export { cleanText } from './text-cleaner';
export { WebPageLoader, extractMainContent, titleFromUrl } from './web-loader';
export type { PageLoader, WebPageLoaderOptions, ExtractedPage } from './web-loader';
export { loadSources, parseSources } from './sources';
export type { SourceEntry } from './sources';
export { ingestDocuments } from './pipeline';
export type {
  IngestionDeps,
  IngestionOptions,
  IngestionReport,
  FailedSource,
} from './pipeline';
