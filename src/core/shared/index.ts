// Shared utilities
export { createCoordinate, resourceUrl, manifestUrl, buildCoordinate, MANIFEST_NAME } from './coordinate';
export { parsePackageList, CURRENT_LIST_NAME, LIST_TITLE_MARKER } from './package-list-parser';
export type { PackageListParseOptions } from './package-list-parser';
export { parseManifest } from './manifest-parser';
export { HttpFetcher, splitLines } from './http-fetcher';
export type { HttpFetcherOptions } from './http-fetcher';
export { fetchPackageIndex, indexUrlFor } from './index-loader';
