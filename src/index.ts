export * from './services/extractor/interfaces/types';
export type { IExtractor } from './services/extractor/interfaces/IExtractor';
export type { IPageFetcher } from './services/extractor/interfaces/IPageFetcher';
export type { IUrlQueue, QueuedUrl } from './services/extractor/interfaces/IUrlQueue';
export { ArticleParser } from './services/extractor/implementations/ArticleParser';
export { AxiosPageFetcher } from './services/extractor/implementations/AxiosPageFetcher';
export { BlogExtractor } from './services/extractor/implementations/BlogExtractor';
export { InMemoryUrlQueue } from './services/extractor/implementations/InMemoryUrlQueue';
export { LayoutDispatcher } from './services/extractor/implementations/LayoutDispatcher';
export { PaginationDriver, PaginationState } from './services/extractor/implementations/PaginationDriver';
export { ExtractorFactory } from './services/extractor/factories/ExtractorFactory';
export { RouteMatcher } from './services/extractor/factories/RouteMatcher';
export type { RouteMatch } from './services/extractor/factories/RouteMatcher';
export { ROUTES, PAGE_PARAMETER, acceptedParameters } from './services/extractor/factories/routes';
export type { RouteDefinition } from './services/extractor/factories/routes';
export { MarkerCursor, extractBetween } from './services/extractor/utils/MarkerCursor';
export { PathFormatter } from './services/extractor/utils/PathFormatter';
export { ExtractorError, NotFoundError, ParseError, HttpError } from './services/extractor/utils/errors';
export { ExtractionService } from './services/extraction.service';
