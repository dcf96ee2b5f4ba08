/**
 * Common types and enums for the extractor
 */

/**
 * Category name shared by every item this extractor produces
 */
export const CATEGORY = 'hatenablog';

/**
 * Prefix that routes a URL to this extractor regardless of its host
 */
export const SYNTHETIC_PREFIX = `${CATEGORY}:`;

/**
 * URL shapes recognised by the route matcher
 */
export enum RouteKind {
  ENTRY = 'entry',
  HOME = 'home',
  ARCHIVE = 'archive',
  SEARCH = 'search'
}

/**
 * Rendering used by a listing page
 */
export enum Layout {
  /** Complete article bodies inline */
  FULL = 'full',
  /** Summaries only; each entry needs its own fetch */
  PARTIAL = 'partial'
}

/**
 * Kinds of items on the output stream
 */
export enum MessageType {
  DIRECTORY = 'directory',
  URL = 'url',
  QUEUE = 'queue'
}

/**
 * Query parameters forwarded with a request
 */
export type QueryParams = Record<string, string>;

/**
 * Parsed form of an input URL
 */
export interface TargetReference {
  readonly kind: RouteKind;
  /** Bare host, e.g. `example.hatenablog.com` */
  readonly domain: string;
  /** URL path without query or fragment */
  readonly path: string;
  /** Allow-listed query parameters only */
  readonly query: Readonly<QueryParams>;
}

/**
 * Raw document text plus the URL it was fetched from
 */
export interface Page {
  url: string;
  body: string;
}

/**
 * Fields read out of one article fragment
 */
export interface ParsedArticle {
  date: Date;
  entry: string;
  title: string;
  /** Full-size image URLs in document order */
  images: string[];
}

/**
 * Aggregate metadata for one blog post
 */
export interface ArticleMetadata {
  category: typeof CATEGORY;
  domain: string;
  date: Date;
  entry: string;
  title: string;
  count: number;
}

/**
 * Metadata attached to a single image
 */
export interface ImageMetadata extends ArticleMetadata {
  /** 1-based position of the image inside its article */
  num: number;
  filename: string;
  extension: string;
}

export interface QueueMetadata {
  /** Route that should handle the queued URL */
  extractor: RouteKind;
}

export interface DirectoryMessage {
  type: MessageType.DIRECTORY;
  metadata: ArticleMetadata;
}

export interface UrlMessage {
  type: MessageType.URL;
  url: string;
  metadata: ImageMetadata;
}

export interface QueueMessage {
  type: MessageType.QUEUE;
  url: string;
  metadata: QueueMetadata;
}

export type Message = DirectoryMessage | UrlMessage | QueueMessage;

/**
 * Options for the axios page fetcher
 */
export interface FetchOptions {
  userAgent?: string;
  timeout?: number;
  maxRedirects?: number;
}

/**
 * Options for an extraction run
 */
export interface ExtractionOptions {
  /** Process queued entries instead of yielding them */
  followQueue?: boolean;
  /** Stop after this many image URLs */
  limit?: number;
}

/**
 * Counters collected during an extraction run
 */
export interface ExtractionStats {
  pagesFetched: number;
  directories: number;
  urls: number;
  queued: number;
}
