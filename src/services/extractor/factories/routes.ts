import { RouteKind } from '../interfaces/types';

/**
 * Static description of one URL shape
 */
export interface RouteDefinition {
  kind: RouteKind;
  /** Path part of the URL; must contain exactly one capturing group for the path */
  pathPattern: string;
  /** Query keys forwarded to the first request; `page` is added for paginated routes */
  allowedParameters: readonly string[];
  /** Whether the route follows `pager-next` links */
  paginated: boolean;
  /** Sample URL shown in the CLI help */
  example: string;
}

/** Key that lets a listing crawl resume at an arbitrary page */
export const PAGE_PARAMETER = 'page';

export const ROUTES: readonly RouteDefinition[] = [
  {
    kind: RouteKind.ENTRY,
    pathPattern: '(/entry/[^?#]+)',
    allowedParameters: [],
    paginated: false,
    example: 'https://BLOG.hatenablog.com/entry/PATH',
  },
  {
    kind: RouteKind.HOME,
    pathPattern: '(/?)',
    allowedParameters: [],
    paginated: true,
    example: 'https://BLOG.hatenablog.com',
  },
  {
    kind: RouteKind.ARCHIVE,
    pathPattern: '(/archive(?:/\\d+(?:/\\d+(?:/\\d+)?)?|/category/[^?#]+)?)',
    allowedParameters: [],
    paginated: true,
    example: 'https://BLOG.hatenablog.com/archive/2024',
  },
  {
    kind: RouteKind.SEARCH,
    pathPattern: '(/search)',
    allowedParameters: ['q'],
    paginated: true,
    example: 'https://BLOG.hatenablog.com/search?q=QUERY',
  },
];

/**
 * Query keys a route forwards, `page` included where the route paginates
 */
export function acceptedParameters(route: RouteDefinition): ReadonlySet<string> {
  const keys = new Set(route.allowedParameters);
  if (route.paginated) {
    keys.add(PAGE_PARAMETER);
  }
  return keys;
}
