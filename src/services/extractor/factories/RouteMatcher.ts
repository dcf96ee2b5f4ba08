import { QueryParams, SYNTHETIC_PREFIX, TargetReference } from '../interfaces/types';
import { RouteDefinition, ROUTES, acceptedParameters } from './routes';
import { UrlUtils } from '../utils/UrlUtils';
import { NotFoundError } from '../utils/errors';

const SYNTHETIC_HOST = /^https?:\/\/([^/]+)(.*)$/;
const KNOWN_HOST =
  /^(?:https?:\/\/)?([\w-]+\.(?:hatenablog\.com|hatenablog\.jp|hatenadiary\.com|hateblo\.jp))(.*)$/;
const QUERY_PATTERN = '(?:\\?([^#]*))?(?:#.*)?$';

/**
 * Result of a successful match
 */
export interface RouteMatch {
  route: RouteDefinition;
  target: TargetReference;
}

/**
 * Maps input URLs onto routes.
 *
 * A `hatenablog:` prefix forces any host through this extractor (custom
 * domains); without it only the platform's own domains are accepted.
 */
export class RouteMatcher {
  private readonly compiled: Array<{ route: RouteDefinition; pattern: RegExp }>;

  constructor(routes: readonly RouteDefinition[] = ROUTES) {
    this.compiled = routes.map(route => ({
      route,
      pattern: new RegExp(`^${route.pathPattern}${QUERY_PATTERN}`),
    }));
  }

  /**
   * Match a URL, or return null when no route accepts it
   */
  tryMatch(url: string): RouteMatch | null {
    const host = this.splitHost(url);
    if (host === null) {
      return null;
    }

    for (const { route, pattern } of this.compiled) {
      const match = pattern.exec(host.rest);
      if (!match) {
        continue;
      }

      const target: TargetReference = Object.freeze({
        kind: route.kind,
        domain: host.domain,
        path: match[1],
        query: Object.freeze(this.filterQuery(route, UrlUtils.parseQuery(match[2]))),
      });
      return { route, target };
    }
    return null;
  }

  /**
   * Match a URL
   * @throws NotFoundError when no route accepts the URL
   */
  match(url: string): RouteMatch {
    const result = this.tryMatch(url);
    if (result === null) {
      throw new NotFoundError(url);
    }
    return result;
  }

  private splitHost(url: string): { domain: string; rest: string } | null {
    const match = url.startsWith(SYNTHETIC_PREFIX)
      ? SYNTHETIC_HOST.exec(url.slice(SYNTHETIC_PREFIX.length))
      : KNOWN_HOST.exec(url);
    return match ? { domain: match[1], rest: match[2] } : null;
  }

  /**
   * Drop every key the route does not accept
   */
  private filterQuery(route: RouteDefinition, query: QueryParams): QueryParams {
    const accepted = acceptedParameters(route);
    const result: QueryParams = {};
    for (const [key, value] of Object.entries(query)) {
      if (accepted.has(key)) {
        result[key] = value;
      }
    }
    return result;
  }
}
