/**
 * Base class for failures raised by the extractor.
 */
export class ExtractorError extends Error {
  code: string;
  isOperational: boolean;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = true;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The input URL does not match any known route
 */
export class NotFoundError extends ExtractorError {
  constructor(public readonly url: string) {
    super(`Unsupported URL '${url}'`, 'NOT_FOUND');
  }
}

/**
 * A required marker is missing from a fragment believed to be real content
 */
export class ParseError extends ExtractorError {
  pageUrl?: string;

  constructor(message: string, pageUrl?: string) {
    super(pageUrl ? `${message} (${pageUrl})` : message, 'PARSE_ERROR');
    this.pageUrl = pageUrl;
  }
}

/**
 * The server answered with a non-success status
 */
export class HttpError extends ExtractorError {
  constructor(public readonly status: number, public readonly url: string) {
    super(`HTTP ${status} for ${url}`, 'HTTP_ERROR');
  }
}
