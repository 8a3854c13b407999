import {ParsedRequestSchema, type ParsedRequest} from './contracts';
import {err, ok, type CurlParserResult} from './errors';
import {ACCEPT_HEADER, CONTENT_TYPE_HEADER} from './headers';
import {DEFAULT_METHOD, type AccumulatedUrl, type RequestAccumulator} from './reducer';

export const DEFAULT_SCHEME = 'http';
export const DEFAULT_BODY_CONTENT_TYPE = 'application/x-www-form-urlencoded';
export const DEFAULT_ACCEPT = '*/*';
export const UPGRADED_METHOD = 'POST';

const resolveUrl = (url: AccumulatedUrl | null): CurlParserResult<string> => {
  if (!url) {
    return err('url_required', 'A URL is required: pass it as an argument or with -L/--location');
  }

  const candidate = url.schemeless ? `${DEFAULT_SCHEME}://${url.text}` : url.text;
  try {
    return ok(new URL(candidate).href);
  } catch {
    return err('url_invalid', `Invalid URL: ${url.text}`, {raw: url.text});
  }
};

const deepFreeze = (request: ParsedRequest): ParsedRequest => {
  Object.freeze(request.headers);
  Object.freeze(request.body);
  return Object.freeze(request);
};

/**
 * Applies the post-reduction rules in order: scheme defaulting, default
 * content type, default accept, then the GET to POST upgrade for bodies.
 */
export const normalizeRequest = (accumulator: RequestAccumulator): CurlParserResult<ParsedRequest> => {
  const url = resolveUrl(accumulator.url);
  if (!url.ok) {
    return url;
  }

  const headers = new Map(accumulator.headers);
  const hasBody = accumulator.body.length > 0;
  if (hasBody && !headers.has(CONTENT_TYPE_HEADER)) {
    headers.set(CONTENT_TYPE_HEADER, DEFAULT_BODY_CONTENT_TYPE);
  }
  if (!headers.has(ACCEPT_HEADER)) {
    headers.set(ACCEPT_HEADER, DEFAULT_ACCEPT);
  }

  const method = hasBody && accumulator.method === DEFAULT_METHOD ? UPGRADED_METHOD : accumulator.method;

  const candidate = ParsedRequestSchema.safeParse({
    method,
    url: url.value,
    headers: Object.fromEntries(headers),
    body: [...accumulator.body],
    insecure: accumulator.insecure
  });
  /* c8 ignore next 3 */
  if (!candidate.success) {
    return err('internal_request_invalid', candidate.error.message);
  }

  return ok(deepFreeze(candidate.data));
};
