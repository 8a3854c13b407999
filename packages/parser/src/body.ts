import type {ParsedRequest} from './contracts';
import {err, ok, type CurlParserResult} from './errors';
import {removeMatchingQuotes} from './escapes';
import {CONTENT_TYPE_HEADER, getHeaderValue} from './headers';

export const FORM_URLENCODED_CONTENT_TYPE = 'application/x-www-form-urlencoded';
export const JSON_CONTENT_TYPE = 'application/json';

const splitFormPair = (part: string): [string, string] => {
  const separator = part.indexOf('=');
  if (separator === -1) {
    return [removeMatchingQuotes(part), ''];
  }

  return [removeMatchingQuotes(part.slice(0, separator)), removeMatchingQuotes(part.slice(separator + 1))];
};

const encodeFormBody = (parts: readonly string[]) => {
  const params = new URLSearchParams();
  for (const part of parts) {
    const [key, value] = splitFormPair(part);
    params.append(key, value);
  }

  return params.toString();
};

/**
 * Serializes the body fragments according to the request content type. Form
 * bodies join every fragment; JSON bodies are the last fragment alone.
 */
export const encodeRequestBody = (request: ParsedRequest): CurlParserResult<string | null> => {
  if (request.body.length === 0) {
    return ok(null);
  }

  const contentType = getHeaderValue(request.headers, CONTENT_TYPE_HEADER);
  if (contentType === FORM_URLENCODED_CONTENT_TYPE) {
    return ok(encodeFormBody(request.body));
  }

  if (contentType === JSON_CONTENT_TYPE) {
    return ok(request.body[request.body.length - 1] ?? null);
  }

  return err('content_type_unsupported', `Cannot encode a request body with content type "${contentType ?? ''}"`, {
    raw: contentType ?? ''
  });
};
