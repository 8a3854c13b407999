import type {ParsedRequest} from './contracts';
import {err, ok, type CurlParserResult} from './errors';

const HTTP_TOKEN_REGEX = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
// Object keys that cannot be stored as own properties of a plain record.
const RESERVED_HEADER_NAMES = new Set(['__proto__']);
// Header values may carry any octet except controls; horizontal tab is allowed.
const INVALID_HEADER_VALUE_REGEX = /[\u0000-\u0008\u000a-\u001f\u007f]/u;

export const AUTHORIZATION_HEADER = 'authorization';
export const ACCEPT_HEADER = 'accept';
export const CONTENT_TYPE_HEADER = 'content-type';

export const isHttpToken = (value: string) => HTTP_TOKEN_REGEX.test(value);

export const normalizeHeaderName = (name: string): CurlParserResult<string> => {
  const trimmed = name.trim();
  if (!isHttpToken(trimmed) || RESERVED_HEADER_NAMES.has(trimmed.toLowerCase())) {
    return err('header_name_invalid', `Invalid header name: "${name}"`, {raw: name});
  }

  return ok(trimmed.toLowerCase());
};

export const validateHeaderValue = (value: string): CurlParserResult<string> => {
  const trimmed = value.trim();
  if (INVALID_HEADER_VALUE_REGEX.test(trimmed)) {
    return err('header_value_invalid', 'Header values must not contain control characters', {raw: value});
  }

  return ok(trimmed);
};

export const getHeaderValue = (headers: Readonly<Record<string, string>>, name: string): string | undefined =>
  Object.prototype.hasOwnProperty.call(headers, name.toLowerCase()) ? headers[name.toLowerCase()] : undefined;

export const getRequestHeader = (request: ParsedRequest, name: string): string | undefined =>
  getHeaderValue(request.headers, name);
