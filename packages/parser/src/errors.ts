export const curlParserErrorCodes = [
  'invalid_input',
  'input_too_large',
  'template_render_failed',
  'grammar_invalid',
  'method_invalid',
  'url_invalid',
  'url_required',
  'header_name_invalid',
  'header_value_invalid',
  'content_type_unsupported',
  'internal_request_invalid'
] as const;

export type CurlParserErrorCode = (typeof curlParserErrorCodes)[number];

export type SourcePosition = {
  offset: number;
  line: number;
  column: number;
};

export type CurlParserError = {
  code: CurlParserErrorCode;
  message: string;
  raw?: string;
  position?: SourcePosition;
};

export type CurlParserSuccess<T> = {ok: true; value: T};
export type CurlParserFailure = {ok: false; error: CurlParserError};
export type CurlParserResult<T> = CurlParserSuccess<T> | CurlParserFailure;

export const ok = <T>(value: T): CurlParserSuccess<T> => ({ok: true, value});

export const err = (
  code: CurlParserErrorCode,
  message: string,
  details: Pick<CurlParserError, 'raw' | 'position'> = {}
): CurlParserFailure => ({
  ok: false,
  error: {
    code,
    message,
    ...(details.raw !== undefined ? {raw: details.raw} : {}),
    ...(details.position ? {position: details.position} : {})
  }
});

export const formatCurlParserError = (error: CurlParserError): string => {
  const location = error.position ? ` (line ${error.position.line}, column ${error.position.column})` : '';
  return `${error.code}: ${error.message}${location}`;
};
