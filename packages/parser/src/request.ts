import {encodeRequestBody} from './body';
import type {ParsedRequest} from './contracts';
import {ok, type CurlParserResult} from './errors';

export type RequestInitDescriptor = {
  url: string;
  init: RequestInit;
  /** Callers must disable TLS certificate verification on their transport when set. */
  insecure: boolean;
};

/** Builds the arguments for a WHATWG `fetch` call. Nothing is sent. */
export const toRequestInit = (request: ParsedRequest): CurlParserResult<RequestInitDescriptor> => {
  const body = encodeRequestBody(request);
  if (!body.ok) {
    return body;
  }

  return ok({
    url: request.url,
    init: {
      method: request.method,
      headers: {...request.headers},
      ...(body.value !== null ? {body: body.value} : {})
    },
    insecure: request.insecure
  });
};
