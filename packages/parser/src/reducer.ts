import {err, ok, type CurlParserResult} from './errors';
import {unescapeValue} from './escapes';
import type {Fragment, ValueFragment} from './grammar';
import {AUTHORIZATION_HEADER, isHttpToken, normalizeHeaderName, validateHeaderValue} from './headers';

export const DEFAULT_METHOD = 'GET';

export type AccumulatedUrl = {
  text: string;
  schemeless: boolean;
  source: 'positional' | 'location';
};

export type RequestAccumulator = {
  method: string;
  url: AccumulatedUrl | null;
  headers: Map<string, string>;
  body: string[];
  insecure: boolean;
};

export const createRequestAccumulator = (): RequestAccumulator => ({
  method: DEFAULT_METHOD,
  url: null,
  headers: new Map(),
  body: [],
  insecure: false
});

const SCHEME_SEPARATOR = '://';

const reduceMethod = (accumulator: RequestAccumulator, fragment: ValueFragment): CurlParserResult<void> => {
  const method = fragment.argument.value.trim();
  if (!isHttpToken(method)) {
    return err('method_invalid', `Invalid HTTP method: "${fragment.argument.raw}"`, {
      raw: fragment.argument.raw,
      position: fragment.position
    });
  }

  accumulator.method = method;
  return ok(undefined);
};

const reduceUrl = (accumulator: RequestAccumulator, fragment: ValueFragment): CurlParserResult<void> => {
  const text = fragment.argument.value.trim();
  if (text.length === 0) {
    return err('url_invalid', 'URL must not be empty', {raw: fragment.argument.raw, position: fragment.position});
  }

  accumulator.url = {
    text,
    schemeless: !text.includes(SCHEME_SEPARATOR),
    source: fragment.kind === 'location' ? 'location' : 'positional'
  };
  return ok(undefined);
};

const setHeader = ({
  accumulator,
  name,
  value
}: {
  accumulator: RequestAccumulator;
  name: string;
  value: string;
}): CurlParserResult<void> => {
  const normalizedName = normalizeHeaderName(name);
  if (!normalizedName.ok) {
    return normalizedName;
  }

  const normalizedValue = validateHeaderValue(value);
  if (!normalizedValue.ok) {
    return normalizedValue;
  }

  accumulator.headers.set(normalizedName.value, normalizedValue.value);
  return ok(undefined);
};

const reduceHeader = (accumulator: RequestAccumulator, fragment: ValueFragment): CurlParserResult<void> => {
  const line = fragment.argument.value;
  const separator = line.indexOf(':');
  if (separator === -1) {
    return err('grammar_invalid', `Header "${line}" is missing a ":" separator`, {
      raw: fragment.argument.raw,
      position: fragment.position
    });
  }

  const rawValue = line.slice(separator + 1).trim();
  const result = setHeader({
    accumulator,
    name: line.slice(0, separator),
    // Double-quoted segments were already unescaped while lexing.
    value: fragment.argument.escapesDecoded ? rawValue : unescapeValue(rawValue)
  });
  if (!result.ok) {
    return {ok: false, error: {...result.error, position: fragment.position}};
  }

  return result;
};

const reduceAuth = (accumulator: RequestAccumulator, fragment: ValueFragment): CurlParserResult<void> => {
  const encoded = Buffer.from(fragment.argument.value, 'utf8').toString('base64');
  return setHeader({accumulator, name: AUTHORIZATION_HEADER, value: `Basic ${encoded}`});
};

const reduceBody = (accumulator: RequestAccumulator, fragment: ValueFragment): CurlParserResult<void> => {
  accumulator.body.push(fragment.argument.value);
  return ok(undefined);
};

const valueFragmentReducers: Record<
  ValueFragment['kind'],
  (accumulator: RequestAccumulator, fragment: ValueFragment) => CurlParserResult<void>
> = {
  method: reduceMethod,
  url: reduceUrl,
  location: reduceUrl,
  header: reduceHeader,
  auth: reduceAuth,
  body: reduceBody
};

/**
 * Folds the fragment stream into a request accumulator. Headers, method, URL and
 * credentials overwrite earlier values; body fragments accumulate in source order.
 */
export const reduceFragments = (fragments: readonly Fragment[]): CurlParserResult<RequestAccumulator> => {
  const accumulator = createRequestAccumulator();

  for (const fragment of fragments) {
    if (fragment.kind === 'end_of_input') {
      return ok(accumulator);
    }

    if (fragment.kind === 'insecure') {
      accumulator.insecure = true;
      continue;
    }

    const reduced = valueFragmentReducers[fragment.kind](accumulator, fragment);
    if (!reduced.ok) {
      return reduced;
    }
  }

  return err('grammar_invalid', 'Fragment stream ended without an end-of-input marker');
};
