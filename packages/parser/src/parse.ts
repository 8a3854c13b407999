import {performance} from 'node:perf_hooks';

import {createNoopLogger, type StructuredLogger} from '@curlkit/logging';

import {
  CurlParserSettingsSchema,
  type CurlParserSettings,
  type CurlParserSettingsInput,
  type ParsedRequest,
  type TemplateContext
} from './contracts';
import {err, ok, type CurlParserFailure, type CurlParserResult} from './errors';
import {tokenizeCurlCommand} from './grammar';
import {normalizeRequest} from './normalize';
import {reduceFragments} from './reducer';
import {createTemplateRenderer, passthroughRenderer, type TemplateRenderer} from './template';

const LOG_COMPONENT = 'curl.parser';

export type CurlParserOptions = CurlParserSettingsInput & {
  logger?: StructuredLogger;
  /** Replaces the nunjucks renderer used by `load`. */
  renderer?: TemplateRenderer;
};

export type CurlParser = {
  settings: CurlParserSettings;
  parse: (text: string) => CurlParserResult<ParsedRequest>;
  load: (text: string, context?: TemplateContext) => CurlParserResult<ParsedRequest>;
};

const checkInput = (text: unknown, settings: CurlParserSettings): CurlParserResult<string> => {
  if (typeof text !== 'string') {
    return err('invalid_input', 'curl command must be a string');
  }

  const maxInputBytes = settings.limits.max_input_bytes;
  if (maxInputBytes === undefined) {
    return ok(text);
  }

  const size = Buffer.byteLength(text, 'utf8');
  if (size > maxInputBytes) {
    return err('input_too_large', `curl command is ${size} bytes, the limit is ${maxInputBytes} bytes`);
  }

  return ok(text);
};

const runPipeline = (text: string): CurlParserResult<ParsedRequest> => {
  const fragments = tokenizeCurlCommand(text);
  if (!fragments.ok) {
    return fragments;
  }

  const accumulator = reduceFragments(fragments.value);
  if (!accumulator.ok) {
    return accumulator;
  }

  return normalizeRequest(accumulator.value);
};

const describeHost = (url: string) => {
  try {
    return new URL(url).host;
  } catch {
    return undefined;
  }
};

export const createCurlParser = (options: CurlParserOptions = {}): CurlParser => {
  const {logger = createNoopLogger(), renderer, ...settingsInput} = options;
  const settings = CurlParserSettingsSchema.parse(settingsInput);
  const templateRenderer = renderer ?? createTemplateRenderer(settings.undefined_variables);

  const logFailure = (operation: 'parse' | 'load', failure: CurlParserFailure, startedAt: number) => {
    logger.warn({
      event: 'curl.parse.failed',
      component: LOG_COMPONENT,
      operation,
      message: failure.error.message,
      reason_code: failure.error.code,
      duration_ms: Math.round(performance.now() - startedAt),
      metadata: {
        ...(failure.error.position ? {line: failure.error.position.line, column: failure.error.position.column} : {})
      }
    });
    return failure;
  };

  const execute = (
    operation: 'parse' | 'load',
    text: string,
    prepare: (input: string) => CurlParserResult<string>
  ): CurlParserResult<ParsedRequest> => {
    const startedAt = performance.now();
    const input = checkInput(text, settings);
    if (!input.ok) {
      return logFailure(operation, input, startedAt);
    }

    const rendered = prepare(input.value);
    if (!rendered.ok) {
      return logFailure(operation, rendered, startedAt);
    }

    const parsed = runPipeline(rendered.value);
    if (!parsed.ok) {
      return logFailure(operation, parsed, startedAt);
    }

    logger.debug({
      event: 'curl.parse.completed',
      component: LOG_COMPONENT,
      operation,
      duration_ms: Math.round(performance.now() - startedAt),
      metadata: {
        method: parsed.value.method,
        host: describeHost(parsed.value.url),
        header_count: Object.keys(parsed.value.headers).length,
        data_part_count: parsed.value.body.length,
        insecure: parsed.value.insecure
      }
    });
    return parsed;
  };

  return {
    settings,
    parse: text => execute('parse', text, input => ok(input)),
    load: (text, context) =>
      execute('load', text, input =>
        context === undefined ? passthroughRenderer.render(input, {}) : templateRenderer.render(input, context)
      )
  };
};

const defaultParser = createCurlParser();

/** Parses a curl command line without template rendering. */
export const parseCurlCommand = (text: string): CurlParserResult<ParsedRequest> => defaultParser.parse(text);

/** Renders `{{ placeholders }}` from `context`, then parses the result. */
export const loadCurlCommand = (text: string, context?: TemplateContext): CurlParserResult<ParsedRequest> =>
  defaultParser.load(text, context);
