export {encodeRequestBody, FORM_URLENCODED_CONTENT_TYPE, JSON_CONTENT_TYPE} from './body';
export {
  CURLKIT_SERVICE_NAME,
  createCurlParserFromEnv,
  loadCurlParserConfig,
  type CurlParserConfig
} from './config';
export {
  CurlParserLimitsSchema,
  CurlParserSettingsSchema,
  DEFAULT_CURL_PARSER_LIMITS,
  ParsedRequestSchema,
  TemplateContextSchema,
  UndefinedVariablePolicySchema,
  type CurlParserLimits,
  type CurlParserSettings,
  type CurlParserSettingsInput,
  type ParsedRequest,
  type TemplateContext,
  type UndefinedVariablePolicy
} from './contracts';
export {
  curlParserErrorCodes,
  err,
  formatCurlParserError,
  ok,
  type CurlParserError,
  type CurlParserErrorCode,
  type CurlParserFailure,
  type CurlParserResult,
  type CurlParserSuccess,
  type SourcePosition
} from './errors';
export {
  CURL_FLAG_RULES,
  tokenizeCurlCommand,
  valueFragmentKinds,
  type CurlArgument,
  type CurlFlagRule,
  type Fragment,
  type FragmentKind,
  type QuoteStyle,
  type ValueFragment,
  type ValueFragmentKind
} from './grammar';
export {getRequestHeader} from './headers';
export {DEFAULT_ACCEPT, DEFAULT_BODY_CONTENT_TYPE, DEFAULT_SCHEME, normalizeRequest} from './normalize';
export {
  createCurlParser,
  loadCurlCommand,
  parseCurlCommand,
  type CurlParser,
  type CurlParserOptions
} from './parse';
export {reduceFragments, type RequestAccumulator} from './reducer';
export {toRequestInit, type RequestInitDescriptor} from './request';
export {createTemplateRenderer, type TemplateRenderer} from './template';
