import {createStructuredLogger, LogLevelSchema, type LogLevel, type StructuredLogWriter} from '@curlkit/logging';
import {z} from 'zod';

import {createCurlParser, type CurlParser} from './parse';

export const CURLKIT_SERVICE_NAME = 'curlkit';

const numberFromEnv = z.preprocess(value => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return value;
  }

  const parsed = Number(value.trim());
  return Number.isNaN(parsed) ? value : parsed;
}, z.number().int().positive().max(64 * 1024 * 1024));

const booleanFromEnv = z.preprocess(value => {
  if (typeof value !== 'string') {
    return value;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') {
    return true;
  }
  if (normalized === 'false' || normalized === '0') {
    return false;
  }

  return value;
}, z.boolean());

const logLevelFromEnv = z.preprocess(
  value => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  LogLevelSchema
);

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    CURLKIT_LOG_LEVEL: logLevelFromEnv.default('silent'),
    CURLKIT_MAX_INPUT_BYTES: numberFromEnv.optional(),
    CURLKIT_TEMPLATE_STRICT_UNDEFINED: booleanFromEnv.default(true)
  })
  .strict();

export type CurlParserConfig = {
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: LogLevel;
  maxInputBytes: number | undefined;
  strictUndefinedVariables: boolean;
};

const toEnvInput = (env: NodeJS.ProcessEnv) => ({
  NODE_ENV: env.NODE_ENV,
  CURLKIT_LOG_LEVEL: env.CURLKIT_LOG_LEVEL,
  CURLKIT_MAX_INPUT_BYTES: env.CURLKIT_MAX_INPUT_BYTES,
  CURLKIT_TEMPLATE_STRICT_UNDEFINED: env.CURLKIT_TEMPLATE_STRICT_UNDEFINED
});

const describeIssues = (error: z.ZodError) =>
  error.issues.map(issue => `${issue.path.map(String).join('.') || 'environment'}: ${issue.message}`).join('; ');

export const loadCurlParserConfig = (env: NodeJS.ProcessEnv = process.env): CurlParserConfig => {
  const parsed = envSchema.safeParse(toEnvInput(env));
  if (!parsed.success) {
    throw new Error(`Invalid curlkit configuration: ${describeIssues(parsed.error)}`);
  }

  return {
    nodeEnv: parsed.data.NODE_ENV,
    logLevel: parsed.data.CURLKIT_LOG_LEVEL,
    maxInputBytes: parsed.data.CURLKIT_MAX_INPUT_BYTES,
    strictUndefinedVariables: parsed.data.CURLKIT_TEMPLATE_STRICT_UNDEFINED
  };
};

/** Builds a parser whose logger, template policy and input limit come from the environment. */
export const createCurlParserFromEnv = ({
  env = process.env,
  writer
}: {
  env?: NodeJS.ProcessEnv;
  writer?: StructuredLogWriter;
} = {}): CurlParser => {
  const config = loadCurlParserConfig(env);
  const logger = createStructuredLogger({
    service: CURLKIT_SERVICE_NAME,
    env: config.nodeEnv,
    level: config.logLevel,
    ...(writer ? {writer} : {})
  });

  return createCurlParser({
    logger,
    undefined_variables: config.strictUndefinedVariables ? 'strict' : 'lenient',
    ...(config.maxInputBytes === undefined ? {} : {limits: {max_input_bytes: config.maxInputBytes}})
  });
};
