import type {Writable} from 'node:stream';

import {z} from 'zod';

import {getLogContext, type LogContext} from './context';
import {sanitizeForLog} from './redaction';

const EMITTABLE_LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;

const EmittableLogLevelSchema = z.enum(EMITTABLE_LOG_LEVELS);
type EmittableLogLevel = z.infer<typeof EmittableLogLevelSchema>;

export const LogLevelSchema = z.enum([...EMITTABLE_LOG_LEVELS, 'silent'] as const);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const LOG_LEVEL_ORDER = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 90
} as const satisfies Record<LogLevel, number>;

const MISSING_ID = 'n/a';

const NonEmptyStringSchema = z.string().min(1);

export const LogEventInputSchema = z
  .object({
    level: EmittableLogLevelSchema,
    event: NonEmptyStringSchema,
    component: NonEmptyStringSchema,
    message: NonEmptyStringSchema.optional(),
    correlation_id: z.string().min(1).max(128).optional(),
    request_id: z.string().min(1).max(128).optional(),
    source: NonEmptyStringSchema.optional(),
    operation: NonEmptyStringSchema.optional(),
    reason_code: NonEmptyStringSchema.optional(),
    duration_ms: z.number().gte(0).optional(),
    metadata: z.record(z.string(), z.unknown()).optional()
  })
  .strict();

export type LogEventInput = z.infer<typeof LogEventInputSchema>;

/** One JSON line as written to the output streams. */
export const LogEventSchema = LogEventInputSchema.extend({
  ts: z.iso.datetime(),
  service: NonEmptyStringSchema,
  env: NonEmptyStringSchema,
  correlation_id: NonEmptyStringSchema,
  request_id: NonEmptyStringSchema,
  metadata: z.record(z.string(), z.unknown())
}).strict();

export type LogEvent = z.infer<typeof LogEventSchema>;

export type StructuredLogWriter = {
  stdout: Pick<Writable, 'write'>;
  stderr: Pick<Writable, 'write'>;
};

export type StructuredLoggerOptions = {
  service: string;
  env: string;
  level: LogLevel;
  now?: () => Date;
  writer?: StructuredLogWriter;
  extraSensitiveKeys?: string[];
};

type LevelMethod = (input: Omit<LogEventInput, 'level'>) => void;

export type StructuredLogger = {
  log: (input: LogEventInput) => void;
} & Record<EmittableLogLevel, LevelMethod>;

const processWriter: StructuredLogWriter = {
  stdout: process.stdout,
  stderr: process.stderr
};

const buildLogEvent = ({
  input,
  context,
  ts,
  service,
  env,
  extraSensitiveKeys
}: {
  input: LogEventInput;
  context: Readonly<LogContext> | undefined;
  ts: string;
  service: string;
  env: string;
  extraSensitiveKeys: readonly string[];
}): LogEvent =>
  LogEventSchema.parse({
    ...input,
    ts,
    service,
    env,
    correlation_id: input.correlation_id ?? context?.correlation_id ?? MISSING_ID,
    request_id: input.request_id ?? context?.request_id ?? MISSING_ID,
    source: input.source ?? context?.source,
    operation: input.operation ?? context?.operation,
    metadata: sanitizeForLog({value: input.metadata ?? {}, extraSensitiveKeys})
  });

/**
 * Writes one JSON object per line: `error` and `fatal` to stderr, everything
 * else to stdout. Events that fail validation are dropped.
 */
export const createStructuredLogger = ({
  service,
  env,
  level,
  now = () => new Date(),
  writer = processWriter,
  extraSensitiveKeys = []
}: StructuredLoggerOptions): StructuredLogger => {
  const threshold = LOG_LEVEL_ORDER[LogLevelSchema.parse(level)];
  const identity = {service: NonEmptyStringSchema.parse(service), env: NonEmptyStringSchema.parse(env)};

  const log = (rawInput: LogEventInput) => {
    const input = LogEventInputSchema.safeParse(rawInput);
    if (!input.success || LOG_LEVEL_ORDER[input.data.level] < threshold) {
      return;
    }

    const stream = input.data.level === 'error' || input.data.level === 'fatal' ? writer.stderr : writer.stdout;
    try {
      const event = buildLogEvent({
        input: input.data,
        context: getLogContext(),
        ts: now().toISOString(),
        extraSensitiveKeys,
        ...identity
      });
      stream.write(`${JSON.stringify(event)}\n`);
    } catch {
      // A failing writer drops the line; callers never see logging errors.
    }
  };

  const atLevel =
    (eventLevel: EmittableLogLevel): LevelMethod =>
    input =>
      log({...input, level: eventLevel});

  return {
    log,
    debug: atLevel('debug'),
    info: atLevel('info'),
    warn: atLevel('warn'),
    error: atLevel('error'),
    fatal: atLevel('fatal')
  };
};

const discard: LevelMethod = () => undefined;

export const createNoopLogger = (): StructuredLogger => ({
  log: discard,
  debug: discard,
  info: discard,
  warn: discard,
  error: discard,
  fatal: discard
});
