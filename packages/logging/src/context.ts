import {AsyncLocalStorage} from 'node:async_hooks';

import {z} from 'zod';

const ContextIdSchema = z.string().min(1).max(128);

export const LogContextSchema = z
  .object({
    correlation_id: ContextIdSchema.optional(),
    request_id: ContextIdSchema.optional(),
    /** Where the curl text came from, e.g. a file path or `clipboard`. */
    source: z.string().min(1).optional(),
    operation: z.string().min(1).optional()
  })
  .strict();

export type LogContext = z.infer<typeof LogContextSchema>;

const contextStore = new AsyncLocalStorage<LogContext>();

/**
 * Runs `callback` with `context` attached to every log line it emits, across
 * awaits. A nested run starts from a copy of the enclosing context.
 */
export const runWithLogContext = <T>(context: LogContext, callback: () => T): T =>
  contextStore.run({...contextStore.getStore(), ...LogContextSchema.parse(context)}, callback);

export const getLogContext = (): Readonly<LogContext> | undefined => contextStore.getStore();

/** Merges `fields` into the active context; returns `undefined` when there is none. */
export const setLogContextFields = (fields: Partial<LogContext>): LogContext | undefined => {
  const active = contextStore.getStore();
  if (active === undefined) {
    return undefined;
  }

  return Object.assign(active, LogContextSchema.partial().parse(fields));
};
