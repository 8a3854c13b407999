export {getLogContext, LogContextSchema, runWithLogContext, setLogContextFields, type LogContext} from './context';
export {
  createNoopLogger,
  createStructuredLogger,
  LogEventInputSchema,
  LogEventSchema,
  LogLevelSchema,
  type LogEvent,
  type LogEventInput,
  type LogLevel,
  type StructuredLogger,
  type StructuredLoggerOptions,
  type StructuredLogWriter
} from './logger';
export {REDACTED, redactText, sanitizeForLog} from './redaction';
