import {z} from 'zod';

const HttpTokenSchema = z.string().regex(/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/);

export const ParsedRequestSchema = z
  .object({
    method: HttpTokenSchema,
    url: z.string().min(1),
    headers: z.record(z.string().min(1), z.string()),
    body: z.array(z.string()),
    insecure: z.boolean()
  })
  .strict();

/** Immutable description of the HTTP request a curl command line stands for. */
export type ParsedRequest = {
  readonly method: string;
  /** Canonical absolute URL (`URL#href`). */
  readonly url: string;
  /** Lower-cased header names, one value each. */
  readonly headers: Readonly<Record<string, string>>;
  /** One entry per data flag, in source order. */
  readonly body: readonly string[];
  readonly insecure: boolean;
};

export const TemplateContextSchema = z.record(z.string(), z.unknown());
export type TemplateContext = z.infer<typeof TemplateContextSchema>;

export const UndefinedVariablePolicySchema = z.enum(['strict', 'lenient']);
export type UndefinedVariablePolicy = z.infer<typeof UndefinedVariablePolicySchema>;

export const CurlParserLimitsSchema = z
  .object({
    max_input_bytes: z
      .number()
      .int()
      .min(1)
      .max(64 * 1024 * 1024)
      .optional()
  })
  .strict();

export type CurlParserLimits = z.infer<typeof CurlParserLimitsSchema>;

export const DEFAULT_CURL_PARSER_LIMITS = CurlParserLimitsSchema.parse({});

export const CurlParserSettingsSchema = z
  .object({
    undefined_variables: UndefinedVariablePolicySchema.default('strict'),
    limits: CurlParserLimitsSchema.default(DEFAULT_CURL_PARSER_LIMITS)
  })
  .strict();

export type CurlParserSettings = z.infer<typeof CurlParserSettingsSchema>;
export type CurlParserSettingsInput = z.input<typeof CurlParserSettingsSchema>;
