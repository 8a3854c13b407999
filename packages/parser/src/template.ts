import {Environment} from 'nunjucks';

import {TemplateContextSchema, type TemplateContext, type UndefinedVariablePolicy} from './contracts';
import {err, ok, type CurlParserResult} from './errors';

export type TemplateRenderer = {
  render: (text: string, context: TemplateContext) => CurlParserResult<string>;
};

const templateEnvironments = new Map<UndefinedVariablePolicy, Environment>();

// One read-only environment per policy, created on first use.
const getTemplateEnvironment = (policy: UndefinedVariablePolicy): Environment => {
  const existing = templateEnvironments.get(policy);
  if (existing) {
    return existing;
  }

  const environment = new Environment(null, {
    autoescape: false,
    throwOnUndefined: policy === 'strict'
  });
  templateEnvironments.set(policy, environment);
  return environment;
};

const describeRenderFailure = (error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  // nunjucks prefixes messages with a multi-line "(unknown path)" banner.
  return message
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0)
    .join(' ');
};

export const createTemplateRenderer = (policy: UndefinedVariablePolicy = 'strict'): TemplateRenderer => ({
  render: (text, context) => {
    const parsedContext = TemplateContextSchema.safeParse(context);
    if (!parsedContext.success) {
      return err('invalid_input', `Template context must be an object: ${parsedContext.error.message}`);
    }

    try {
      return ok(getTemplateEnvironment(policy).renderString(text, parsedContext.data));
    } catch (error) {
      return err('template_render_failed', `Failed to render curl template: ${describeRenderFailure(error)}`);
    }
  }
});

export const passthroughRenderer: TemplateRenderer = {
  render: text => ok(text)
};
