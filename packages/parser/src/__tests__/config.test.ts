import {describe, expect, it} from 'vitest';

import {createCurlParserFromEnv, formatCurlParserError, loadCurlParserConfig} from '../index';

describe('loadCurlParserConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadCurlParserConfig({})).toEqual({
      nodeEnv: 'development',
      logLevel: 'silent',
      maxInputBytes: undefined,
      strictUndefinedVariables: true
    });
  });

  it('reads every variable', () => {
    expect(
      loadCurlParserConfig({
        NODE_ENV: 'test',
        CURLKIT_LOG_LEVEL: ' DEBUG ',
        CURLKIT_MAX_INPUT_BYTES: '2048',
        CURLKIT_TEMPLATE_STRICT_UNDEFINED: '0'
      })
    ).toEqual({
      nodeEnv: 'test',
      logLevel: 'debug',
      maxInputBytes: 2048,
      strictUndefinedVariables: false
    });
  });

  it('names the variable that failed validation', () => {
    expect(() => loadCurlParserConfig({CURLKIT_MAX_INPUT_BYTES: 'lots'})).toThrow(/CURLKIT_MAX_INPUT_BYTES/);
    expect(() => loadCurlParserConfig({CURLKIT_MAX_INPUT_BYTES: '0'})).toThrow(/CURLKIT_MAX_INPUT_BYTES/);
    expect(() => loadCurlParserConfig({CURLKIT_TEMPLATE_STRICT_UNDEFINED: 'maybe'})).toThrow(
      /CURLKIT_TEMPLATE_STRICT_UNDEFINED/
    );
    expect(() => loadCurlParserConfig({CURLKIT_LOG_LEVEL: 'verbose'})).toThrow(/CURLKIT_LOG_LEVEL/);
  });
});

describe('createCurlParserFromEnv', () => {
  it('wires the environment into the parser and its logger', () => {
    const lines: string[] = [];
    const writer = {
      write: (chunk: string | Uint8Array) => {
        lines.push(String(chunk).trim());
        return true;
      }
    };

    const parser = createCurlParserFromEnv({
      env: {
        NODE_ENV: 'test',
        CURLKIT_LOG_LEVEL: 'debug',
        CURLKIT_MAX_INPUT_BYTES: '64',
        CURLKIT_TEMPLATE_STRICT_UNDEFINED: 'false'
      },
      writer: {stdout: writer, stderr: writer}
    });

    expect(parser.settings).toEqual({undefined_variables: 'lenient', limits: {max_input_bytes: 64}});

    const result = parser.parse(`curl https://h.test/${'a'.repeat(64)}`);
    expect(result.ok).toBe(false);
    if (result.ok) {
      return;
    }

    expect(formatCurlParserError(result.error)).toBe('input_too_large: curl command is 84 bytes, the limit is 64 bytes');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      service: 'curlkit',
      env: 'test',
      event: 'curl.parse.failed',
      reason_code: 'input_too_large'
    });
  });
});

describe('formatCurlParserError', () => {
  it('omits the location when the error has none', () => {
    expect(formatCurlParserError({code: 'url_required', message: 'A URL is required'})).toBe(
      'url_required: A URL is required'
    );
  });

  it('appends line and column when present', () => {
    expect(
      formatCurlParserError({
        code: 'grammar_invalid',
        message: 'Unknown or unsupported flag -Z',
        position: {offset: 12, line: 2, column: 3}
      })
    ).toBe('grammar_invalid: Unknown or unsupported flag -Z (line 2, column 3)');
  });
});
