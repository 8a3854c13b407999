import {err, ok, type CurlParserResult, type SourcePosition} from './errors';
import {ESCAPE_SEQUENCES} from './escapes';

export type QuoteStyle = 'none' | 'single' | 'double' | 'mixed';

export type CurlArgument = {
  /** Source text of the argument, quotes included. */
  raw: string;
  /** Argument with its quote layer removed and double-quoted escapes translated. */
  value: string;
  quote: QuoteStyle;
  /** True when at least one double-quoted segment had its escapes translated. */
  escapesDecoded: boolean;
  position: SourcePosition;
};

export const valueFragmentKinds = ['method', 'url', 'location', 'header', 'auth', 'body'] as const;
export type ValueFragmentKind = (typeof valueFragmentKinds)[number];
export type FragmentKind = ValueFragmentKind | 'insecure' | 'end_of_input';

export type ValueFragment = {
  kind: ValueFragmentKind;
  /** Flag spelling as written, `null` for the positional URL. */
  flag: string | null;
  argument: CurlArgument;
  position: SourcePosition;
};

export type InsecureFragment = {
  kind: 'insecure';
  flag: string;
  position: SourcePosition;
};

export type EndOfInputFragment = {
  kind: 'end_of_input';
  position: SourcePosition;
};

export type Fragment = ValueFragment | InsecureFragment | EndOfInputFragment;

export type CurlFlagRule =
  | {kind: Exclude<ValueFragmentKind, 'url'>; flags: readonly string[]; takesValue: true; valueLabel: string}
  | {kind: 'insecure'; flags: readonly string[]; takesValue: false};

export const CURL_FLAG_RULES: ReadonlyArray<CurlFlagRule> = [
  {kind: 'method', flags: ['-X', '--request'], takesValue: true, valueLabel: 'an HTTP method'},
  {kind: 'header', flags: ['-H', '--header'], takesValue: true, valueLabel: 'a "Name: value" header'},
  {kind: 'body', flags: ['-d', '--data', '--data-raw'], takesValue: true, valueLabel: 'request data'},
  {kind: 'auth', flags: ['-u', '--user'], takesValue: true, valueLabel: 'user:password credentials'},
  {kind: 'location', flags: ['-L', '--location'], takesValue: true, valueLabel: 'a URL'},
  {kind: 'insecure', flags: ['-k', '--insecure'], takesValue: false}
];

const FLAG_RULE_LOOKUP: ReadonlyMap<string, CurlFlagRule> = new Map(
  CURL_FLAG_RULES.flatMap(rule => rule.flags.map(flag => [flag, rule] as const))
);

const COMMAND_NAME_REGEX = /^(?:.*\/)?curl(?:\.exe)?$/iu;
const WHITESPACE_REGEX = /\s/u;

type Scanner = {
  input: string;
  offset: number;
  lineStarts: number[];
};

type WordSegment = {quote: 'none' | 'single' | 'double'; text: string};

const createScanner = (input: string): Scanner => {
  const lineStarts = [0];
  for (let index = 0; index < input.length; index += 1) {
    if (input.charAt(index) === '\n') {
      lineStarts.push(index + 1);
    }
  }

  return {input, offset: 0, lineStarts};
};

const positionAt = (lineStarts: readonly number[], offset: number): SourcePosition => {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const middle = (low + high + 1) >> 1;
    if ((lineStarts[middle] ?? 0) <= offset) {
      low = middle;
    } else {
      high = middle - 1;
    }
  }

  return {offset, line: low + 1, column: offset - (lineStarts[low] ?? 0) + 1};
};

const currentPosition = (scanner: Scanner) => positionAt(scanner.lineStarts, scanner.offset);

const isAtEnd = (scanner: Scanner) => scanner.offset >= scanner.input.length;

const isWhitespace = (char: string) => WHITESPACE_REGEX.test(char);

/** Length of a backslash-newline continuation starting at `offset`, 0 if there is none. */
const continuationLength = (input: string, offset: number) => {
  if (input.charAt(offset) !== '\\') {
    return 0;
  }
  if (input.charAt(offset + 1) === '\n') {
    return 2;
  }
  if (input.charAt(offset + 1) === '\r' && input.charAt(offset + 2) === '\n') {
    return 3;
  }
  return 0;
};

const isAtLineStart = (scanner: Scanner) => {
  const lineStart = scanner.input.lastIndexOf('\n', scanner.offset - 1) + 1;
  return scanner.input.slice(lineStart, scanner.offset).trim().length === 0;
};

const skipComment = (scanner: Scanner) => {
  const lineEnd = scanner.input.indexOf('\n', scanner.offset);
  scanner.offset = lineEnd === -1 ? scanner.input.length : lineEnd;
};

// trivia := (whitespace | continuation | comment-line)*
const skipTrivia = (scanner: Scanner) => {
  while (!isAtEnd(scanner)) {
    const char = scanner.input.charAt(scanner.offset);
    if (isWhitespace(char)) {
      scanner.offset += 1;
      continue;
    }

    const continuation = continuationLength(scanner.input, scanner.offset);
    if (continuation > 0) {
      scanner.offset += continuation;
      continue;
    }

    if (char === '#' && isAtLineStart(scanner)) {
      skipComment(scanner);
      continue;
    }

    return;
  }
};

// single-quoted := "'" (!"'" any)* "'"
const readSingleQuoted = (scanner: Scanner): CurlParserResult<WordSegment> => {
  const opening = currentPosition(scanner);
  const closing = scanner.input.indexOf("'", scanner.offset + 1);
  if (closing === -1) {
    scanner.offset = scanner.input.length;
    return err('grammar_invalid', 'Unterminated single-quoted argument', {position: opening});
  }

  const text = scanner.input.slice(opening.offset + 1, closing);
  scanner.offset = closing + 1;
  return ok({quote: 'single', text});
};

// double-quoted := '"' (escape | !'"' any)* '"'
const readDoubleQuoted = (scanner: Scanner): CurlParserResult<WordSegment> => {
  const opening = currentPosition(scanner);
  let text = '';
  scanner.offset += 1;

  while (!isAtEnd(scanner)) {
    const char = scanner.input.charAt(scanner.offset);
    if (char === '"') {
      scanner.offset += 1;
      return ok({quote: 'double', text});
    }

    if (char === '\\' && scanner.offset + 1 < scanner.input.length) {
      const next = scanner.input.charAt(scanner.offset + 1);
      text += ESCAPE_SEQUENCES[next] ?? `${char}${next}`;
      scanner.offset += 2;
      continue;
    }

    text += char;
    scanner.offset += 1;
  }

  return err('grammar_invalid', 'Unterminated double-quoted argument', {position: opening});
};

const describeQuoting = (segments: readonly WordSegment[]): QuoteStyle => {
  const [first] = segments;
  if (segments.length === 1 && first) {
    return first.quote;
  }

  return segments.every(segment => segment.quote === 'none') ? 'none' : 'mixed';
};

// argument := (bare-char | single-quoted | double-quoted)+
const readArgument = (scanner: Scanner): CurlParserResult<CurlArgument> => {
  const position = currentPosition(scanner);
  const segments: WordSegment[] = [];
  let bare = '';

  const flushBare = () => {
    if (bare.length > 0) {
      segments.push({quote: 'none', text: bare});
      bare = '';
    }
  };

  while (!isAtEnd(scanner)) {
    const char = scanner.input.charAt(scanner.offset);
    if (isWhitespace(char) || continuationLength(scanner.input, scanner.offset) > 0) {
      break;
    }

    if (char === "'" || char === '"') {
      flushBare();
      const segment = char === "'" ? readSingleQuoted(scanner) : readDoubleQuoted(scanner);
      if (!segment.ok) {
        return segment;
      }
      segments.push(segment.value);
      continue;
    }

    bare += char;
    scanner.offset += 1;
  }
  flushBare();

  return ok({
    raw: scanner.input.slice(position.offset, scanner.offset),
    value: segments.map(segment => segment.text).join(''),
    quote: describeQuoting(segments),
    escapesDecoded: segments.some(segment => segment.quote === 'double'),
    position
  });
};

const isFlagLike = (argument: CurlArgument) =>
  argument.quote === 'none' && argument.value.length > 1 && argument.value.startsWith('-');

const readCommandName = (scanner: Scanner): CurlParserResult<void> => {
  skipTrivia(scanner);
  if (isAtEnd(scanner)) {
    return err('grammar_invalid', 'Expected a curl command but the input is empty', {
      position: currentPosition(scanner)
    });
  }

  const command = readArgument(scanner);
  if (!command.ok) {
    return command;
  }

  if (command.value.quote !== 'none' || !COMMAND_NAME_REGEX.test(command.value.value)) {
    return err('grammar_invalid', `Expected the command to start with "curl", found "${command.value.raw}"`, {
      raw: command.value.raw,
      position: command.value.position
    });
  }

  return ok(undefined);
};

const readFlagFragment = ({
  scanner,
  argument,
  rule
}: {
  scanner: Scanner;
  argument: CurlArgument;
  rule: CurlFlagRule;
}): CurlParserResult<Fragment> => {
  if (!rule.takesValue) {
    return ok({kind: rule.kind, flag: argument.value, position: argument.position});
  }

  skipTrivia(scanner);
  if (isAtEnd(scanner)) {
    return err('grammar_invalid', `Flag ${argument.value} expects ${rule.valueLabel} but the input ended`, {
      raw: argument.raw,
      position: argument.position
    });
  }

  const value = readArgument(scanner);
  if (!value.ok) {
    return value;
  }

  return ok({kind: rule.kind, flag: argument.value, argument: value.value, position: argument.position});
};

/**
 * Splits a curl command line into fragments, one per recognized flag or positional
 * argument, terminated by a single `end_of_input` fragment.
 */
export const tokenizeCurlCommand = (input: string): CurlParserResult<Fragment[]> => {
  const scanner = createScanner(input);
  const command = readCommandName(scanner);
  if (!command.ok) {
    return command;
  }

  const fragments: Fragment[] = [];
  for (;;) {
    skipTrivia(scanner);
    if (isAtEnd(scanner)) {
      fragments.push({kind: 'end_of_input', position: currentPosition(scanner)});
      return ok(fragments);
    }

    const argument = readArgument(scanner);
    if (!argument.ok) {
      return argument;
    }

    if (!isFlagLike(argument.value)) {
      fragments.push({kind: 'url', flag: null, argument: argument.value, position: argument.value.position});
      continue;
    }

    const rule = FLAG_RULE_LOOKUP.get(argument.value.value);
    if (!rule) {
      return err('grammar_invalid', `Unknown or unsupported flag ${argument.value.value}`, {
        raw: argument.value.raw,
        position: argument.value.position
      });
    }

    const fragment = readFlagFragment({scanner, argument: argument.value, rule});
    if (!fragment.ok) {
      return fragment;
    }
    fragments.push(fragment.value);
  }
};
