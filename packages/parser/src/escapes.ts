/**
 * Escape sequences understood inside double-quoted curl arguments and in
 * header values. Anything else after a backslash is kept as-is, backslash included.
 */
export const ESCAPE_SEQUENCES: Readonly<Record<string, string>> = Object.freeze({
  '"': '"',
  '\\': '\\',
  '/': '/',
  n: '\n',
  r: '\r',
  t: '\t'
});

export const unescapeValue = (value: string): string => {
  let result = '';

  for (let index = 0; index < value.length; index += 1) {
    const char = value.charAt(index);
    if (char !== '\\' || index + 1 >= value.length) {
      result += char;
      continue;
    }

    const next = value.charAt(index + 1);
    const translated = ESCAPE_SEQUENCES[next];
    result += translated ?? `${char}${next}`;
    index += 1;
  }

  return result;
};

/** Removes one layer of matching single or double quotes. */
export const removeMatchingQuotes = (value: string): string => {
  if (value.length < 2) {
    return value;
  }

  const first = value.charAt(0);
  const last = value.charAt(value.length - 1);
  if ((first === "'" || first === '"') && first === last) {
    return value.slice(1, -1);
  }

  return value;
};
