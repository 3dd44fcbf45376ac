const NON_BREAKING_SPACE = /&nbsp;|\u00a0/g;

// Any whitespace except U+00A0, which glues words together.
const WORD_SEPARATOR = /[^\S\u00a0]+/;

export const tokenize = (text: string): string[] =>
  text
    .split(WORD_SEPARATOR)
    .filter((token) => token.length > 0)
    .map((token) => token.replace(NON_BREAKING_SPACE, " "));
