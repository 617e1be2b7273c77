export type TokenKind =
  | "number"
  | "string"
  | "variable"
  | "gt"
  | "gte"
  | "lt"
  | "lte"
  | "eq"
  | "neq"
  | "prefix"
  | "lparen"
  | "rparen"
  | "and"
  | "or"
  | "unrecognized";

export interface Token {
  readonly kind: TokenKind;
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

const OPERATOR_SOURCE = String.raw`\band\b|\bor\b|!=|==|<=|>=|<|>|\(|\)|\.\*`;

// A quote closes a literal only when the next thing after it is an operator or
// the end of input, so `'it's'` stays one string.
function quotedSource(quote: string): string {
  return `${quote}(?:[^${quote}]|${quote}(?!\\s*(?:$|${OPERATOR_SOURCE})))*${quote}`;
}

// Quoted literals come first so that operators inside them are not split out.
// Two-character operators are listed before their one-character prefixes.
const DELIMITER_SOURCE = [quotedSource("\""), quotedSource("'"), OPERATOR_SOURCE].join("|");

const DIGITS = String.raw`\d(?:_?\d)*`;

const NUMBER_PATTERN = new RegExp(
  String.raw`^[+-]?(?:(?:${DIGITS}(?:\.(?:${DIGITS})?)?|\.${DIGITS})(?:[eE][+-]?${DIGITS})?|inf(?:inity)?|nan)$`,
  "i",
);

const VARIABLE_PATTERN = /^[-!A-Za-z0-9_]+$/;

const delimiterKinds = new Map<string, TokenKind>([
  ["and", "and"],
  ["or", "or"],
  ["!=", "neq"],
  ["==", "eq"],
  ["<=", "lte"],
  [">=", "gte"],
  ["<", "lt"],
  [">", "gt"],
  ["(", "lparen"],
  [")", "rparen"],
  [".*", "prefix"],
]);

/** Reads a `number` token: digit separators, `inf`, `infinity` and `nan` included. */
export function parseNumber(text: string): number {
  const normalized = text.replaceAll("_", "").toLowerCase();
  const unsigned = normalized.replace(/^[+-]/, "");
  const sign = normalized.startsWith("-") ? -1 : 1;

  if (unsigned === "inf" || unsigned === "infinity") {
    return sign * Number.POSITIVE_INFINITY;
  }

  if (unsigned === "nan") {
    return Number.NaN;
  }

  return Number(normalized);
}

function isQuoted(text: string): boolean {
  if (text.length < 2) {
    return false;
  }

  const first = text[0];
  return (first === "\"" || first === "'") && text[text.length - 1] === first;
}

function classifyFragment(text: string): TokenKind {
  const delimiter = delimiterKinds.get(text);

  if (delimiter) {
    return delimiter;
  }

  if (isQuoted(text)) {
    return "string";
  }

  if (NUMBER_PATTERN.test(text)) {
    return "number";
  }

  if (VARIABLE_PATTERN.test(text)) {
    return "variable";
  }

  return "unrecognized";
}

function pushFragment(tokens: Token[], source: string, start: number, end: number): void {
  const raw = source.slice(start, end);
  const text = raw.trim();

  if (text === "") {
    return;
  }

  const offset = start + raw.length - raw.trimStart().length;

  tokens.push({
    kind: classifyFragment(text),
    text,
    start: offset,
    end: offset + text.length,
  });
}

/**
 * Splits `source` on operators, parentheses and quoted literals, keeping the
 * delimiters as tokens. Fragments of no known shape are tagged `unrecognized`
 * and left for the parser to reject.
 */
export function tokenize(source: string): Token[] {
  const pattern = new RegExp(DELIMITER_SOURCE, "g");
  const tokens: Token[] = [];
  let offset = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(source)) !== null) {
    pushFragment(tokens, source, offset, match.index);
    pushFragment(tokens, source, match.index, match.index + match[0].length);
    offset = match.index + match[0].length;
  }

  pushFragment(tokens, source, offset, source.length);

  return tokens;
}
