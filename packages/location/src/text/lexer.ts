import type { SourceSpan } from "../diagnostics/index.js";
import { locationError } from "../errors.js";

export type Punctuation = "?" | ":" | "(" | ")" | "[" | "]" | "<" | ">" | "," | "@";

export type TokenKind = "string" | "integer" | "identifier" | Punctuation | "eof";

export interface Token {
  kind: TokenKind;
  /** Decoded contents for strings, source text otherwise. */
  value: string;
  start: number;
  end: number;
}

const punctuation = new Set<string>(["?", ":", "(", ")", "[", "]", "<", ">", ",", "@"]);

const isPunctuation = (char: string): char is Punctuation => punctuation.has(char);

const isDigit = (char: string | undefined): boolean =>
  char !== undefined && char >= "0" && char <= "9";

const isIdentifierStart = (char: string | undefined): boolean =>
  char !== undefined && /[A-Za-z_$]/.test(char);

const isIdentifierChar = (char: string | undefined): boolean =>
  char !== undefined && /[A-Za-z0-9_$.]/.test(char);

const isWhitespace = (char: string): boolean =>
  char === " " || char === "\t" || char === "\n" || char === "\r";

const escapes: Record<string, string> = {
  "\\": "\\",
  '"': '"',
  n: "\n",
  t: "\t",
};

export const describeToken = (token: Token): string =>
  token.kind === "eof"
    ? "end of input"
    : token.kind === "string"
      ? JSON.stringify(token.value)
      : `'${token.value}'`;

export const tokenize = (text: string, file: string): Token[] => {
  const tokens: Token[] = [];
  const span = (start: number, end: number): SourceSpan => ({ file, start, end });
  let index = 0;

  const readString = (): Token => {
    const start = index;
    let value = "";
    index += 1;
    while (index < text.length) {
      const char = text[index];
      if (char === '"') {
        index += 1;
        return { kind: "string", value, start, end: index };
      }
      if (char === "\\") {
        const next = text[index + 1];
        const decoded = next === undefined ? undefined : escapes[next];
        if (decoded === undefined) {
          throw locationError({
            code: "LP0002",
            params: { kind: "invalid-escape", sequence: `\\${next ?? ""}` },
            span: span(index, Math.min(index + 2, text.length)),
          });
        }
        value += decoded;
        index += 2;
        continue;
      }
      value += char;
      index += 1;
    }
    throw locationError({
      code: "LP0002",
      params: { kind: "unterminated-string" },
      span: span(start, text.length),
    });
  };

  const readInteger = (): Token => {
    const start = index;
    if (text[index] === "-") index += 1;
    while (isDigit(text[index])) index += 1;
    if (isIdentifierChar(text[index])) {
      // `12ab` or `3.5`: consume the rest so the diagnostic shows the whole word.
      while (isIdentifierChar(text[index])) index += 1;
      const word = text.slice(start, index);
      throw locationError({
        code: "LP0001",
        params: { kind: "invalid-integer", text: word },
        span: span(start, index),
      });
    }
    const value = text.slice(start, index);
    if (!Number.isSafeInteger(Number(value))) {
      throw locationError({
        code: "LP0001",
        params: { kind: "invalid-integer", text: value },
        span: span(start, index),
      });
    }
    return { kind: "integer", value, start, end: index };
  };

  while (index < text.length) {
    const char = text[index];

    if (isWhitespace(char)) {
      index += 1;
      continue;
    }

    if (char === '"') {
      tokens.push(readString());
      continue;
    }

    if (isDigit(char) || (char === "-" && isDigit(text[index + 1]))) {
      tokens.push(readInteger());
      continue;
    }

    if (isIdentifierStart(char)) {
      const start = index;
      while (isIdentifierChar(text[index])) index += 1;
      tokens.push({
        kind: "identifier",
        value: text.slice(start, index),
        start,
        end: index,
      });
      continue;
    }

    if (isPunctuation(char)) {
      tokens.push({ kind: char, value: char, start: index, end: index + 1 });
      index += 1;
      continue;
    }

    throw locationError({
      code: "LP0002",
      params: { kind: "unexpected-character", character: char },
      span: span(index, index + 1),
    });
  }

  tokens.push({ kind: "eof", value: "", start: text.length, end: text.length });
  return tokens;
};
