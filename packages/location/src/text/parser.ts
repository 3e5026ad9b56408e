import type { LocationContext } from "../context.js";
import {
  UNSET_POSITION,
  type FileRangeFields,
  type LocationMetadata,
} from "../descriptors.js";
import { locationError } from "../errors.js";
import { fileRangeProblem } from "../file-range.js";
import type { Location } from "../location.js";
import { describeToken, tokenize, type Token, type TokenKind } from "./lexer.js";

export type ParseLocationOptions = {
  /** Name of the text being parsed, used in diagnostic spans. */
  file?: string;
};

/**
 * Recursive-descent parser for the location syntax:
 *
 *   ?                                  unknown
 *   "file":line(:col(to (line)?:col)?)?  file range
 *   "name"("(" location ")")?          name
 *   callsite(location at location)     call site
 *   fused(<metadata>)?[location, ...]  fused
 */
class LocationParser {
  readonly #context: LocationContext;
  readonly #file: string;
  readonly #tokens: Token[];
  #index = 0;

  constructor(context: LocationContext, text: string, file: string) {
    this.#context = context;
    this.#file = file;
    this.#tokens = tokenize(text, file);
  }

  parseAll(): Location {
    const location = this.parseLocation();
    this.expect("eof", "end of input");
    return location;
  }

  parseLocation(): Location {
    const token = this.peek();

    if (token.kind === "?") {
      this.advance();
      return this.#context.unknown;
    }

    if (token.kind === "string") {
      this.advance();
      if (this.peek().kind === ":") {
        return this.parseFileRange(token);
      }
      if (this.peek().kind === "(") {
        this.advance();
        const child = this.parseLocation();
        this.expect(")", "')'");
        return this.#context.name(token.value, child);
      }
      return this.#context.name(token.value);
    }

    if (this.isKeyword(token, "callsite")) {
      this.advance();
      this.expect("(", "'('");
      const callee = this.parseLocation();
      this.expectKeyword("at");
      const caller = this.parseLocation();
      this.expect(")", "')'");
      return this.#context.callSite(callee, caller);
    }

    if (this.isKeyword(token, "fused")) {
      this.advance();
      let metadata: LocationMetadata | undefined;
      if (this.peek().kind === "<") {
        this.advance();
        metadata = this.parseMetadata();
        this.expect(">", "'>'");
      }
      this.expect("[", "'['");
      const locations = this.parseList("]", () => this.parseLocation());
      return this.#context.fused(locations, metadata);
    }

    return this.unexpected(token, "a location");
  }

  parseFileRange(filename: Token): Location {
    if (filename.value.length === 0) {
      throw locationError({
        code: "LB0001",
        params: { kind: "missing-field", variant: "file-range", field: "filename" },
        span: this.spanOf(filename),
      });
    }
    this.expect(":", "':'");
    const start = filename.start;
    const startLine = this.parsePosition();
    let startColumn = UNSET_POSITION;
    let endLine = startLine;
    let endColumn = UNSET_POSITION;

    if (this.peek().kind === ":") {
      this.advance();
      startColumn = this.parsePosition();
      endColumn = startColumn;
      if (this.isKeyword(this.peek(), "to")) {
        this.advance();
        if (this.peek().kind === "integer") {
          endLine = this.parsePosition();
        }
        this.expect(":", "':'");
        endColumn = this.parsePosition();
      }
    }

    const fields: FileRangeFields = {
      filename: filename.value,
      startLine,
      startColumn,
      endLine,
      endColumn,
    };
    const reason = fileRangeProblem(fields);
    if (reason !== undefined) {
      throw locationError({
        code: "LP0001",
        params: { kind: "invalid-range", reason },
        span: { file: this.#file, start, end: this.previous().end },
      });
    }
    return this.#context.fileRange(fields);
  }

  parsePosition(): number {
    const token = this.expect("integer", "a line or column number");
    const value = Number(token.value);
    if (value < 0) {
      throw locationError({
        code: "LP0001",
        params: { kind: "invalid-integer", text: token.value },
        span: this.spanOf(token),
      });
    }
    return value;
  }

  parseMetadata(): LocationMetadata {
    const token = this.peek();
    switch (token.kind) {
      case "string":
        this.advance();
        return { kind: "string", value: token.value };
      case "integer":
        this.advance();
        return { kind: "integer", value: Number(token.value) };
      case "@": {
        this.advance();
        const name = this.peek();
        if (name.kind !== "identifier" && name.kind !== "string") {
          return this.unexpected(name, "a symbol name");
        }
        this.advance();
        return { kind: "symbol", name: name.value };
      }
      case "[":
        this.advance();
        return {
          kind: "array",
          elements: this.parseList("]", () => this.parseMetadata()),
        };
      case "identifier":
        if (token.value === "true" || token.value === "false") {
          this.advance();
          return { kind: "bool", value: token.value === "true" };
        }
        if (token.value === "unit") {
          this.advance();
          return { kind: "unit" };
        }
        return this.unexpected(token, "a metadata value");
      default:
        return this.unexpected(token, "a metadata value");
    }
  }

  /** Comma-separated items up to `close`; the opening bracket is already consumed. */
  parseList<T>(close: TokenKind, parseItem: () => T): T[] {
    const items: T[] = [];
    if (this.peek().kind === close) {
      this.advance();
      return items;
    }
    items.push(parseItem());
    while (this.peek().kind === ",") {
      this.advance();
      items.push(parseItem());
    }
    this.expect(close, `',' or '${close}'`);
    return items;
  }

  private peek(): Token {
    return this.#tokens[this.#index];
  }

  private previous(): Token {
    return this.#tokens[Math.max(0, this.#index - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.kind !== "eof") {
      this.#index += 1;
    }
    return token;
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.kind === "identifier" && token.value === keyword;
  }

  private expect(kind: TokenKind, description: string): Token {
    const token = this.peek();
    if (token.kind !== kind) {
      return this.unexpected(token, description);
    }
    return this.advance();
  }

  private expectKeyword(keyword: string): Token {
    const token = this.peek();
    if (!this.isKeyword(token, keyword)) {
      return this.unexpected(token, `'${keyword}'`);
    }
    return this.advance();
  }

  private spanOf(token: Token) {
    return { file: this.#file, start: token.start, end: token.end };
  }

  private unexpected(token: Token, expected: string): never {
    throw locationError({
      code: "LP0002",
      params: { kind: "unexpected-token", expected, found: describeToken(token) },
      span: this.spanOf(token),
    });
  }
}

/** Parses one location from `text` into `context`. Throws `LocationError` on malformed input. */
export const parseLocation = (
  context: LocationContext,
  text: string,
  options: ParseLocationOptions = {},
): Location =>
  new LocationParser(context, text, options.file ?? "<location>").parseAll();
