import type { SourceLocation, StoryDiagnostic, StoryDiagnosticCode, TemplatePart } from "./types.ts";

export const KEYWORDS = ["SET", "IF", "THEN", "true", "false"] as const;
export type Keyword = (typeof KEYWORDS)[number];

export const SYMBOLS = ["->", "!=", "=", ">", "<", "[", "]"] as const;
export type Punctuator = (typeof SYMBOLS)[number];

export type Token =
  | { type: "keyword"; value: Keyword; location: SourceLocation }
  | { type: "name"; value: string; location: SourceLocation }
  | { type: "number"; value: number; location: SourceLocation }
  | { type: "string"; parts: TemplatePart[]; location: SourceLocation }
  | { type: "symbol"; value: Punctuator; location: SourceLocation }
  | { type: "eof"; location: SourceLocation };

const INT32_MIN = -2_147_483_648;
const INT32_MAX = 2_147_483_647;

export class StorySyntaxError extends Error {
  readonly diagnostic: StoryDiagnostic;

  constructor(code: StoryDiagnosticCode, message: string, location: SourceLocation) {
    super(`${message} (line ${location.line}, column ${location.column})`);
    this.name = "StorySyntaxError";
    this.diagnostic = { code, message, location };
  }
}

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /^[A-Za-z0-9_]$/.test(ch);
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "0" && ch <= "9";
}

function isKeyword(word: string): word is Keyword {
  return (KEYWORDS as readonly string[]).includes(word);
}

export function normalizeSource(text: string): string {
  return text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

class Scanner {
  private offset = 0;
  private line = 1;
  private column = 1;

  constructor(private readonly source: string) {}

  get done(): boolean {
    return this.offset >= this.source.length;
  }

  peek(distance = 0): string | undefined {
    return this.source[this.offset + distance];
  }

  next(): string {
    const ch = this.source[this.offset] ?? "";
    this.offset += 1;
    if (ch === "\n") {
      this.line += 1;
      this.column = 1;
    } else {
      this.column += 1;
    }
    return ch;
  }

  location(): SourceLocation {
    return { line: this.line, column: this.column };
  }
}

function scanWord(scanner: Scanner): string {
  let word = "";
  while (isWordChar(scanner.peek())) {
    word += scanner.next();
  }
  return word;
}

function toInteger(digits: string, location: SourceLocation): number {
  const value = Number(digits);
  if (!Number.isSafeInteger(value) || value < INT32_MIN || value > INT32_MAX) {
    throw new StorySyntaxError("integer_out_of_range", `integer ${digits} does not fit in 32 bits`, location);
  }
  return value;
}

function scanNegativeNumber(scanner: Scanner, location: SourceLocation): Token {
  let digits = scanner.next();
  while (isDigit(scanner.peek())) {
    digits += scanner.next();
  }
  if (isWordChar(scanner.peek())) {
    throw new StorySyntaxError(
      "unexpected_character",
      `unexpected character '${scanner.peek()}' after number ${digits}`,
      scanner.location(),
    );
  }
  return { type: "number", value: toInteger(digits, location), location };
}

/** A run of word characters is a number only when every one of them is a digit. */
function scanWordOrNumber(scanner: Scanner, location: SourceLocation): Token {
  const word = scanWord(scanner);
  if (/^[0-9]+$/.test(word)) return { type: "number", value: toInteger(word, location), location };
  if (isKeyword(word)) return { type: "keyword", value: word, location };
  return { type: "name", value: word, location };
}

type Placeholder = Extract<TemplatePart, { kind: "placeholder" }>;

function scanPlaceholder(scanner: Scanner): Placeholder {
  const location = scanner.location();
  scanner.next();
  const name = scanWord(scanner);
  if (!name || scanner.peek() !== "}") {
    throw new StorySyntaxError(
      "malformed_placeholder",
      "placeholder must look like {variable_name}",
      location,
    );
  }
  scanner.next();
  return { kind: "placeholder", name, location };
}

function scanString(scanner: Scanner, location: SourceLocation): Token {
  scanner.next();
  const parts: TemplatePart[] = [];
  let literal = "";

  const flush = () => {
    if (literal) parts.push({ kind: "literal", text: literal });
    literal = "";
  };

  for (;;) {
    if (scanner.done) {
      throw new StorySyntaxError("unterminated_string", "string is never closed", location);
    }
    const ch = scanner.peek();
    if (ch === '"') {
      scanner.next();
      break;
    }
    if (ch === "\\") {
      const escapeAt = scanner.location();
      scanner.next();
      if (scanner.done) {
        throw new StorySyntaxError("unterminated_string", "string is never closed", location);
      }
      const escaped = scanner.next();
      const decoded =
        escaped === "n" ? "\n" : escaped === '"' || escaped === "\\" || escaped === "{" || escaped === "}" ? escaped : null;
      if (decoded == null) {
        throw new StorySyntaxError("invalid_escape", `unknown escape sequence '\\${escaped}'`, escapeAt);
      }
      literal += decoded;
      continue;
    }
    if (ch === "{") {
      flush();
      const placeholder = scanPlaceholder(scanner);
      parts.push(placeholder);
      continue;
    }
    literal += scanner.next();
  }

  flush();
  return { type: "string", parts, location };
}

function scanSymbol(scanner: Scanner, location: SourceLocation): Token | null {
  const pair = `${scanner.peek() ?? ""}${scanner.peek(1) ?? ""}`;
  if (pair === "->" || pair === "!=") {
    scanner.next();
    scanner.next();
    return { type: "symbol", value: pair, location };
  }
  const ch = scanner.peek();
  if (ch === "=" || ch === ">" || ch === "<" || ch === "[" || ch === "]") {
    scanner.next();
    return { type: "symbol", value: ch, location };
  }
  return null;
}

export function tokenize(text: string): Token[] {
  const scanner = new Scanner(normalizeSource(text));
  const tokens: Token[] = [];

  while (!scanner.done) {
    const ch = scanner.peek();
    if (ch === " " || ch === "\t" || ch === "\n") {
      scanner.next();
      continue;
    }

    const location = scanner.location();
    if (ch === '"') {
      tokens.push(scanString(scanner, location));
      continue;
    }
    if (ch === "-" && isDigit(scanner.peek(1))) {
      tokens.push(scanNegativeNumber(scanner, location));
      continue;
    }
    if (isWordChar(ch)) {
      tokens.push(scanWordOrNumber(scanner, location));
      continue;
    }

    const symbol = scanSymbol(scanner, location);
    if (!symbol) {
      throw new StorySyntaxError("unexpected_character", `unexpected character '${ch}'`, location);
    }
    tokens.push(symbol);
  }

  tokens.push({ type: "eof", location: scanner.location() });
  return tokens;
}

export function describeToken(token: Token): string {
  switch (token.type) {
    case "eof":
      return "end of input";
    case "string":
      return "a string";
    case "number":
      return `number ${token.value}`;
    case "name":
      return `name '${token.value}'`;
    default:
      return `'${token.value}'`;
  }
}
