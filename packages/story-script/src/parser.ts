import { StorySyntaxError, describeToken, tokenize, type Token } from "./lexer.ts";
import { resolveStory } from "./resolver.ts";
import {
  ENTRY_SCENE,
  booleanValue,
  numberValue,
  type Assignment,
  type Choice,
  type Comparison,
  type ComparisonOperator,
  type Operand,
  type ParseResult,
  type Scene,
  type SourceLocation,
  type Story,
  type StoryDiagnosticCode,
  type Template,
  type Value,
} from "./types.ts";

type ClauseCode = Extract<StoryDiagnosticCode, "malformed_guard" | "malformed_effect">;

class StoryParser {
  private index = 0;
  private readonly scenes = new Map<string, Scene>();
  private readonly variables = new Map<string, Value>();

  constructor(private readonly tokens: Token[]) {}

  parse(): Story {
    while (this.peek().type !== "eof") {
      const token = this.peek();
      if (token.type === "keyword" && token.value === "SET") {
        this.parseSet();
      } else if (token.type === "symbol" && token.value === "=") {
        this.parseScene();
      } else {
        this.fail("unexpected_token", `expected SET or a scene header '= Name', found ${describeToken(token)}`, token);
      }
    }

    return deepFreeze({
      entry: ENTRY_SCENE,
      scenes: new FrozenMap(this.scenes),
      initialEnvironment: new FrozenMap(this.variables),
    });
  }

  private peek(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== "eof") this.index += 1;
    return token;
  }

  private isSymbol(value: string): boolean {
    const token = this.peek();
    return token.type === "symbol" && token.value === value;
  }

  private isKeyword(value: string): boolean {
    const token = this.peek();
    return token.type === "keyword" && token.value === value;
  }

  private fail(code: StoryDiagnosticCode, message: string, token: Token): never {
    throw new StorySyntaxError(code, message, token.location);
  }

  private expectName(code: StoryDiagnosticCode, what: string): { name: string; location: SourceLocation } {
    const token = this.advance();
    if (token.type !== "name") {
      this.fail(code, `expected ${what}, found ${describeToken(token)}`, token);
    }
    return { name: token.value, location: token.location };
  }

  /** Scene names may reuse keywords: after `=` or `->` nothing else can appear. */
  private expectSceneName(what: string): { name: string; location: SourceLocation } {
    const token = this.advance();
    if (token.type === "name" || token.type === "keyword") {
      return { name: token.value, location: token.location };
    }
    this.fail("unexpected_token", `expected ${what}, found ${describeToken(token)}`, token);
  }

  private literalFrom(token: Token): Value | null {
    switch (token.type) {
      case "number":
        return numberValue(token.value);
      case "string":
        return { kind: "string", parts: token.parts };
      case "keyword":
        if (token.value === "true") return booleanValue(true);
        if (token.value === "false") return booleanValue(false);
        return null;
      default:
        return null;
    }
  }

  private parseSet(): void {
    this.advance();
    const { name, location } = this.expectName("unexpected_token", "a variable name after SET");
    const token = this.advance();
    const value = this.literalFrom(token);
    if (!value) {
      this.fail("unexpected_token", `expected a string, number or boolean for '${name}', found ${describeToken(token)}`, token);
    }
    if (this.variables.has(name)) {
      throw new StorySyntaxError("duplicate_variable", `variable '${name}' is already set`, location);
    }
    this.variables.set(name, value);
  }

  private parseTemplate(token: Extract<Token, { type: "string" }>): Template {
    return { parts: token.parts, location: token.location };
  }

  private parseScene(): void {
    this.advance();
    const { name, location } = this.expectSceneName("a scene name after '='");
    if (this.scenes.has(name)) {
      throw new StorySyntaxError("duplicate_scene", `scene '${name}' is defined more than once`, location);
    }

    const narrationToken = this.peek();
    if (narrationToken.type !== "string") {
      this.fail("missing_narration", `scene '${name}' needs a narration string, found ${describeToken(narrationToken)}`, narrationToken);
    }
    this.advance();

    const choices: Choice[] = [];
    while (this.peek().type === "string") {
      choices.push(this.parseChoice());
    }

    this.scenes.set(name, {
      name,
      narration: this.parseTemplate(narrationToken),
      choices,
      location,
    });
  }

  private parseChoice(): Choice {
    const textToken = this.advance();
    if (textToken.type !== "string") {
      this.fail("unexpected_token", `expected choice text, found ${describeToken(textToken)}`, textToken);
    }
    const arrow = this.advance();
    if (arrow.type !== "symbol" || arrow.value !== "->") {
      this.fail("unexpected_token", `expected '->' after choice text, found ${describeToken(arrow)}`, arrow);
    }
    const { name: target, location: targetLocation } = this.expectSceneName("a target scene name after '->'");

    let guard: Comparison | null = null;
    let effect: Assignment | null = null;

    while (this.isSymbol("[") || this.isKeyword("IF") || this.isKeyword("THEN")) {
      const bracketed = this.isSymbol("[");
      const opener = this.advance();
      const keyword = bracketed ? this.advance() : opener;

      if (keyword.type === "keyword" && keyword.value === "IF") {
        if (guard) this.fail("duplicate_clause", "a choice can only have one IF clause", keyword);
        guard = this.parseComparison(keyword);
        if (bracketed) this.expectClose("malformed_guard");
      } else if (keyword.type === "keyword" && keyword.value === "THEN") {
        if (effect) this.fail("duplicate_clause", "a choice can only have one THEN clause", keyword);
        effect = this.parseAssignment();
        if (bracketed) this.expectClose("malformed_effect");
      } else {
        this.fail("unexpected_token", `expected IF or THEN after '[', found ${describeToken(keyword)}`, keyword);
      }
    }

    return {
      text: this.parseTemplate(textToken),
      target,
      targetLocation,
      guard,
      effect,
      location: textToken.location,
    };
  }

  private expectClose(code: ClauseCode): void {
    const token = this.advance();
    if (token.type !== "symbol" || token.value !== "]") {
      this.fail(code, `expected ']' to close the clause, found ${describeToken(token)}`, token);
    }
  }

  private parseOperand(code: ClauseCode): Operand {
    const token = this.advance();
    if (token.type === "name") {
      return { kind: "variable", name: token.value, location: token.location };
    }
    const value = this.literalFrom(token);
    if (!value) {
      this.fail(code, `expected a variable or a literal, found ${describeToken(token)}`, token);
    }
    return { kind: "literal", value, location: token.location };
  }

  private parseComparison(keyword: Token): Comparison {
    const left = this.parseOperand("malformed_guard");
    const operatorToken = this.advance();
    if (operatorToken.type !== "symbol" || !isComparisonOperator(operatorToken.value)) {
      this.fail(
        "malformed_guard",
        `expected one of =, !=, >, < in IF clause, found ${describeToken(operatorToken)}`,
        operatorToken,
      );
    }
    const right = this.parseOperand("malformed_guard");
    return { operator: operatorToken.value, left, right, location: keyword.location };
  }

  private parseAssignment(): Assignment {
    const target = this.advance();
    if (target.type !== "name") {
      this.fail("malformed_effect", `THEN must assign to a variable, found ${describeToken(target)}`, target);
    }
    const equals = this.advance();
    if (equals.type !== "symbol" || equals.value !== "=") {
      this.fail("malformed_effect", `expected '=' in THEN clause, found ${describeToken(equals)}`, equals);
    }
    const value = this.parseOperand("malformed_effect");
    return { name: target.value, value, location: target.location };
  }
}

function isComparisonOperator(value: string): value is ComparisonOperator {
  return value === "=" || value === "!=" || value === ">" || value === "<";
}

/** Read-only map: exposes no `set`, `delete` or `clear`, so a loaded story cannot be edited. */
class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  private readonly inner: Map<K, V>;

  constructor(entries: Iterable<readonly [K, V]>) {
    this.inner = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.inner.size;
  }

  get(key: K): V | undefined {
    return this.inner.get(key);
  }

  has(key: K): boolean {
    return this.inner.has(key);
  }

  forEach(callbackfn: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.inner.forEach((value, key) => callbackfn.call(thisArg, value, key, this));
  }

  entries() {
    return this.inner.entries();
  }

  keys() {
    return this.inner.keys();
  }

  values() {
    return this.inner.values();
  }

  [Symbol.iterator]() {
    return this.inner[Symbol.iterator]();
  }
}

function deepFreeze<T>(value: T): T {
  if (value instanceof FrozenMap) {
    for (const entry of value.values()) deepFreeze(entry);
    return value;
  }
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    for (const entry of Object.values(value)) deepFreeze(entry);
  }
  Object.freeze(value);
  return value;
}

/**
 * Syntax-only pass: builds the scene graph without checking references.
 * Throws {@link StorySyntaxError} on the first problem.
 */
export function parseScript(text: string): Story {
  return new StoryParser(tokenize(text)).parse();
}

export function parseStory(text: string): ParseResult {
  let story: Story;
  try {
    story = parseScript(text);
  } catch (error) {
    if (error instanceof StorySyntaxError) {
      return { ok: false, errors: [error.diagnostic] };
    }
    throw error;
  }

  const errors = resolveStory(story);
  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, story };
}
