export * from "./types.ts";
export { KEYWORDS, StorySyntaxError, tokenize, type Token } from "./lexer.ts";
export { parseScript, parseStory } from "./parser.ts";
export { resolveStory } from "./resolver.ts";
export { applyEffect, evaluateGuard, evaluateOperand, formatValue, interpolate } from "./evaluator.ts";
