import type {
  Assignment,
  Comparison,
  Environment,
  EvalResult,
  Operand,
  Template,
  TemplatePart,
  Value,
} from "./types.ts";

function lookup(env: Environment, name: string): EvalResult<Value> {
  const value = env.get(name);
  if (!value) return { ok: false, error: { kind: "undefined_variable", name } };
  return { ok: true, value };
}

export function evaluateOperand(operand: Operand, env: Environment): EvalResult<Value> {
  if (operand.kind === "literal") return { ok: true, value: operand.value };
  return lookup(env, operand.name);
}

/**
 * `expanding` holds the variables whose text is being filled in further up
 * the stack; meeting one of them again is a cycle.
 */
function fillParts(
  parts: readonly TemplatePart[],
  env: Environment,
  expanding: readonly string[],
): EvalResult<string> {
  let text = "";
  for (const part of parts) {
    if (part.kind === "literal") {
      text += part.text;
      continue;
    }
    if (expanding.includes(part.name)) {
      return { ok: false, error: { kind: "circular_reference", name: part.name } };
    }
    const value = lookup(env, part.name);
    if (!value.ok) return value;
    const shown = displayValue(value.value, env, [...expanding, part.name]);
    if (!shown.ok) return shown;
    text += shown.value;
  }
  return { ok: true, value: text };
}

function displayValue(value: Value, env: Environment, expanding: readonly string[]): EvalResult<string> {
  switch (value.kind) {
    case "number":
      return { ok: true, value: String(value.value) };
    case "boolean":
      return { ok: true, value: value.value ? "true" : "false" };
    default:
      return fillParts(value.parts, env, expanding);
  }
}

/** Text of a value as a reader sees it; string values have their `{var}` spans filled in. */
export function formatValue(value: Value, env: Environment): EvalResult<string> {
  return displayValue(value, env, []);
}

/** Read-only: never touches `env`, safe to call any number of times. */
export function evaluateGuard(guard: Comparison, env: Environment): EvalResult<boolean> {
  const left = evaluateOperand(guard.left, env);
  if (!left.ok) return left;
  const right = evaluateOperand(guard.right, env);
  if (!right.ok) return right;

  const l = left.value;
  const r = right.value;

  if (guard.operator === ">" || guard.operator === "<") {
    if (l.kind !== "number" || r.kind !== "number") {
      return { ok: false, error: { kind: "type_mismatch", operator: guard.operator, left: l.kind, right: r.kind } };
    }
    return { ok: true, value: guard.operator === ">" ? l.value > r.value : l.value < r.value };
  }

  if (l.kind !== r.kind) {
    return { ok: false, error: { kind: "type_mismatch", operator: guard.operator, left: l.kind, right: r.kind } };
  }
  // Strings compare by their filled-in text.
  const lText = formatValue(l, env);
  if (!lText.ok) return lText;
  const rText = formatValue(r, env);
  if (!rText.ok) return rText;
  const equal = lText.value === rText.value;
  return { ok: true, value: guard.operator === "=" ? equal : !equal };
}

/**
 * Returns a copy of `env` with the assignment applied. The variable must
 * already exist and keep its kind. A string keeps its spans and is filled in
 * when read, not when assigned.
 */
export function applyEffect(effect: Assignment, env: Environment): EvalResult<Environment> {
  const current = lookup(env, effect.name);
  if (!current.ok) return current;
  const next = evaluateOperand(effect.value, env);
  if (!next.ok) return next;

  if (current.value.kind !== next.value.kind) {
    return {
      ok: false,
      error: { kind: "type_mismatch", operator: "assign", left: current.value.kind, right: next.value.kind },
    };
  }

  const updated = new Map(env);
  updated.set(effect.name, next.value);
  return { ok: true, value: updated };
}

export function interpolate(template: Template, env: Environment): EvalResult<string> {
  return fillParts(template.parts, env, []);
}
