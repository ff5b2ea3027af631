import { expect } from "chai";

import {
  applyEffect,
  booleanValue,
  describeEvalError,
  evaluateGuard,
  formatValue,
  interpolate,
  numberValue,
  stringValue,
  type Comparison,
  type ComparisonOperator,
  type Environment,
  type Operand,
  type TemplatePart,
  type Value,
} from "../packages/story-script/src/index.ts";

const at = { line: 1, column: 1 };

function variable(name: string): Operand {
  return { kind: "variable", name, location: at };
}

function literal(value: Value): Operand {
  return { kind: "literal", value, location: at };
}

function text(...parts: TemplatePart[]): Value {
  return { kind: "string", parts };
}

function span(name: string): TemplatePart {
  return { kind: "placeholder", name, location: at };
}

function guard(left: Operand, operator: ComparisonOperator, right: Operand): Comparison {
  return { operator, left, right, location: at };
}

const env: Environment = new Map<string, Value>([
  ["gold", numberValue(5)],
  ["name", stringValue("Bob")],
  ["has_key", booleanValue(false)],
]);

describe("Story evaluator", () => {
  it("compares numbers with > and <", () => {
    expect(evaluateGuard(guard(variable("gold"), ">", literal(numberValue(3))), env)).to.deep.equal({
      ok: true,
      value: true,
    });
    expect(evaluateGuard(guard(variable("gold"), "<", literal(numberValue(3))), env)).to.deep.equal({
      ok: true,
      value: false,
    });
    expect(evaluateGuard(guard(variable("gold"), ">", literal(numberValue(5))), env)).to.deep.equal({
      ok: true,
      value: false,
    });
  });

  it("tests equality within one kind", () => {
    expect(evaluateGuard(guard(variable("name"), "=", literal(stringValue("Bob"))), env)).to.deep.equal({
      ok: true,
      value: true,
    });
    expect(evaluateGuard(guard(variable("name"), "!=", literal(stringValue("Bob"))), env)).to.deep.equal({
      ok: true,
      value: false,
    });
    expect(evaluateGuard(guard(variable("has_key"), "=", literal(booleanValue(false))), env)).to.deep.equal({
      ok: true,
      value: true,
    });
  });

  it("reports type mismatches instead of coercing", () => {
    expect(evaluateGuard(guard(variable("name"), ">", literal(numberValue(1))), env)).to.deep.equal({
      ok: false,
      error: { kind: "type_mismatch", operator: ">", left: "string", right: "number" },
    });
    expect(evaluateGuard(guard(variable("gold"), "=", literal(stringValue("5"))), env)).to.deep.equal({
      ok: false,
      error: { kind: "type_mismatch", operator: "=", left: "number", right: "string" },
    });
  });

  it("reports variables missing from the environment", () => {
    expect(evaluateGuard(guard(variable("ghost"), "=", literal(numberValue(1))), env)).to.deep.equal({
      ok: false,
      error: { kind: "undefined_variable", name: "ghost" },
    });
  });

  it("applies an effect to a copy of the environment", () => {
    const result = applyEffect({ name: "gold", value: literal(numberValue(9)), location: at }, env);

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value.get("gold")).to.deep.equal(numberValue(9));
    expect(result.value).to.not.equal(env);
    expect(env.get("gold")).to.deep.equal(numberValue(5));
  });

  it("assigns from another variable", () => {
    const copy = new Map<string, Value>([...env, ["best", numberValue(0)]]);
    const result = applyEffect({ name: "best", value: variable("gold"), location: at }, copy);

    expect(result.ok && result.value.get("best")).to.deep.equal(numberValue(5));
  });

  it("rejects effects on undefined variables and kind changes", () => {
    expect(applyEffect({ name: "luck", value: literal(numberValue(1)), location: at }, env)).to.deep.equal({
      ok: false,
      error: { kind: "undefined_variable", name: "luck" },
    });
    expect(applyEffect({ name: "gold", value: literal(stringValue("lots")), location: at }, env)).to.deep.equal({
      ok: false,
      error: { kind: "type_mismatch", operator: "assign", left: "number", right: "string" },
    });
  });

  it("interpolates values by their display form", () => {
    const template = {
      parts: [
        { kind: "literal", text: "Gold: " },
        { kind: "placeholder", name: "gold", location: at },
        { kind: "literal", text: ", key: " },
        { kind: "placeholder", name: "has_key", location: at },
      ],
      location: at,
    } as const;

    expect(interpolate(template, env)).to.deep.equal({ ok: true, value: "Gold: 5, key: false" });
  });

  it("fails interpolation on a missing variable", () => {
    const template = { parts: [{ kind: "placeholder", name: "ghost", location: at }], location: at } as const;
    expect(interpolate(template, env)).to.deep.equal({
      ok: false,
      error: { kind: "undefined_variable", name: "ghost" },
    });
  });

  it("fills in spans of string variables when they are shown", () => {
    const greeting = text({ kind: "literal", text: "Hi " }, span("name"));
    const withGreeting = new Map<string, Value>([...env, ["greeting", greeting]]);
    const template = { parts: [span("greeting"), { kind: "literal", text: "!" }], location: at } as const;

    expect(interpolate(template, withGreeting)).to.deep.equal({ ok: true, value: "Hi Bob!" });
    const matches = evaluateGuard(guard(variable("greeting"), "=", literal(stringValue("Hi Bob"))), withGreeting);
    expect(matches).to.deep.equal({ ok: true, value: true });
  });

  it("keeps an assigned string's spans until it is read", () => {
    const start = new Map<string, Value>([...env, ["greeting", stringValue("")]]);
    const assigned = applyEffect(
      { name: "greeting", value: literal(text({ kind: "literal", text: "Hi " }, span("name"))), location: at },
      start,
    );
    if (!assigned.ok) throw new Error("expected the assignment to apply");
    const renamed = applyEffect({ name: "name", value: literal(stringValue("Ann")), location: at }, assigned.value);
    if (!renamed.ok) throw new Error("expected the rename to apply");

    const greeting = renamed.value.get("greeting");
    expect(greeting && formatValue(greeting, renamed.value)).to.deep.equal({ ok: true, value: "Hi Ann" });
  });

  it("stops on string variables that refer back to themselves", () => {
    const looped = new Map<string, Value>([
      ["a", text(span("b"))],
      ["b", text(span("a"))],
    ]);
    const template = { parts: [span("a")], location: at } as const;

    expect(interpolate(template, looped)).to.deep.equal({
      ok: false,
      error: { kind: "circular_reference", name: "a" },
    });
  });

  it("describes evaluation errors", () => {
    expect(describeEvalError({ kind: "circular_reference", name: "a" })).to.equal("variable 'a' refers back to itself");
    expect(describeEvalError({ kind: "undefined_variable", name: "x" })).to.equal("variable 'x' is not defined");
    expect(describeEvalError({ kind: "type_mismatch", operator: "assign", left: "number", right: "string" })).to.equal(
      "cannot assign a string to a number variable",
    );
    expect(describeEvalError({ kind: "type_mismatch", operator: "<", left: "boolean", right: "number" })).to.equal(
      "operator '<' cannot compare boolean with number",
    );
  });
});
