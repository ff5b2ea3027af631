export const ENTRY_SCENE = "START";

export const VALUE_KINDS = ["number", "string", "boolean"] as const;
export type ValueKind = (typeof VALUE_KINDS)[number];

/** String values keep their `{var}` spans and are filled in whenever they are read. */
export type Value =
  | { kind: "number"; value: number }
  | { kind: "string"; parts: readonly TemplatePart[] }
  | { kind: "boolean"; value: boolean };

export type Environment = ReadonlyMap<string, Value>;

export type SourceLocation = {
  line: number;
  column: number;
};

export type TemplatePart =
  | { kind: "literal"; text: string }
  | { kind: "placeholder"; name: string; location: SourceLocation };

export type Template = {
  parts: readonly TemplatePart[];
  location: SourceLocation;
};

export const COMPARISON_OPERATORS = ["=", "!=", ">", "<"] as const;
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

export type Operand =
  | { kind: "variable"; name: string; location: SourceLocation }
  | { kind: "literal"; value: Value; location: SourceLocation };

export type Comparison = {
  operator: ComparisonOperator;
  left: Operand;
  right: Operand;
  location: SourceLocation;
};

export type Assignment = {
  name: string;
  value: Operand;
  location: SourceLocation;
};

export type Choice = {
  text: Template;
  target: string;
  targetLocation: SourceLocation;
  guard: Comparison | null;
  effect: Assignment | null;
  location: SourceLocation;
};

export type Scene = {
  name: string;
  narration: Template;
  choices: readonly Choice[];
  location: SourceLocation;
};

export type Story = {
  entry: string;
  scenes: ReadonlyMap<string, Scene>;
  initialEnvironment: Environment;
};

export type StoryDiagnostic = {
  code: StoryDiagnosticCode;
  message: string;
  location: SourceLocation;
};

export type StoryDiagnosticCode =
  | "unexpected_character"
  | "unterminated_string"
  | "invalid_escape"
  | "malformed_placeholder"
  | "integer_out_of_range"
  | "unexpected_token"
  | "missing_narration"
  | "duplicate_scene"
  | "duplicate_variable"
  | "malformed_guard"
  | "malformed_effect"
  | "duplicate_clause"
  | "missing_entry_scene"
  | "unknown_target"
  | "undeclared_variable"
  | "circular_reference"
  | "kind_mismatch";

export type ParseResult =
  | { ok: true; story: Story }
  | { ok: false; errors: StoryDiagnostic[] };

export type EvalError =
  | { kind: "undefined_variable"; name: string }
  | { kind: "circular_reference"; name: string }
  | {
      kind: "type_mismatch";
      operator: ComparisonOperator | "assign";
      left: ValueKind;
      right: ValueKind;
    };

export type EvalResult<T> = { ok: true; value: T } | { ok: false; error: EvalError };

export function numberValue(value: number): Value {
  return { kind: "number", value };
}

export function stringValue(text: string): Value {
  return { kind: "string", parts: text ? [{ kind: "literal", text }] : [] };
}

export function booleanValue(value: boolean): Value {
  return { kind: "boolean", value };
}

export function formatLocation(location: SourceLocation): string {
  return `line ${location.line}, column ${location.column}`;
}

export function describeEvalError(error: EvalError): string {
  if (error.kind === "undefined_variable") {
    return `variable '${error.name}' is not defined`;
  }
  if (error.kind === "circular_reference") {
    return `variable '${error.name}' refers back to itself`;
  }
  if (error.operator === "assign") {
    return `cannot assign a ${error.right} to a ${error.left} variable`;
  }
  return `operator '${error.operator}' cannot compare ${error.left} with ${error.right}`;
}
