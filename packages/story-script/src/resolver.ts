import { formatValue } from "./evaluator.ts";
import type {
  Assignment,
  Comparison,
  Operand,
  SourceLocation,
  Story,
  StoryDiagnostic,
  StoryDiagnosticCode,
  TemplatePart,
  ValueKind,
} from "./types.ts";

type Resolution = {
  story: Story;
  errors: StoryDiagnostic[];
};

function report(ctx: Resolution, code: StoryDiagnosticCode, message: string, location: SourceLocation): void {
  ctx.errors.push({ code, message, location });
}

function declaredKind(ctx: Resolution, name: string): ValueKind | null {
  return ctx.story.initialEnvironment.get(name)?.kind ?? null;
}

function checkParts(ctx: Resolution, owner: string, parts: readonly TemplatePart[]): void {
  for (const part of parts) {
    if (part.kind !== "placeholder") continue;
    if (!ctx.story.initialEnvironment.has(part.name)) {
      report(
        ctx,
        "undeclared_variable",
        `${owner} shows {${part.name}} but no SET declares '${part.name}'`,
        part.location,
      );
    }
  }
}

function checkVariables(ctx: Resolution): void {
  const env = ctx.story.initialEnvironment;
  for (const [name, value] of env.entries()) {
    if (value.kind !== "string") continue;
    checkParts(ctx, `variable '${name}'`, value.parts);

    const shown = formatValue(value, env);
    if (shown.ok || shown.error.kind !== "circular_reference" || shown.error.name !== name) continue;
    const first = value.parts.find((part) => part.kind === "placeholder");
    report(
      ctx,
      "circular_reference",
      `variable '${name}' refers back to itself through its {var} spans`,
      first && first.kind === "placeholder" ? first.location : { line: 1, column: 1 },
    );
  }
}

function operandKind(ctx: Resolution, sceneName: string, operand: Operand): ValueKind | null {
  if (operand.kind === "literal") {
    if (operand.value.kind === "string") checkParts(ctx, `scene '${sceneName}'`, operand.value.parts);
    return operand.value.kind;
  }
  const kind = declaredKind(ctx, operand.name);
  if (!kind) {
    report(
      ctx,
      "undeclared_variable",
      `scene '${sceneName}' uses variable '${operand.name}' which no SET declares`,
      operand.location,
    );
  }
  return kind;
}

function checkGuard(ctx: Resolution, sceneName: string, guard: Comparison): void {
  const left = operandKind(ctx, sceneName, guard.left);
  const right = operandKind(ctx, sceneName, guard.right);
  if (!left || !right) return;

  if (guard.operator === ">" || guard.operator === "<") {
    if (left !== "number" || right !== "number") {
      report(
        ctx,
        "kind_mismatch",
        `'${guard.operator}' needs two numbers but got ${left} and ${right} in scene '${sceneName}'`,
        guard.location,
      );
    }
    return;
  }

  if (left !== right) {
    report(
      ctx,
      "kind_mismatch",
      `'${guard.operator}' compares a ${left} with a ${right} in scene '${sceneName}'`,
      guard.location,
    );
  }
}

function checkEffect(ctx: Resolution, sceneName: string, effect: Assignment): void {
  const target = declaredKind(ctx, effect.name);
  if (!target) {
    report(
      ctx,
      "undeclared_variable",
      `scene '${sceneName}' assigns to '${effect.name}' which no SET declares`,
      effect.location,
    );
  }
  const value = operandKind(ctx, sceneName, effect.value);
  if (target && value && target !== value) {
    report(
      ctx,
      "kind_mismatch",
      `'${effect.name}' holds a ${target} and cannot be assigned a ${value} in scene '${sceneName}'`,
      effect.location,
    );
  }
}

/**
 * Second load phase. Collects every dangling scene reference, undeclared
 * variable, circular string and kind conflict instead of stopping at the
 * first one.
 */
export function resolveStory(story: Story): StoryDiagnostic[] {
  const ctx: Resolution = { story, errors: [] };

  if (!story.scenes.has(story.entry)) {
    report(ctx, "missing_entry_scene", `story needs a '${story.entry}' scene to begin`, { line: 1, column: 1 });
  }

  checkVariables(ctx);

  for (const scene of story.scenes.values()) {
    checkParts(ctx, `scene '${scene.name}'`, scene.narration.parts);

    for (const choice of scene.choices) {
      checkParts(ctx, `scene '${scene.name}'`, choice.text.parts);

      if (!story.scenes.has(choice.target)) {
        report(
          ctx,
          "unknown_target",
          `scene '${scene.name}' has a choice leading to '${choice.target}', which does not exist`,
          choice.targetLocation,
        );
      }
      if (choice.guard) checkGuard(ctx, scene.name, choice.guard);
      if (choice.effect) checkEffect(ctx, scene.name, choice.effect);
    }
  }

  return ctx.errors;
}
