import {
  applyEffect,
  describeEvalError,
  evaluateGuard,
  interpolate,
  type Environment,
  type EvalError,
  type Scene,
  type Story,
} from "../../../packages/story-script/src/index.ts";

export type ChoiceView = {
  display_text: string;
  id: string;
};

export type SceneView = {
  display_text: string;
  choices: ChoiceView[];
  game_over: boolean;
};

export const RUNTIME_FAILURE_REASONS = [
  "unknown_scene",
  "evaluation_failed",
  "story_finished",
  "choice_not_found",
  "choice_not_visible",
] as const;
export type RuntimeFailureReason = (typeof RUNTIME_FAILURE_REASONS)[number];

export type RuntimeFailure = {
  ok: false;
  reason: RuntimeFailureReason;
  message: string;
};

export type RenderResult = { ok: true; view: SceneView } | RuntimeFailure;

export type AdvanceResult =
  | { ok: true; scene: string; env: Environment; choiceIndex: number }
  | RuntimeFailure;

function failure(reason: RuntimeFailureReason, message: string): RuntimeFailure {
  return { ok: false, reason, message };
}

function evaluationFailed(scene: string, error: EvalError): RuntimeFailure {
  return failure("evaluation_failed", `scene '${scene}': ${describeEvalError(error)}`);
}

function sceneOf(story: Story, name: string): Scene | RuntimeFailure {
  return story.scenes.get(name) ?? failure("unknown_scene", `scene '${name}' does not exist`);
}

/** Authored indices of the choices whose guard currently holds, in source order. */
function visibleChoiceIndices(scene: Scene, env: Environment): number[] | RuntimeFailure {
  const visible: number[] = [];
  for (const [index, choice] of scene.choices.entries()) {
    if (!choice.guard) {
      visible.push(index);
      continue;
    }
    const result = evaluateGuard(choice.guard, env);
    if (!result.ok) return evaluationFailed(scene.name, result.error);
    if (result.value) visible.push(index);
  }
  return visible;
}

/** Choice IDs are authored ordinals, so they survive guards flipping. */
export function choiceIdFor(index: number): string {
  return String(index);
}

function parseChoiceId(choiceId: string, scene: Scene): number | null {
  if (!/^(0|[1-9][0-9]*)$/.test(choiceId)) return null;
  const index = Number(choiceId);
  return index < scene.choices.length ? index : null;
}

export function renderScene(story: Story, env: Environment, sceneName: string): RenderResult {
  const scene = sceneOf(story, sceneName);
  if ("ok" in scene) return scene;

  const narration = interpolate(scene.narration, env);
  if (!narration.ok) return evaluationFailed(scene.name, narration.error);

  const visible = visibleChoiceIndices(scene, env);
  if (!Array.isArray(visible)) return visible;

  const choices: ChoiceView[] = [];
  for (const index of visible) {
    const text = interpolate(scene.choices[index].text, env);
    if (!text.ok) return evaluationFailed(scene.name, text.error);
    choices.push({ display_text: text.value, id: choiceIdFor(index) });
  }

  return {
    ok: true,
    view: {
      display_text: narration.value,
      choices,
      game_over: choices.length === 0,
    },
  };
}

/**
 * Visibility is recomputed against `env` here; a view rendered earlier may be
 * stale. `env` is never modified: on success the caller gets a fresh
 * environment to install together with the new scene.
 */
export function advanceScene(story: Story, env: Environment, sceneName: string, choiceId: string): AdvanceResult {
  const scene = sceneOf(story, sceneName);
  if ("ok" in scene) return scene;

  const visible = visibleChoiceIndices(scene, env);
  if (!Array.isArray(visible)) return visible;
  if (visible.length === 0) {
    return failure("story_finished", `scene '${scene.name}' is an ending; no choices remain`);
  }

  const index = parseChoiceId(choiceId, scene);
  if (index == null) {
    return failure("choice_not_found", `scene '${scene.name}' has no choice '${choiceId}'`);
  }
  if (!visible.includes(index)) {
    return failure("choice_not_visible", `choice '${choiceId}' is not available in scene '${scene.name}' right now`);
  }

  const choice = scene.choices[index];
  let nextEnv = env;
  if (choice.effect) {
    const applied = applyEffect(choice.effect, env);
    if (!applied.ok) return evaluationFailed(scene.name, applied.error);
    nextEnv = applied.value;
  }

  return { ok: true, scene: choice.target, env: nextEnv, choiceIndex: index };
}
