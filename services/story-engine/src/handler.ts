import type { RuntimeFailureReason } from "./runtime.ts";
import type { SessionNotFound, SessionStore, SessionViewResult } from "./session_store.ts";

type FailureReason = RuntimeFailureReason | SessionNotFound["reason"];

export type StoryApiResult = {
  status: number;
  body: Record<string, unknown>;
};

export const FAILURE_STATUS: Record<FailureReason, number> = {
  session_not_found: 404,
  choice_not_found: 404,
  choice_not_visible: 409,
  story_finished: 409,
  unknown_scene: 500,
  evaluation_failed: 500,
};

function fail(status: number, reason: string, error: string): StoryApiResult {
  return { status, body: { error, reason } };
}

function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}

function internalError(event: string, error: unknown, fallback: string): StoryApiResult {
  console.error(JSON.stringify({ event, error: errorMessage(error, fallback) }));
  return fail(500, "internal_error", errorMessage(error, fallback));
}

function viewResponse(result: SessionViewResult): StoryApiResult {
  if (result.ok) return { status: 200, body: result.view };
  return fail(FAILURE_STATUS[result.reason], result.reason, result.message);
}

export function handleCreateSession(store: SessionStore): StoryApiResult {
  try {
    const sessionId = store.create();
    console.info(JSON.stringify({ event: "story_session_created", session_id: sessionId, live_sessions: store.size }));
    return { status: 200, body: { session_id: sessionId } };
  } catch (error) {
    return internalError("story_session_create_failed", error, "failed to create session");
  }
}

export function handleGetCurrent(store: SessionStore, sessionId: string): StoryApiResult {
  try {
    const result = store.getCurrent(sessionId);
    if (!result.ok && FAILURE_STATUS[result.reason] >= 500) {
      console.error(
        JSON.stringify({ event: "story_render_failed", session_id: sessionId, reason: result.reason, error: result.message }),
      );
    }
    return viewResponse(result);
  } catch (error) {
    return internalError("story_render_failed", error, "failed to render session");
  }
}

export function handleChoose(store: SessionStore, sessionId: string, choiceId: string): StoryApiResult {
  try {
    const result = store.choose(sessionId, choiceId);
    if (!result.ok) {
      const status = FAILURE_STATUS[result.reason];
      const log = status >= 500 ? console.error : console.warn;
      log(
        JSON.stringify({
          event: status >= 500 ? "story_choice_failed" : "story_choice_rejected",
          session_id: sessionId,
          choice_id: choiceId,
          reason: result.reason,
          error: result.message,
        }),
      );
    }
    return viewResponse(result);
  } catch (error) {
    return internalError("story_choice_failed", error, "failed to apply choice");
  }
}

export function handleClearExpiredSessions(store: SessionStore, timeoutMs: number, now?: number): StoryApiResult {
  try {
    const removed = store.sweep(timeoutMs, now);
    console.info(
      JSON.stringify({
        event: "story_sessions_swept",
        removed: removed.length,
        live_sessions: store.size,
        timeout_ms: timeoutMs,
      }),
    );
    return { status: 200, body: { removed: removed.length } };
  } catch (error) {
    return internalError("story_sweep_failed", error, "failed to clear expired sessions");
  }
}
