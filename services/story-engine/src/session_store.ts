import { randomUUID } from "crypto";

import type { Environment, Story, Value } from "../../../packages/story-script/src/index.ts";
import { advanceScene, renderScene, type RuntimeFailure, type SceneView } from "./runtime.ts";

type StorySession = {
  sessionId: string;
  env: Environment;
  sceneName: string;
  revision: number;
  startedAt: number;
  lastActiveAt: number;
};

export type SessionSnapshot = {
  sessionId: string;
  sceneName: string;
  revision: number;
  variables: Record<string, Value>;
  startedAt: number;
  lastActiveAt: number;
};

export type SessionNotFound = {
  ok: false;
  reason: "session_not_found";
  message: string;
};

export type SessionViewResult = { ok: true; view: SceneView } | SessionNotFound | RuntimeFailure;

export type SessionStoreOptions = {
  now?: () => number;
  generateId?: () => string;
};

function notFound(sessionId: string): SessionNotFound {
  return { ok: false, reason: "session_not_found", message: `session '${sessionId}' not found` };
}

/**
 * Every session over one shared, immutable story.
 *
 * All methods run to completion without yielding, so on the Node.js event
 * loop a `choose` reads, evaluates and writes its session as one step: two
 * requests for the same session are applied one after the other and the
 * second always sees the first one's result.
 */
export class SessionStore {
  private readonly sessions = new Map<string, StorySession>();
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(
    readonly story: Story,
    options: SessionStoreOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(): string {
    let sessionId = this.generateId();
    while (this.sessions.has(sessionId)) {
      sessionId = this.generateId();
    }

    const now = this.now();
    this.sessions.set(sessionId, {
      sessionId,
      env: new Map(this.story.initialEnvironment),
      sceneName: this.story.entry,
      revision: 0,
      startedAt: now,
      lastActiveAt: now,
    });
    return sessionId;
  }

  getCurrent(sessionId: string): SessionViewResult {
    const session = this.sessions.get(sessionId);
    if (!session) return notFound(sessionId);
    session.lastActiveAt = this.now();
    return renderScene(this.story, session.env, session.sceneName);
  }

  choose(sessionId: string, choiceId: string): SessionViewResult {
    const session = this.sessions.get(sessionId);
    if (!session) return notFound(sessionId);
    session.lastActiveAt = this.now();

    const advanced = advanceScene(this.story, session.env, session.sceneName, choiceId);
    if (!advanced.ok) return advanced;

    // Render before committing so a failing view leaves the session where it was.
    const rendered = renderScene(this.story, advanced.env, advanced.scene);
    if (!rendered.ok) return rendered;

    session.env = advanced.env;
    session.sceneName = advanced.scene;
    session.revision += 1;
    return rendered;
  }

  /** Drops sessions idle for longer than `timeoutMs`; returns their IDs. */
  sweep(timeoutMs: number, now = this.now()): string[] {
    const cutoff = now - timeoutMs;
    const removed: string[] = [];
    for (const [sessionId, session] of this.sessions.entries()) {
      if (session.lastActiveAt < cutoff) {
        this.sessions.delete(sessionId);
        removed.push(sessionId);
      }
    }
    return removed;
  }

  inspect(sessionId: string): SessionSnapshot | null {
    const session = this.sessions.get(sessionId);
    if (!session) return null;
    return {
      sessionId: session.sessionId,
      sceneName: session.sceneName,
      revision: session.revision,
      variables: Object.fromEntries(session.env),
      startedAt: session.startedAt,
      lastActiveAt: session.lastActiveAt,
    };
  }
}
