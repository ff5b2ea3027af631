import { expect } from "chai";

import { parseScript, parseStory, type Story } from "../packages/story-script/src/index.ts";
import {
  handleChoose,
  handleClearExpiredSessions,
  handleCreateSession,
  handleGetCurrent,
} from "../services/story-engine/src/handler.ts";
import { SessionStore } from "../services/story-engine/src/session_store.ts";

function loadOk(text: string): Story {
  const result = parseStory(text);
  if (!result.ok) throw new Error(result.errors.map((error) => error.message).join("; "));
  return result.story;
}

const STORY = loadOk(
  [
    "SET x 0",
    "= START",
    '  "x is {x}."',
    '  "Gain" -> START [IF x < 1] [THEN x = 1]',
    '  "Spend" -> END [IF x > 0]',
    '  "Leave" -> END',
    "= END",
    '  "Goodbye."',
  ].join("\n"),
);

describe("Story API handlers", () => {
  const original = { info: console.info, warn: console.warn, error: console.error };
  let events: Array<{ level: string; event: unknown }> = [];

  function capture(level: string) {
    return (line: unknown) => {
      const parsed: unknown = typeof line === "string" ? JSON.parse(line) : line;
      const event = parsed && typeof parsed === "object" && "event" in parsed ? parsed.event : null;
      events.push({ level, event });
    };
  }

  beforeEach(() => {
    events = [];
    console.info = capture("info");
    console.warn = capture("warn");
    console.error = capture("error");
  });

  afterEach(() => {
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
  });

  function freshSession(): { store: SessionStore; sessionId: string } {
    let next = 0;
    const store = new SessionStore(STORY, {
      now: () => 0,
      generateId: () => {
        next += 1;
        return `s${next}`;
      },
    });
    const created = handleCreateSession(store);
    expect(created).to.deep.equal({ status: 200, body: { session_id: "s1" } });
    return { store, sessionId: "s1" };
  }

  it("creates a session and logs it", () => {
    freshSession();
    expect(events).to.deep.equal([{ level: "info", event: "story_session_created" }]);
  });

  it("returns the current view", () => {
    const { store, sessionId } = freshSession();
    expect(handleGetCurrent(store, sessionId)).to.deep.equal({
      status: 200,
      body: {
        display_text: "x is 0.",
        choices: [
          { display_text: "Gain", id: "0" },
          { display_text: "Leave", id: "2" },
        ],
        game_over: false,
      },
    });
  });

  it("answers 404 for an unknown session", () => {
    const { store } = freshSession();
    const expected = { status: 404, body: { error: "session 'nope' not found", reason: "session_not_found" } };

    expect(handleGetCurrent(store, "nope")).to.deep.equal(expected);
    expect(handleChoose(store, "nope", "0")).to.deep.equal(expected);
  });

  it("applies a visible choice", () => {
    const { store, sessionId } = freshSession();
    expect(handleChoose(store, sessionId, "2")).to.deep.equal({
      status: 200,
      body: { display_text: "Goodbye.", choices: [], game_over: true },
    });
  });

  it("maps rejected choices to 404 and 409", () => {
    const { store, sessionId } = freshSession();

    expect(handleChoose(store, sessionId, "5")).to.deep.equal({
      status: 404,
      body: { error: "scene 'START' has no choice '5'", reason: "choice_not_found" },
    });
    expect(handleChoose(store, sessionId, "1")).to.deep.equal({
      status: 409,
      body: { error: "choice '1' is not available in scene 'START' right now", reason: "choice_not_visible" },
    });

    handleChoose(store, sessionId, "2");
    expect(handleChoose(store, sessionId, "0")).to.deep.equal({
      status: 409,
      body: { error: "scene 'END' is an ending; no choices remain", reason: "story_finished" },
    });
    expect(events.filter((entry) => entry.level === "warn").map((entry) => entry.event)).to.deep.equal([
      "story_choice_rejected",
      "story_choice_rejected",
      "story_choice_rejected",
    ]);
  });

  it("answers 500 when a story cannot be evaluated", () => {
    const broken = parseScript(['= START', '  "Hi {missing}"'].join("\n"));
    const store = new SessionStore(broken, { generateId: () => "s1" });
    store.create();

    expect(handleGetCurrent(store, "s1")).to.deep.equal({
      status: 500,
      body: { error: "scene 'START': variable 'missing' is not defined", reason: "evaluation_failed" },
    });
    expect(events).to.deep.equal([{ level: "error", event: "story_render_failed" }]);
  });

  it("clears expired sessions", () => {
    const { store } = freshSession();
    expect(handleClearExpiredSessions(store, 1000, 500)).to.deep.equal({ status: 200, body: { removed: 0 } });
    expect(handleClearExpiredSessions(store, 1000, 5000)).to.deep.equal({ status: 200, body: { removed: 1 } });
    expect(store.size).to.equal(0);
  });
});
