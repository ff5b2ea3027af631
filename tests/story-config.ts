import path from "path";

import { expect } from "chai";

import {
  routePrefix,
  sessionTimeoutMs,
  storySourcePath,
} from "../services/story-engine/src/config.ts";

const ORIGINAL_ENV = { ...process.env };

function restoreEnv(): void {
  for (const key of Object.keys(process.env)) {
    if (!(key in ORIGINAL_ENV)) {
      delete process.env[key];
    }
  }
  for (const [key, value] of Object.entries(ORIGINAL_ENV)) {
    process.env[key] = value;
  }
}

describe("Story server config", () => {
  afterEach(() => {
    restoreEnv();
  });

  it("normalizes the route prefix into a base path", () => {
    expect(routePrefix("")).to.equal("");
    expect(routePrefix("  /  ")).to.equal("");
    expect(routePrefix("story")).to.equal("/story");
    expect(routePrefix("/story/")).to.equal("/story");
    expect(routePrefix(" //games/lantern// ")).to.equal("/games/lantern");
  });

  it("reads the route prefix from the environment", () => {
    delete process.env.STORY_ROUTE_PREFIX;
    expect(routePrefix()).to.equal("");

    process.env.STORY_ROUTE_PREFIX = "tales";
    expect(routePrefix()).to.equal("/tales");
  });

  it("falls back to 24 hours for a missing or invalid session timeout", () => {
    delete process.env.STORY_SESSION_TIMEOUT_HOURS;
    expect(sessionTimeoutMs()).to.equal(86_400_000);

    process.env.STORY_SESSION_TIMEOUT_HOURS = "-3";
    expect(sessionTimeoutMs()).to.equal(86_400_000);

    process.env.STORY_SESSION_TIMEOUT_HOURS = "0.5";
    expect(sessionTimeoutMs()).to.equal(1_800_000);
  });

  it("resolves the story source against the working directory", () => {
    delete process.env.STORY_SOURCE_PATH;
    expect(storySourcePath()).to.equal(path.resolve("stories/example.story"));

    process.env.STORY_SOURCE_PATH = " custom/tale.story ";
    expect(storySourcePath()).to.equal(path.resolve("custom/tale.story"));
  });
});
