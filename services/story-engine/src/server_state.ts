import { routePrefix, sessionTimeoutMs, storySourcePath } from "./config.ts";
import { SessionStore } from "./session_store.ts";
import { StoryLoadError, formatDiagnostics, loadStoryFile } from "./story_loader.ts";

export type StoryServer = {
  store: SessionStore;
  sourcePath: string;
  timeoutMs: number;
};

const STORY_SERVER_KEY = "__storyServerV1";
const globalRef = globalThis as typeof globalThis & {
  [STORY_SERVER_KEY]?: StoryServer;
};

/** Loads the configured story once per process; later calls reuse it. */
export function storyServer(): StoryServer {
  const existing = globalRef[STORY_SERVER_KEY];
  if (existing) return existing;

  const sourcePath = storySourcePath();
  const story = loadStoryFile(sourcePath);
  const server: StoryServer = {
    store: new SessionStore(story),
    sourcePath,
    timeoutMs: sessionTimeoutMs(),
  };
  globalRef[STORY_SERVER_KEY] = server;

  console.info(
    JSON.stringify({
      event: "story_loaded",
      source: sourcePath,
      scenes: story.scenes.size,
      variables: story.initialEnvironment.size,
      session_timeout_ms: server.timeoutMs,
      route_prefix: routePrefix(),
    }),
  );
  return server;
}

export function bootStoryServer(): void {
  try {
    storyServer();
  } catch (error) {
    console.error(
      JSON.stringify({
        event: "story_load_failed",
        source: error instanceof StoryLoadError ? error.sourcePath : storySourcePath(),
        error: error instanceof Error ? error.message : String(error),
        diagnostics: error instanceof StoryLoadError ? formatDiagnostics(error.diagnostics) : [],
      }),
    );
    process.exit(1);
  }
}
