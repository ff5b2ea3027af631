declare namespace NodeJS {
  interface ProcessEnv {
    /** Story script served by the API. Defaults to stories/example.story. */
    STORY_SOURCE_PATH?: string;
    /** Idle hours before clear_expired_sessions drops a session. Defaults to 24. */
    STORY_SESSION_TIMEOUT_HOURS?: string;
    /** Path every route is served under, e.g. "/story". Applied at build time. */
    STORY_ROUTE_PREFIX?: string;
  }
}
