import path from "path";

const DEFAULT_STORY_SOURCE = "stories/example.story";
const DEFAULT_SESSION_TIMEOUT_HOURS = 24;

function positiveNumberEnv(name: string, fallback: number): number {
  const parsed = Number(process.env[name] ?? String(fallback));
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function storySourcePath(): string {
  const configured = process.env.STORY_SOURCE_PATH?.trim();
  return path.resolve(configured && configured.length > 0 ? configured : DEFAULT_STORY_SOURCE);
}

/** `STORY_ROUTE_PREFIX` as a Next.js basePath: "" or "/segment[/segment...]". */
export function routePrefix(raw = process.env.STORY_ROUTE_PREFIX): string {
  const trimmed = (raw ?? "").trim().replace(/^\/+|\/+$/g, "");
  return trimmed ? `/${trimmed}` : "";
}

export function sessionTimeoutHours(): number {
  return positiveNumberEnv("STORY_SESSION_TIMEOUT_HOURS", DEFAULT_SESSION_TIMEOUT_HOURS);
}

export function sessionTimeoutMs(): number {
  return Math.round(sessionTimeoutHours() * 60 * 60 * 1000);
}
