export async function register() {
  if (process.env.NEXT_RUNTIME !== "nodejs") return;

  const { bootStoryServer } = await import("@/services/story-engine/src/server_state");
  bootStoryServer();
}
