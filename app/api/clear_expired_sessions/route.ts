import { NextResponse } from "next/server";
import { handleClearExpiredSessions } from "@/services/story-engine/src/handler";
import { storyServer } from "@/services/story-engine/src/server_state";

export async function POST() {
  try {
    const { store, timeoutMs } = storyServer();
    const result = handleClearExpiredSessions(store, timeoutMs);
    return NextResponse.json(result.body, { status: result.status });
  } catch (error) {
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "story unavailable", reason: "internal_error" },
      { status: 500 },
    );
  }
}
