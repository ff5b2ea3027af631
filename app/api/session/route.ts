import { NextResponse } from "next/server";
import { handleCreateSession } from "@/services/story-engine/src/handler";
import { storyServer } from "@/services/story-engine/src/server_state";

export async function POST() {
  try {
    const result = handleCreateSession(storyServer().store);
    return NextResponse.json(result.body, { status: result.status });
  } catch (error) {
    return NextResponse.json(
      { error: error instanceof Error ? error.message : "story unavailable", reason: "internal_error" },
      { status: 500 },
    );
  }
}
