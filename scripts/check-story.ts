/**
 * Validate a story script without starting the server.
 * Run: npx tsx scripts/check-story.ts [path/to/file.story]
 * Defaults to STORY_SOURCE_PATH, then stories/example.story.
 */

import fs from "fs";
import path from "path";

import { storySourcePath } from "../services/story-engine/src/config.ts";
import { StoryLoadError, formatDiagnostics, loadStoryText } from "../services/story-engine/src/story_loader.ts";

function main(): void {
  const sourcePath = process.argv[2] ? path.resolve(process.argv[2]) : storySourcePath();
  if (!fs.existsSync(sourcePath)) {
    console.error(`Story file not found: ${sourcePath}`);
    process.exit(1);
  }

  try {
    const story = loadStoryText(sourcePath, fs.readFileSync(sourcePath, "utf8"));
    let choices = 0;
    for (const scene of story.scenes.values()) choices += scene.choices.length;
    console.log(`${sourcePath}: OK`);
    console.log(`  scenes:    ${story.scenes.size}`);
    console.log(`  choices:   ${choices}`);
    console.log(`  variables: ${story.initialEnvironment.size}`);
  } catch (error) {
    if (!(error instanceof StoryLoadError)) throw error;
    console.error(`Failed to load ${sourcePath} due to the following errors:\n`);
    for (const line of formatDiagnostics(error.diagnostics)) {
      console.error(line);
    }
    process.exit(1);
  }
}

main();
