import fs from "fs";

import {
  formatLocation,
  parseStory,
  type Story,
  type StoryDiagnostic,
} from "../../../packages/story-script/src/index.ts";

export class StoryLoadError extends Error {
  readonly diagnostics: StoryDiagnostic[];

  constructor(
    readonly sourcePath: string,
    diagnostics: StoryDiagnostic[],
  ) {
    super(`story ${sourcePath} failed validation with ${diagnostics.length} error(s)`);
    this.name = "StoryLoadError";
    this.diagnostics = diagnostics;
  }
}

export function formatDiagnostics(diagnostics: StoryDiagnostic[]): string[] {
  return diagnostics.map(
    (diagnostic, idx) => `${idx + 1}. ${formatLocation(diagnostic.location)}: ${diagnostic.message}`,
  );
}

export function loadStoryText(sourcePath: string, text: string): Story {
  const result = parseStory(text);
  if (!result.ok) throw new StoryLoadError(sourcePath, result.errors);
  return result.story;
}

export function loadStoryFile(sourcePath: string): Story {
  return loadStoryText(sourcePath, fs.readFileSync(sourcePath, "utf8"));
}
