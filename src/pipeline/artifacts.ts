/**
 * Stage artifacts: one Markdown file per stage per run, named
 * `<stage>_<YYYYMMDD_HHMMSS>.md` with a timestamp shared by the run.
 */

import { writeTextFile } from "../agents/tools/file-tools.js";
import type { StageId } from "../types/pipeline.js";

export const DEFAULT_OUTPUT_DIR = "output-files";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format a date (local time) as YYYYMMDD_HHMMSS.
 */
export function formatRunTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function artifactPathFor(outputDir: string, stageId: StageId, timestamp: string): string {
  return `${outputDir.replace(/\/+$/, "")}/${stageId}_${timestamp}.md`;
}

export interface ArtifactWriter {
  /** Persist a stage output; resolves once the content is on disk. */
  write(artifactPath: string, content: string): Promise<void>;
}

/**
 * Writes artifacts relative to a base directory through the file tool.
 */
export class FileArtifactWriter implements ArtifactWriter {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async write(artifactPath: string, content: string): Promise<void> {
    await writeTextFile(this.baseDir, artifactPath, content.endsWith("\n") ? content : content + "\n");
  }
}
