/**
 * File read/write tools, confined to one base directory.
 *
 * The same write routine backs both the model-facing `file_write` tool and
 * the pipeline's artifact writer.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, relative, resolve } from "node:path";
import { tool } from "ai";
import { z } from "zod";

export class FileToolError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = "FileToolError";
  }
}

/**
 * Resolve `filePath` against `baseDir`, rejecting anything outside it.
 */
export function resolveWithin(baseDir: string, filePath: string): string {
  const root = resolve(baseDir);
  const target = resolve(root, filePath);
  const rel = relative(root, target);

  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) {
    throw new FileToolError(filePath, `Path escapes the working directory: ${filePath}`);
  }
  return target;
}

/**
 * Write UTF-8 text, creating parent directories. Returns the absolute path.
 */
export async function writeTextFile(
  baseDir: string,
  filePath: string,
  content: string
): Promise<string> {
  const target = resolveWithin(baseDir, filePath);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content, "utf-8");
  return target;
}

export async function readTextFile(baseDir: string, filePath: string): Promise<string> {
  const target = resolveWithin(baseDir, filePath);
  try {
    return await readFile(target, "utf-8");
  } catch (err) {
    throw new FileToolError(
      filePath,
      `Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

export function createFileReadTool(baseDir: string) {
  return tool({
    description:
      "Read a UTF-8 text file, such as an earlier stage's output in output-files/. " +
      "Paths are relative to the working directory.",
    inputSchema: z.object({
      path: z.string().min(1).describe("Relative path of the file to read"),
    }),
    execute: async ({ path }) => ({ path, content: await readTextFile(baseDir, path) }),
  });
}

export function createFileWriteTool(baseDir: string) {
  return tool({
    description:
      "Write UTF-8 text to a file, replacing any existing content. " +
      "Paths are relative to the working directory.",
    inputSchema: z.object({
      path: z.string().min(1).describe("Relative path of the file to write"),
      content: z.string().describe("Full file content"),
    }),
    execute: async ({ path, content }) => {
      await writeTextFile(baseDir, path, content);
      return { path, bytes: Buffer.byteLength(content, "utf-8") };
    },
  });
}
