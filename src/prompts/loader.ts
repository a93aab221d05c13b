/**
 * Reads stage templates from disk and parses each file once.
 *
 *   const templates = new PromptTemplateLoader();   // the bundled prompts/
 *   const keywordAnalysis = templates.load("keyword-analysis.md");
 */

import { existsSync, readdirSync, readFileSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { parseTemplate, type ParsedTemplate } from "./template.js";

export class TemplateLoadError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(message);
    this.name = "TemplateLoadError";
  }
}

const EXTENSIONS: readonly string[] = [".md", ".txt"];

/** prompts/ at the package root; the same relative hop works from src/ and dist/. */
export const DEFAULT_PROMPTS_DIR = fileURLToPath(new URL("../../prompts/", import.meta.url));

function isTemplateFile(fileName: string): boolean {
  return EXTENSIONS.includes(extname(fileName).toLowerCase());
}

export class PromptTemplateLoader {
  readonly directory: string;
  private readonly parsed = new Map<string, ParsedTemplate>();

  constructor(directory: string = DEFAULT_PROMPTS_DIR) {
    this.directory = resolve(directory);
    if (!existsSync(this.directory)) {
      throw new TemplateLoadError(
        this.directory,
        `Template directory does not exist: ${this.directory}`
      );
    }
  }

  /**
   * @throws TemplateLoadError for a missing file or an extension other than .md/.txt
   * @throws TemplateParseError / ConditionalParseError for an invalid template
   */
  load(fileName: string): ParsedTemplate {
    const cached = this.parsed.get(fileName);
    if (cached) return cached;

    const filePath = join(this.directory, fileName);
    if (!isTemplateFile(fileName)) {
      throw new TemplateLoadError(
        filePath,
        `Unsupported template extension "${extname(fileName)}" (expected ${EXTENSIONS.join(" or ")})`
      );
    }
    if (!existsSync(filePath)) {
      throw new TemplateLoadError(filePath, `Template file not found: ${filePath}`);
    }

    const template = parseTemplate(
      readFileSync(filePath, "utf-8"),
      basename(fileName, extname(fileName))
    );
    this.parsed.set(fileName, template);
    return template;
  }

  /** Template file names in the directory (not recursive), sorted. */
  list(): string[] {
    return readdirSync(this.directory, { withFileTypes: true })
      .filter((entry) => entry.isFile() && isTemplateFile(entry.name))
      .map((entry) => entry.name)
      .sort();
  }

  loadAll(): Map<string, ParsedTemplate> {
    return new Map(this.list().map((fileName): [string, ParsedTemplate] => [fileName, this.load(fileName)]));
  }
}
