/**
 * MarkdownBlockParser - converts a markdown summary into an ordered list of blocks.
 *
 * Supports the subset produced by the summarizer: ATX headings (levels 1-3),
 * `- ` bullets, `1. ` numbered items, fenced code blocks and paragraphs with
 * inline emphasis. Everything else degrades to a paragraph; parsing never fails.
 */

import { DEFAULT_CODE_LANGUAGE } from "../utils/config";
import { parseInlineSpans } from "./parseInlineSpans";
import type { Block, HeadingLevel } from "./types";

const FENCE = "```";
const NUMBERED_ITEM_PATTERN = /^\d+\.\s/;

// Longest marker first
const HEADING_MARKERS: ReadonlyArray<{ marker: string; level: HeadingLevel }> = [
  { marker: "### ", level: 3 },
  { marker: "## ", level: 2 },
  { marker: "# ", level: 1 },
];

/**
 * Parser state. `code_fence` collects raw lines until the closing fence.
 */
type ParserState =
  | { kind: "scanning" }
  | { kind: "code_fence"; language: string; lines: string[] };

export interface MarkdownBlockParserOptions {
  /**
   * Language recorded on code blocks whose opening fence has no info string.
   * @default DEFAULT_CODE_LANGUAGE
   */
  defaultCodeLanguage?: string;
}

export class MarkdownBlockParser {
  private readonly defaultCodeLanguage: string;

  constructor(options: MarkdownBlockParserOptions = {}) {
    this.defaultCodeLanguage = options.defaultCodeLanguage ?? DEFAULT_CODE_LANGUAGE;
  }

  parse(markdown: string): Block[] {
    const lines = markdown.replace(/\r\n?/g, "\n").split("\n");
    const blocks: Block[] = [];
    let state: ParserState = { kind: "scanning" };

    for (const line of lines) {
      state =
        state.kind === "code_fence"
          ? this.continueCodeFence(state, line, blocks)
          : this.scanLine(line, blocks);
    }

    // An unterminated fence keeps everything up to the end of input
    if (state.kind === "code_fence") {
      blocks.push({ type: "code", lines: state.lines, language: state.language });
    }

    return blocks;
  }

  private continueCodeFence(
    state: Extract<ParserState, { kind: "code_fence" }>,
    line: string,
    blocks: Block[],
  ): ParserState {
    if (line.trim().startsWith(FENCE)) {
      blocks.push({ type: "code", lines: state.lines, language: state.language });
      return { kind: "scanning" };
    }
    state.lines.push(line);
    return state;
  }

  private scanLine(line: string, blocks: Block[]): ParserState {
    const trimmed = line.trim();
    if (!trimmed) {
      return { kind: "scanning" };
    }

    if (trimmed.startsWith(FENCE)) {
      return {
        kind: "code_fence",
        language: this.resolveFenceLanguage(trimmed),
        lines: [],
      };
    }

    const block = this.parseLine(trimmed);
    if (block) {
      blocks.push(block);
    }
    return { kind: "scanning" };
  }

  private parseLine(trimmed: string): Block | null {
    for (const { marker, level } of HEADING_MARKERS) {
      if (trimmed.startsWith(marker)) {
        return { type: "heading", level, text: trimmed.slice(marker.length).trim() };
      }
    }

    if (trimmed.startsWith("- ")) {
      return { type: "bulleted_list_item", runs: parseInlineSpans(trimmed.slice(2).trim()) };
    }

    if (NUMBERED_ITEM_PATTERN.test(trimmed)) {
      return {
        type: "numbered_list_item",
        runs: parseInlineSpans(trimmed.replace(NUMBERED_ITEM_PATTERN, "").trim()),
      };
    }

    const runs = parseInlineSpans(trimmed);
    return runs.length > 0 ? { type: "paragraph", runs } : null;
  }

  /**
   * Takes the first word after the opening fence as the language, if any.
   */
  private resolveFenceLanguage(fenceLine: string): string {
    const info = fenceLine.slice(FENCE.length).replace(/^`+/, "").trim();
    const language = info.split(/\s+/)[0]?.toLowerCase();
    return language || this.defaultCodeLanguage;
  }
}

/**
 * Parses markdown into blocks with a fresh parser.
 */
export function parseMarkdownBlocks(
  markdown: string,
  options?: MarkdownBlockParserOptions,
): Block[] {
  return new MarkdownBlockParser(options).parse(markdown);
}
