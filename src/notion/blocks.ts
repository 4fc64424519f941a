/**
 * Serialization of parsed blocks into Notion block requests.
 */

import type { Block, TextRun } from "../markdown/types";
import { NOTION_APPEND_BATCH_SIZE, NOTION_RICH_TEXT_LIMIT } from "../utils/config";
import { ValidationError } from "../utils/errors";
import languageTable from "./languages.json";
import type { CodeLanguage, NotionAnnotations, NotionBlock, NotionRichText } from "./types";

const supportedLanguages: ReadonlySet<string> = new Set(languageTable.languages);
const languageAliases: ReadonlyMap<string, string> = new Map(
  Object.entries(languageTable.aliases),
);

function isCodeLanguage(value: string): value is CodeLanguage {
  return supportedLanguages.has(value);
}

/**
 * Maps a fence language (e.g. "ts", "Python") to a language Notion accepts,
 * falling back to plain text.
 */
export function resolveCodeLanguage(language: string): CodeLanguage {
  const normalized = language.trim().toLowerCase();
  const candidate = languageAliases.get(normalized) ?? normalized;
  if (isCodeLanguage(candidate)) {
    return candidate;
  }
  return "plain text";
}

export interface NotionBlockOptions {
  /**
   * Maximum characters per rich text object. Longer runs are split at word
   * boundaries; the pieces concatenate back to the original text.
   * @default NOTION_RICH_TEXT_LIMIT
   */
  richTextLimit?: number;
}

/**
 * Converts parsed blocks to Notion block requests, preserving order.
 */
export function toNotionBlocks(
  blocks: readonly Block[],
  options: NotionBlockOptions = {},
): NotionBlock[] {
  const limit = options.richTextLimit ?? NOTION_RICH_TEXT_LIMIT;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Rich text limit must be a positive integer, got ${limit}`);
  }

  const richText = (runs: readonly TextRun[]): NotionRichText[] =>
    runs.flatMap((run) => toRichText(run, limit));

  return blocks.map((block): NotionBlock => {
    switch (block.type) {
      case "heading": {
        const content = { rich_text: richText([{ text: block.text, styles: [] }]) };
        if (block.level === 1) {
          return { object: "block", type: "heading_1", heading_1: content };
        }
        if (block.level === 2) {
          return { object: "block", type: "heading_2", heading_2: content };
        }
        return { object: "block", type: "heading_3", heading_3: content };
      }
      case "bulleted_list_item":
        return {
          object: "block",
          type: "bulleted_list_item",
          bulleted_list_item: { rich_text: richText(block.runs) },
        };
      case "numbered_list_item":
        return {
          object: "block",
          type: "numbered_list_item",
          numbered_list_item: { rich_text: richText(block.runs) },
        };
      case "code":
        return {
          object: "block",
          type: "code",
          code: {
            rich_text: richText([{ text: block.lines.join("\n"), styles: [] }]),
            language: resolveCodeLanguage(block.language),
          },
        };
      case "paragraph":
        return {
          object: "block",
          type: "paragraph",
          paragraph: { rich_text: richText(block.runs) },
        };
    }
  });
}

function toRichText(run: TextRun, limit: number): NotionRichText[] {
  const annotations = toAnnotations(run);

  return splitRichTextContent(run.text, limit).map((content): NotionRichText => ({
    type: "text",
    text: { content },
    ...(annotations ? { annotations } : {}),
  }));
}

/**
 * Splits text into pieces of at most `limit` characters without dropping
 * anything: `pieces.join("") === text`. Each cut falls just after the last
 * whitespace that fits, or at `limit` when a piece has none.
 */
export function splitRichTextContent(text: string, limit: number): string[] {
  const pieces: string[] = [];
  let remaining = text;

  while (remaining.length > limit) {
    const cut = lastBoundaryBefore(remaining, limit);
    pieces.push(remaining.slice(0, cut));
    remaining = remaining.slice(cut);
  }
  pieces.push(remaining);

  return pieces;
}

// Cut index after the last whitespace in text[1..limit-1], or `limit`
function lastBoundaryBefore(text: string, limit: number): number {
  for (let i = limit - 1; i >= 1; i--) {
    if (/\s/.test(text[i])) {
      return i + 1;
    }
  }
  return limit;
}

function toAnnotations(run: TextRun): NotionAnnotations | undefined {
  if (run.styles.length === 0) {
    return undefined;
  }
  const annotations: NotionAnnotations = {};
  for (const style of run.styles) {
    annotations[style] = true;
  }
  return annotations;
}

/**
 * Groups items into consecutive batches of at most `size`, keeping order.
 */
export function batchBlocks<T>(items: readonly T[], size = NOTION_APPEND_BATCH_SIZE): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new ValidationError(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
