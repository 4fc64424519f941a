import type { Client } from "@notionhq/client";
import type { Block } from "../markdown/types";

/** Block request accepted by the "append block children" endpoint */
export type BlockObjectRequest = Parameters<
  Client["blocks"]["children"]["append"]
>[0]["children"][number];

/** Code languages the Notion API accepts */
export type CodeLanguage = Extract<BlockObjectRequest, { code: unknown }>["code"]["language"];

export interface NotionAnnotations {
  bold?: true;
  italic?: true;
  strikethrough?: true;
}

/**
 * A text rich-text object. `annotations` is only present on styled runs.
 */
export interface NotionRichText {
  type: "text";
  text: { content: string };
  annotations?: NotionAnnotations;
}

interface RichTextContent {
  rich_text: NotionRichText[];
}

export type NotionBlock =
  | { object: "block"; type: "heading_1"; heading_1: RichTextContent }
  | { object: "block"; type: "heading_2"; heading_2: RichTextContent }
  | { object: "block"; type: "heading_3"; heading_3: RichTextContent }
  | { object: "block"; type: "paragraph"; paragraph: RichTextContent }
  | { object: "block"; type: "bulleted_list_item"; bulleted_list_item: RichTextContent }
  | { object: "block"; type: "numbered_list_item"; numbered_list_item: RichTextContent }
  | {
      object: "block";
      type: "code";
      code: RichTextContent & { language: CodeLanguage };
    };

export interface CreatePageOptions {
  title: string;
  url: string;
}

export interface WritePageOptions extends CreatePageOptions {
  /** Markdown content appended to the new page, if non-empty */
  content?: string;
}

export interface WrittenPage {
  pageId: string;
  blockCount: number;
}

/**
 * Destination for converted documents. One page per source document.
 */
export interface DocumentStore {
  /** Creates a page and returns its id */
  createPage(options: CreatePageOptions): Promise<string>;
  /** Appends blocks to a page in order; returns the number of blocks written */
  appendBlocks(pageId: string, blocks: readonly Block[]): Promise<number>;
  writePage(options: WritePageOptions): Promise<WrittenPage>;
}
