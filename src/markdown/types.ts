/**
 * Inline style flags supported on a text run.
 */
export type TextStyle = "bold" | "italic" | "strikethrough";

/**
 * A contiguous span of text with zero or more styles applied.
 */
export interface TextRun {
  readonly text: string;
  readonly styles: readonly TextStyle[];
}

export type HeadingLevel = 1 | 2 | 3;

export interface HeadingBlock {
  readonly type: "heading";
  readonly level: HeadingLevel;
  /** Plain heading text; inline markers are kept as typed */
  readonly text: string;
}

export interface BulletedListItemBlock {
  readonly type: "bulleted_list_item";
  readonly runs: readonly TextRun[];
}

export interface NumberedListItemBlock {
  readonly type: "numbered_list_item";
  readonly runs: readonly TextRun[];
}

export interface CodeBlock {
  readonly type: "code";
  /** Lines between the fences, untrimmed */
  readonly lines: readonly string[];
  readonly language: string;
}

export interface ParagraphBlock {
  readonly type: "paragraph";
  readonly runs: readonly TextRun[];
}

/**
 * One structural unit of converted content. A document is an ordered list of blocks.
 */
export type Block =
  | HeadingBlock
  | BulletedListItemBlock
  | NumberedListItemBlock
  | CodeBlock
  | ParagraphBlock;
