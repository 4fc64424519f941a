import type { TextRun, TextStyle } from "./types";

// Alternatives are ordered: bold before italic, so "**_x_**" is bold "_x_".
const INLINE_PATTERN = /\*\*(.+?)\*\*|__(.+?)__|~~(.+?)~~|_(.+?)_|\*(.+?)\*/g;

// Style per capture group, indexed like the alternatives above
const GROUP_STYLES: readonly TextStyle[] = [
  "bold",
  "bold",
  "strikethrough",
  "italic",
  "italic",
];

/**
 * Splits one line of text into plain and styled runs.
 * Recognizes `**bold**`, `__bold__`, `~~strike~~`, `_italic_` and `*italic*`.
 * Delimiters do not nest and cannot be escaped.
 *
 * The returned runs cover the whole input in order. A line without any
 * markers, including an empty one, comes back as a single plain run.
 */
export function parseInlineSpans(text: string): TextRun[] {
  const runs: TextRun[] = [];
  let lastIndex = 0;

  for (const match of text.matchAll(INLINE_PATTERN)) {
    const start = match.index ?? 0;
    if (start > lastIndex) {
      runs.push({ text: text.slice(lastIndex, start), styles: [] });
    }

    const groupIndex = match.slice(1).findIndex((group) => group !== undefined);
    const style = GROUP_STYLES[groupIndex];
    const inner = match[groupIndex + 1];
    if (style && inner !== undefined) {
      runs.push({ text: inner, styles: [style] });
    }

    lastIndex = start + match[0].length;
  }

  if (lastIndex < text.length) {
    runs.push({ text: text.slice(lastIndex), styles: [] });
  }

  return runs.length > 0 ? runs : [{ text, styles: [] }];
}
