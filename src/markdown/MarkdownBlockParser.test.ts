import { describe, expect, it } from "vitest";
import { MarkdownBlockParser, parseMarkdownBlocks } from "./MarkdownBlockParser";

describe("MarkdownBlockParser", () => {
  describe("headings", () => {
    it("should parse heading levels by the number of hashes", () => {
      expect(parseMarkdownBlocks("# One\n## Two\n### Three")).toEqual([
        { type: "heading", level: 1, text: "One" },
        { type: "heading", level: 2, text: "Two" },
        { type: "heading", level: 3, text: "Three" },
      ]);
    });

    it("should require a space after the hashes", () => {
      expect(parseMarkdownBlocks("#Title")).toEqual([
        { type: "paragraph", runs: [{ text: "#Title", styles: [] }] },
      ]);
    });

    it("should treat four or more hashes as a paragraph", () => {
      expect(parseMarkdownBlocks("#### Deep")).toEqual([
        { type: "paragraph", runs: [{ text: "#### Deep", styles: [] }] },
      ]);
    });

    it("should keep heading text plain and trimmed", () => {
      expect(parseMarkdownBlocks("  ##   **Key** points  ")).toEqual([
        { type: "heading", level: 2, text: "**Key** points" },
      ]);
    });
  });

  describe("lists", () => {
    it("should strip bullet markers and parse inline styles", () => {
      expect(parseMarkdownBlocks("- plain item\n-   a *styled* item")).toEqual([
        { type: "bulleted_list_item", runs: [{ text: "plain item", styles: [] }] },
        {
          type: "bulleted_list_item",
          runs: [
            { text: "a ", styles: [] },
            { text: "styled", styles: ["italic"] },
            { text: " item", styles: [] },
          ],
        },
      ]);
    });

    it("should strip numeric prefixes from numbered items", () => {
      expect(parseMarkdownBlocks("1. First\n12. ~~Twelfth~~")).toEqual([
        { type: "numbered_list_item", runs: [{ text: "First", styles: [] }] },
        {
          type: "numbered_list_item",
          runs: [{ text: "Twelfth", styles: ["strikethrough"] }],
        },
      ]);
    });

    it("should not treat a number without a space as a list item", () => {
      expect(parseMarkdownBlocks("3.14 is pi")).toEqual([
        { type: "paragraph", runs: [{ text: "3.14 is pi", styles: [] }] },
      ]);
    });
  });

  describe("code fences", () => {
    it("should keep code lines verbatim and drop the fences", () => {
      const markdown = "```\n  indented line\nsecond  \n```\nAfter";
      expect(parseMarkdownBlocks(markdown)).toEqual([
        { type: "code", lines: ["  indented line", "second  "], language: "plain text" },
        { type: "paragraph", runs: [{ text: "After", styles: [] }] },
      ]);
    });

    it("should absorb the rest of the input when the fence is never closed", () => {
      expect(parseMarkdownBlocks("```\nline1\nline2")).toEqual([
        { type: "code", lines: ["line1", "line2"], language: "plain text" },
      ]);
    });

    it("should not interpret markdown inside a fence", () => {
      expect(parseMarkdownBlocks("```\n# not a heading\n\n- nor a list\n```")).toEqual([
        {
          type: "code",
          lines: ["# not a heading", "", "- nor a list"],
          language: "plain text",
        },
      ]);
    });

    it("should close the fence on an indented closing marker", () => {
      expect(parseMarkdownBlocks("```\ncode\n   ```\ntext")).toEqual([
        { type: "code", lines: ["code"], language: "plain text" },
        { type: "paragraph", runs: [{ text: "text", styles: [] }] },
      ]);
    });

    it("should take the language from the opening fence", () => {
      expect(parseMarkdownBlocks("```Python extra\nprint(1)\n```")).toEqual([
        { type: "code", lines: ["print(1)"], language: "python" },
      ]);
    });

    it("should use the configured default language", () => {
      const parser = new MarkdownBlockParser({ defaultCodeLanguage: "shell" });
      expect(parser.parse("```\nls\n```")).toEqual([
        { type: "code", lines: ["ls"], language: "shell" },
      ]);
    });

    it("should produce an empty code block for an empty fence", () => {
      expect(parseMarkdownBlocks("```\n```")).toEqual([
        { type: "code", lines: [], language: "plain text" },
      ]);
    });
  });

  describe("paragraphs", () => {
    it("should skip blank lines", () => {
      expect(parseMarkdownBlocks("\n   \nText\n\n")).toEqual([
        { type: "paragraph", runs: [{ text: "Text", styles: [] }] },
      ]);
    });

    it("should return no blocks for empty input", () => {
      expect(parseMarkdownBlocks("")).toEqual([]);
    });

    it("should normalize Windows line endings", () => {
      expect(parseMarkdownBlocks("# Title\r\n```\r\ncode\r\n```")).toEqual([
        { type: "heading", level: 1, text: "Title" },
        { type: "code", lines: ["code"], language: "plain text" },
      ]);
    });

    it("should treat a lone dash as a paragraph", () => {
      expect(parseMarkdownBlocks("- ")).toEqual([
        { type: "paragraph", runs: [{ text: "-", styles: [] }] },
      ]);
    });
  });

  it("should convert a full summary in document order", () => {
    const markdown =
      "# Title\n\nSome **bold** text.\n- item one\n- item two\n```\ncode here\n```";

    expect(parseMarkdownBlocks(markdown)).toEqual([
      { type: "heading", level: 1, text: "Title" },
      {
        type: "paragraph",
        runs: [
          { text: "Some ", styles: [] },
          { text: "bold", styles: ["bold"] },
          { text: " text.", styles: [] },
        ],
      },
      { type: "bulleted_list_item", runs: [{ text: "item one", styles: [] }] },
      { type: "bulleted_list_item", runs: [{ text: "item two", styles: [] }] },
      { type: "code", lines: ["code here"], language: "plain text" },
    ]);
  });

  it("should be reusable across documents", () => {
    const parser = new MarkdownBlockParser();
    expect(parser.parse("```\nopen")).toHaveLength(1);
    expect(parser.parse("# Next")).toEqual([{ type: "heading", level: 1, text: "Next" }]);
  });
});
