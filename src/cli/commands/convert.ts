/**
 * Convert command - Converts a local markdown file to Notion blocks and prints them as JSON.
 */

import { readFile } from "node:fs/promises";
import type { Command } from "commander";
import { extractSection } from "../../markdown/extractors";
import { parseMarkdownBlocks } from "../../markdown/MarkdownBlockParser";
import { toNotionBlocks } from "../../notion/blocks";
import { ValidationError } from "../../utils/errors";
import { formatOutput } from "../utils";

export async function convertAction(file: string, options: { section?: string }) {
  const markdown = await readFile(file, "utf-8");

  let content = markdown;
  if (options.section) {
    const section = extractSection(markdown, options.section);
    if (section === undefined) {
      throw new ValidationError(`Section "${options.section}" not found in ${file}`);
    }
    content = section;
  }

  console.log(formatOutput(toNotionBlocks(parseMarkdownBlocks(content))));
}

export function createConvertCommand(program: Command): Command {
  return program
    .command("convert <file>")
    .description("Convert a markdown file to Notion blocks and print them as JSON")
    .option("--section <name>", "Only convert the content under this heading")
    .action(convertAction);
}
