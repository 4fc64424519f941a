/**
 * Publish command - Summarizes documents and writes each summary to a Notion database page.
 */

import { type Command, Option } from "commander";
import { NotionDocumentStore } from "../../notion/NotionDocumentStore";
import { SummaryPipeline, writeSummaryReport } from "../../pipeline/SummaryPipeline";
import { OpenAISummarizer } from "../../summarizer/OpenAISummarizer";
import { logger } from "../../utils/logger";
import type { NotionCliOptions, SummarizerCliOptions } from "../types";
import { formatOutput, parseNotionCredentials, parseOpenAICredentials } from "../utils";
import { addSummarizerOptions } from "./summarize";

export interface PublishCommandOptions extends SummarizerCliOptions, NotionCliOptions {
  output?: string;
}

export async function publishAction(urls: string[], options: PublishCommandOptions) {
  // Validate everything before the first remote call
  const { apiKey, model } = parseOpenAICredentials(options);
  const { notionToken, databaseId } = parseNotionCredentials(options);

  const pipeline = new SummaryPipeline(
    new OpenAISummarizer({ apiKey, model }),
    new NotionDocumentStore({ token: notionToken, databaseId }),
  );

  const results = await pipeline.summarizeAll(urls);
  if (options.output) {
    const outputPath = await writeSummaryReport(options.output, results);
    logger.info(`Saved summaries to: ${outputPath}`);
  }

  const published = await pipeline.publishAll(results);
  console.log(formatOutput(published));

  if (published.length < urls.length) {
    logger.warn(`⚠️  Published ${published.length} of ${urls.length} documents`);
  }
}

export function createPublishCommand(program: Command): Command {
  const command = program
    .command("publish <urls...>")
    .description("Summarize documents by URL and publish each summary as a Notion page")
    .addOption(
      new Option("--notion-token <token>", "Notion integration token").env("NOTION_TOKEN"),
    )
    .addOption(
      new Option("--database-id <id>", "Notion database that receives the pages").env(
        "NOTION_DATABASE_ID",
      ),
    )
    .option("-o, --output <file>", "Also save the summaries to a text file");

  return addSummarizerOptions(command).action(publishAction);
}
