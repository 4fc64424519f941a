/**
 * Summarize command - Summarizes documents by URL and writes a text report.
 */

import { type Command, Option } from "commander";
import { SummaryPipeline, writeSummaryReport } from "../../pipeline/SummaryPipeline";
import { OpenAISummarizer } from "../../summarizer/OpenAISummarizer";
import { DEFAULT_OUTPUT_FILE, DEFAULT_SUMMARY_MODEL } from "../../utils/config";
import { logger } from "../../utils/logger";
import type { SummarizerCliOptions } from "../types";
import { parseOpenAICredentials } from "../utils";

export interface SummarizeCommandOptions extends SummarizerCliOptions {
  output: string;
}

export async function summarizeAction(urls: string[], options: SummarizeCommandOptions) {
  const { apiKey, model } = parseOpenAICredentials(options);
  const pipeline = new SummaryPipeline(new OpenAISummarizer({ apiKey, model }));

  const results = await pipeline.summarizeAll(urls);
  const outputPath = await writeSummaryReport(options.output, results);

  logger.info(`\nSaved summaries to: ${outputPath}`);
}

/**
 * Options shared by every command that talks to OpenAI.
 */
export function addSummarizerOptions(command: Command): Command {
  return command
    .addOption(
      new Option("--api-key <key>", "OpenAI API key").env("OPENAI_API_KEY"),
    )
    .addOption(
      new Option("--model <model>", "Model used for summarization")
        .env("OPENAI_MODEL")
        .default(DEFAULT_SUMMARY_MODEL),
    );
}

export function createSummarizeCommand(program: Command): Command {
  const command = program
    .command("summarize <urls...>")
    .description("Summarize documents by URL and save the summaries to a text file")
    .option("-o, --output <file>", "Output text file for summaries", DEFAULT_OUTPUT_FILE);

  return addSummarizerOptions(command).action(summarizeAction);
}
