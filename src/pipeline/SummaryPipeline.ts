import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { extractTitle } from "../markdown/extractors";
import type { DocumentStore, WrittenPage } from "../notion/types";
import { isFailedSummary, type Summarizer, type SummaryResult } from "../summarizer/types";
import { NOTION_RICH_TEXT_LIMIT, REPORT_SEPARATOR_WIDTH } from "../utils/config";
import { logger } from "../utils/logger";

export interface PublishedSummary extends WrittenPage {
  url: string;
  title: string;
}

/**
 * Runs documents through the summarizer and, optionally, into a document store.
 * Documents are handled one at a time, in the order given.
 */
export class SummaryPipeline {
  constructor(
    private readonly summarizer: Summarizer,
    private readonly store?: DocumentStore,
  ) {}

  async summarizeAll(urls: readonly string[]): Promise<SummaryResult[]> {
    const results: SummaryResult[] = [];
    for (const [index, url] of urls.entries()) {
      logger.info(`[${index + 1}/${urls.length}] Summarizing: ${url}`);
      results.push(await this.summarizer.summarize(url));
    }
    return results;
  }

  /**
   * Writes one summary as a page titled after its first heading (or its URL),
   * cut to Notion's text limit. Failed summaries are not published and yield `null`.
   */
  async publish(result: SummaryResult): Promise<PublishedSummary | null> {
    if (!this.store) {
      throw new Error("SummaryPipeline was created without a document store");
    }
    if (isFailedSummary(result)) {
      logger.warn(`⚠️  Skipping publish for ${result.url}: ${result.summary}`);
      return null;
    }

    const title = (extractTitle(result.summary) || result.url).slice(0, NOTION_RICH_TEXT_LIMIT);
    const page = await this.store.writePage({
      title,
      url: result.url,
      content: result.summary,
    });
    logger.info(`✅ Published "${title}" (${page.blockCount} blocks)`);
    return { ...page, url: result.url, title };
  }

  async publishAll(results: readonly SummaryResult[]): Promise<PublishedSummary[]> {
    const published: PublishedSummary[] = [];
    for (const result of results) {
      const page = await this.publish(result);
      if (page) {
        published.push(page);
      }
    }
    return published;
  }
}

/**
 * Renders summaries as the plain-text report written by the summarize command.
 */
export function formatSummaryReport(results: readonly SummaryResult[]): string {
  const separator = "=".repeat(REPORT_SEPARATOR_WIDTH);
  return results
    .map((result) => `URL: ${result.url}\nSummary:\n${result.summary}\n${separator}\n\n`)
    .join("");
}

/**
 * Writes the report to `outputFile`, creating parent directories.
 * @returns The absolute path of the written file
 */
export async function writeSummaryReport(
  outputFile: string,
  results: readonly SummaryResult[],
): Promise<string> {
  const absolutePath = path.resolve(outputFile);
  await mkdir(path.dirname(absolutePath), { recursive: true });
  await writeFile(absolutePath, formatSummaryReport(results), "utf-8");
  return absolutePath;
}
