import { Client } from "@notionhq/client";
import { parseMarkdownBlocks } from "../markdown/MarkdownBlockParser";
import type { Block } from "../markdown/types";
import { NOTION_APPEND_BATCH_SIZE } from "../utils/config";
import { DocumentStoreError, getErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { batchBlocks, toNotionBlocks } from "./blocks";
import type { CreatePageOptions, DocumentStore, WritePageOptions, WrittenPage } from "./types";

export interface NotionDocumentStoreOptions {
  /** Database that receives one page per document */
  databaseId: string;
  /** Integration token; ignored when `client` is given */
  token?: string;
  /** Preconfigured client, mainly for tests */
  client?: Client;
  /**
   * Blocks sent per "append block children" request.
   * @default NOTION_APPEND_BATCH_SIZE
   */
  batchSize?: number;
}

/**
 * Writes documents into a Notion database. Each document becomes a page with
 * `Title` and `URL` properties, and its markdown content is appended as blocks.
 *
 * Requests are sent one after another so that block order on the page matches
 * the source. There are no retries; failures surface as {@link DocumentStoreError}.
 */
export class NotionDocumentStore implements DocumentStore {
  private readonly client: Client;
  private readonly databaseId: string;
  private readonly batchSize: number;

  constructor(options: NotionDocumentStoreOptions) {
    this.client = options.client ?? new Client({ auth: options.token });
    this.databaseId = options.databaseId;
    this.batchSize = options.batchSize ?? NOTION_APPEND_BATCH_SIZE;
  }

  async createPage({ title, url }: CreatePageOptions): Promise<string> {
    try {
      const page = await this.client.pages.create({
        parent: { database_id: this.databaseId },
        properties: {
          Title: { title: [{ text: { content: title } }] },
          URL: { url },
        },
      });
      logger.debug(`Created Notion page ${page.id} for ${url}`);
      return page.id;
    } catch (error) {
      throw new DocumentStoreError(
        `Failed to create Notion page "${title}": ${getErrorMessage(error)}`,
        error,
      );
    }
  }

  async appendBlocks(pageId: string, blocks: readonly Block[]): Promise<number> {
    const batches = batchBlocks(toNotionBlocks(blocks), this.batchSize);

    for (const [index, children] of batches.entries()) {
      try {
        await this.client.blocks.children.append({ block_id: pageId, children });
      } catch (error) {
        throw new DocumentStoreError(
          `Failed to append blocks to page ${pageId} (batch ${index + 1}/${batches.length}): ${getErrorMessage(error)}`,
          error,
        );
      }
      logger.debug(`Appended batch ${index + 1}/${batches.length} to page ${pageId}`);
    }

    return blocks.length;
  }

  async writePage({ title, url, content }: WritePageOptions): Promise<WrittenPage> {
    const pageId = await this.createPage({ title, url });
    if (!content) {
      return { pageId, blockCount: 0 };
    }

    const blockCount = await this.appendBlocks(pageId, parseMarkdownBlocks(content));
    return { pageId, blockCount };
  }
}
