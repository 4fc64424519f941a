/**
 * Options defined on the root command and shared by every subcommand.
 */
export interface GlobalOptions {
  verbose?: boolean;
  silent?: boolean;
}

/**
 * Options of commands that call the summarizer.
 */
export interface SummarizerCliOptions {
  apiKey?: string;
  model?: string;
}

/**
 * Options of commands that write to Notion.
 */
export interface NotionCliOptions {
  notionToken?: string;
  databaseId?: string;
}
