/**
 * Default configuration values for summarization and publishing
 */

/** Model used when none is given on the command line or in OPENAI_MODEL */
export const DEFAULT_SUMMARY_MODEL = "gpt-4.1-nano";

/** Sampling temperature for summary requests */
export const SUMMARY_TEMPERATURE = 0.3;

/** Upper bound on tokens generated per summary */
export const SUMMARY_MAX_OUTPUT_TOKENS = 800;

/**
 * Instruction sent with every document. The document itself travels as a file URL.
 */
export const SUMMARY_PROMPT =
  "You are a concise document summariser. Read the PDF at the provided URL directly and " +
  "return a clear, structured summary with key points, important details, and conclusions.";

/** Default report file written by the summarize command */
export const DEFAULT_OUTPUT_FILE = "summaries.txt";

/**
 * Default maximum chunk size for the word-boundary splitter.
 */
export const DEFAULT_CHUNK_SIZE = 2000;

/**
 * Maximum characters Notion accepts in a single rich text object.
 */
export const NOTION_RICH_TEXT_LIMIT = 2000;

/**
 * Maximum number of blocks Notion accepts per "append block children" request.
 */
export const NOTION_APPEND_BATCH_SIZE = 100;

/** Language stamped on code blocks whose fence names no supported language */
export const DEFAULT_CODE_LANGUAGE = "plain text";

/** Width of the separator line between entries in the summary report */
export const REPORT_SEPARATOR_WIDTH = 80;
