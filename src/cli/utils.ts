/**
 * Shared CLI utilities and helper functions.
 */

import { z } from "zod";
import { ConfigurationError } from "../utils/errors";
import { LogLevel, setLogLevel } from "../utils/logger";
import type { GlobalOptions, NotionCliOptions, SummarizerCliOptions } from "./types";

const openAICredentialsSchema = z.object({
  apiKey: z
    .string({ required_error: "OpenAI API key is required (--api-key or OPENAI_API_KEY)" })
    .trim()
    .min(1, "OpenAI API key must not be empty"),
  model: z.string().trim().min(1).optional(),
});

const notionCredentialsSchema = z.object({
  notionToken: z
    .string({ required_error: "Notion token is required (--notion-token or NOTION_TOKEN)" })
    .trim()
    .min(1, "Notion token must not be empty"),
  databaseId: z
    .string({
      required_error: "Notion database id is required (--database-id or NOTION_DATABASE_ID)",
    })
    .trim()
    .min(1, "Notion database id must not be empty"),
});

export type OpenAICredentials = z.infer<typeof openAICredentialsSchema>;
export type NotionCredentials = z.infer<typeof notionCredentialsSchema>;

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map((issue) => issue.message).join("\n"));
  }
  return result.data;
}

/**
 * Validates the summarizer options after commander has merged in environment variables.
 * @throws ConfigurationError if the API key is missing
 */
export function parseOpenAICredentials(options: SummarizerCliOptions): OpenAICredentials {
  return parseOrThrow(openAICredentialsSchema, {
    apiKey: options.apiKey,
    model: options.model,
  });
}

/**
 * Validates the Notion options.
 * @throws ConfigurationError if the token or database id is missing
 */
export function parseNotionCredentials(options: NotionCliOptions): NotionCredentials {
  return parseOrThrow(notionCredentialsSchema, {
    notionToken: options.notionToken,
    databaseId: options.databaseId,
  });
}

/**
 * Formats output for CLI commands
 */
export const formatOutput = (data: unknown): string => JSON.stringify(data, null, 2);

/**
 * Sets up logging based on global options
 */
export function setupLogging(options: GlobalOptions): void {
  if (options.silent) {
    setLogLevel(LogLevel.ERROR);
  } else if (options.verbose) {
    setLogLevel(LogLevel.DEBUG);
  }
}
