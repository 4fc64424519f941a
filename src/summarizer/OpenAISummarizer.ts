import OpenAI from "openai";
import {
  DEFAULT_SUMMARY_MODEL,
  SUMMARY_MAX_OUTPUT_TOKENS,
  SUMMARY_PROMPT,
  SUMMARY_TEMPERATURE,
} from "../utils/config";
import { getErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { SUMMARY_ERROR_PREFIX, type Summarizer, type SummaryResult } from "./types";

export interface OpenAISummarizerOptions {
  /** API key; ignored when `client` is given */
  apiKey?: string;
  /** Preconfigured client, mainly for tests */
  client?: OpenAI;
  /** @default DEFAULT_SUMMARY_MODEL */
  model?: string;
  /** @default SUMMARY_PROMPT */
  prompt?: string;
}

/**
 * Summarizes documents through the OpenAI Responses API. The document is passed
 * by URL as an input file, so the model reads it directly; nothing is downloaded here.
 */
export class OpenAISummarizer implements Summarizer {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly prompt: string;

  constructor(options: OpenAISummarizerOptions = {}) {
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_SUMMARY_MODEL;
    this.prompt = options.prompt ?? SUMMARY_PROMPT;
  }

  async summarize(url: string): Promise<SummaryResult> {
    try {
      const response = await this.client.responses.create({
        model: this.model,
        input: [
          {
            role: "user",
            content: [
              { type: "input_text", text: this.prompt },
              { type: "input_file", file_url: url },
            ],
          },
        ],
        temperature: SUMMARY_TEMPERATURE,
        max_output_tokens: SUMMARY_MAX_OUTPUT_TOKENS,
      });

      logger.debug(`Summary for ${url} generated by ${response.model} (${response.id})`);
      return {
        url,
        responseId: response.id,
        model: response.model,
        summary: response.output_text.trim(),
      };
    } catch (error) {
      logger.warn(`⚠️  Summarization failed for ${url}: ${getErrorMessage(error)}`);
      return {
        url,
        responseId: null,
        model: null,
        summary: `${SUMMARY_ERROR_PREFIX} ${url}: ${getErrorMessage(error)}`,
      };
    }
  }
}
