import type OpenAI from "openai";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { SUMMARY_PROMPT } from "../utils/config";
import { OpenAISummarizer } from "./OpenAISummarizer";
import { isFailedSummary } from "./types";

describe("OpenAISummarizer", () => {
  const url = "https://example.com/report.pdf";
  let createResponse: ReturnType<typeof vi.fn>;
  let summarizer: OpenAISummarizer;

  beforeEach(() => {
    createResponse = vi.fn();
    const client = { responses: { create: createResponse } };
    summarizer = new OpenAISummarizer({
      client: client as unknown as OpenAI,
      model: "test-model",
    });
  });

  it("should send the prompt and the document URL as an input file", async () => {
    createResponse.mockResolvedValue({
      id: "resp_1",
      model: "test-model",
      output_text: "# Summary\n",
    });

    await summarizer.summarize(url);

    expect(createResponse).toHaveBeenCalledWith({
      model: "test-model",
      input: [
        {
          role: "user",
          content: [
            { type: "input_text", text: SUMMARY_PROMPT },
            { type: "input_file", file_url: url },
          ],
        },
      ],
      temperature: 0.3,
      max_output_tokens: 800,
    });
  });

  it("should return the trimmed summary with response metadata", async () => {
    createResponse.mockResolvedValue({
      id: "resp_1",
      model: "test-model-2025",
      output_text: "\n  # Summary\n- point\n\n",
    });

    const result = await summarizer.summarize(url);

    expect(result).toEqual({
      url,
      responseId: "resp_1",
      model: "test-model-2025",
      summary: "# Summary\n- point",
    });
    expect(isFailedSummary(result)).toBe(false);
  });

  it("should turn failures into an error-shaped result", async () => {
    createResponse.mockRejectedValue(new Error("connection refused"));

    const result = await summarizer.summarize(url);

    expect(result).toEqual({
      url,
      responseId: null,
      model: null,
      summary: `Error summarizing ${url}: connection refused`,
    });
    expect(isFailedSummary(result)).toBe(true);
  });

  it("should use a custom prompt when given", async () => {
    createResponse.mockResolvedValue({ id: "resp_2", model: "m", output_text: "ok" });
    const custom = new OpenAISummarizer({
      client: { responses: { create: createResponse } } as unknown as OpenAI,
      prompt: "Summarize briefly.",
    });

    await custom.summarize(url);

    const [request] = createResponse.mock.calls[0];
    expect(request.model).toBe("gpt-4.1-nano");
    expect(request.input[0].content[0]).toEqual({
      type: "input_text",
      text: "Summarize briefly.",
    });
  });
});
