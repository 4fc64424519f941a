/**
 * Outcome of summarizing one document. A failed call is still a result:
 * `responseId` and `model` are null and `summary` describes the failure.
 */
export interface SummaryResult {
  url: string;
  responseId: string | null;
  model: string | null;
  summary: string;
}

export interface Summarizer {
  /** Summarizes the document at `url`. Never rejects. */
  summarize(url: string): Promise<SummaryResult>;
}

export const SUMMARY_ERROR_PREFIX = "Error summarizing";

/**
 * True when the result is the placeholder produced for a failed call.
 */
export function isFailedSummary(result: SummaryResult): boolean {
  return result.responseId === null;
}
