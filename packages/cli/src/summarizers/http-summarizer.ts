/**
 * HTTP summarizer
 *
 * Posts the run context and its logs to a text-generation endpoint and reads
 * the summary from the response.
 * @module @faultline/cli/summarizers/http-summarizer
 */

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import type { Summarizer, SummaryRequest } from '@faultline/shared';
import { ErrorCode, SummaryUnavailableError, errorMessage } from '@faultline/shared';

export interface HttpSummarizerOptions {
  /** Endpoint receiving the summary request as JSON */
  url: string;
  /** Request timeout; the report assembler applies its own as well */
  timeoutMs?: number;
  /** Sent as a bearer token when set */
  apiKey?: string;
  /** Replaces the default axios instance, mainly for tests */
  client?: AxiosInstance;
}

/**
 * Pull the summary text out of a response body. Accepts a plain string or
 * an object with a `summary` string.
 */
export function readSummary(data: unknown): string | null {
  if (typeof data === 'string') {
    return data;
  }
  if (typeof data === 'object' && data !== null && 'summary' in data && typeof data.summary === 'string') {
    return data.summary;
  }
  return null;
}

export class HttpSummarizer implements Summarizer {
  readonly name = 'http';

  private readonly url: string;
  private readonly client: AxiosInstance;

  constructor(options: HttpSummarizerOptions) {
    this.url = options.url;
    this.client = options.client ?? axios.create({
      timeout: options.timeoutMs ?? 30_000,
      headers: {
        'Content-Type': 'application/json',
        ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      },
    });
  }

  async summarize(request: SummaryRequest): Promise<string> {
    let data: unknown;
    try {
      const response = await this.client.post<unknown>(this.url, request);
      data = response.data;
    } catch (err) {
      const status = isAxiosError(err) ? err.response?.status : undefined;
      throw new SummaryUnavailableError(
        status ? `Summarizer answered with status ${status}` : `Summarizer request failed: ${errorMessage(err)}`,
        ErrorCode.SUMMARY_UNAVAILABLE,
        err instanceof Error ? err : undefined,
      );
    }

    const summary = readSummary(data);
    if (summary === null) {
      throw new SummaryUnavailableError('Summarizer response has no summary text');
    }
    return summary;
  }
}

/**
 * Create an HTTP summarizer
 */
export function createHttpSummarizer(options: HttpSummarizerOptions): HttpSummarizer {
  return new HttpSummarizer(options);
}
