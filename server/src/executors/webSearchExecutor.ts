/**
 * Web Search Executor - Search the web for information
 *
 * Two modes:
 * - api: DuckDuckGo instant-answer API, returns the answer text
 * - browser: opens the search engine in the default browser
 */

import { z } from 'zod';
import { IToolExecutor, ExecutionResult, ToolContext, buildResult } from './interface';
import { SearchWebParams, SearchWebParamsType } from '../core/schemas';
import { fetchWithTimeout, FetchFn } from '../services/http';
import { Launcher, launchDetached, browserCommand } from '../services/processLauncher';
import { logger, describeError } from '../services/logger';

const InstantAnswer = z.object({
  Abstract: z.string().optional(),
  AbstractText: z.string().optional(),
  Answer: z.unknown().optional(),
  RelatedTopics: z
    .array(
      z.object({
        Text: z.string().optional(),
        FirstURL: z.string().optional(),
      })
    )
    .optional(),
});

type InstantAnswerType = z.infer<typeof InstantAnswer>;

/**
 * Pick the most useful sentence from an instant-answer payload
 */
export function summarizeInstantAnswer(data: InstantAnswerType): string | null {
  if (typeof data.Answer === 'string' && data.Answer.trim()) return data.Answer.trim();
  const abstract = data.AbstractText || data.Abstract;
  if (abstract && abstract.trim()) return abstract.trim();

  const topics = (data.RelatedTopics ?? []).filter((t) => t.Text && t.FirstURL).slice(0, 3);
  if (topics.length === 0) return null;
  return topics.map((t) => `${t.Text} (${t.FirstURL})`).join(' | ');
}

export interface WebSearchExecutorOptions {
  mode: 'api' | 'browser';
  apiUrl: string;
  engineUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
  launcher?: Launcher;
  platform?: NodeJS.Platform;
}

export class WebSearchExecutor implements IToolExecutor<SearchWebParamsType> {
  readonly id = 'search_web';
  readonly name = 'Web Search';
  readonly category = 'information';
  readonly description = 'Search the web';
  readonly schema = SearchWebParams;

  private launcher: Launcher;

  constructor(private options: WebSearchExecutorOptions) {
    this.launcher = options.launcher ?? launchDetached;
  }

  async execute(params: SearchWebParamsType, context: ToolContext): Promise<ExecutionResult> {
    const startedAt = new Date();
    const { query } = params;

    try {
      const message =
        this.options.mode === 'browser' ? await this.openInBrowser(query) : await this.searchApi(query);
      logger.info(`Search results for '${query}'`, { turnId: context.turnId, mode: this.options.mode, message });
      return buildResult(this.id, startedAt, message);
    } catch (error) {
      logger.error(`Error searching the web for '${query}'`, {
        turnId: context.turnId,
        mode: this.options.mode,
        error: describeError(error),
      });
      return buildResult(this.id, startedAt, `An error occurred while searching the web for '${query}'.`, {
        code: 'SEARCH_ERROR',
      });
    }
  }

  private async searchApi(query: string): Promise<string> {
    const url = `${this.options.apiUrl}?q=${encodeURIComponent(query)}&format=json&no_html=1&skip_disambig=1`;
    const response = await fetchWithTimeout(url, {}, {
      timeoutMs: this.options.timeoutMs,
      fetchImpl: this.options.fetchImpl,
    });
    if (!response.ok) {
      throw new Error(`Search API error: ${response.status}`);
    }
    const data = InstantAnswer.parse(await response.json());
    return summarizeInstantAnswer(data) ?? `No results found for '${query}'.`;
  }

  private async openInBrowser(query: string): Promise<string> {
    const { command, args } = browserCommand(
      `${this.options.engineUrl}${encodeURIComponent(query)}`,
      this.options.platform
    );
    await this.launcher(command, args);
    return `Searching the web for '${query}'.`;
  }
}
