import type { AIConfig } from '../config/env';
import { AIServiceUnavailableError, ValidationError, errorMessage } from '../errors/appErrors';
import type { ContextMessage } from '../types/chat.types';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';
import { countWords, extractiveSummary, isBlank } from '../utils/text';
import type { CompletionProvider } from './completion.provider';

/**
 * What to do once every attempt at a summary has failed: fall back to an
 * extractive summary, or raise `AIServiceUnavailableError`.
 */
export type FailureMode = 'absorb' | 'propagate';

export type SummarySource = 'model' | 'verbatim' | 'extractive';

export interface SummaryResult {
  summary: string;
  source: SummarySource;
}

export interface SummarizeOptions {
  onFailure?: FailureMode;
}

export type Sleep = (ms: number) => Promise<void>;

const SHORT_TEXT_WORDS = 20;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export class OpenAIService {
  constructor(
    private readonly config: AIConfig,
    private readonly provider: CompletionProvider,
    private readonly sleep: Sleep = defaultSleep
  ) {}

  get model(): string {
    return this.config.model;
  }

  get isConfigured(): boolean {
    return this.config.apiKey.length > 0;
  }

  async summarize(text: string, maxLength = 150, options: SummarizeOptions = {}): Promise<SummaryResult> {
    const onFailure = options.onFailure ?? 'absorb';

    if (isBlank(text)) {
      throw new ValidationError('Cannot summarize empty content', 'Content must not be empty', 'CONTENT_EMPTY');
    }

    if (countWords(text) <= SHORT_TEXT_WORDS) {
      return { summary: text.trim().slice(0, maxLength * 5), source: 'verbatim' };
    }

    try {
      if (!this.isConfigured) {
        throw new AIServiceUnavailableError('AI provider is not configured', 'Set OPENAI_API_KEY to enable summaries');
      }
      const summary = await this.withRetry('summary', [{ role: 'user', content: this.buildSummaryPrompt(text, maxLength) }]);
      return { summary, source: 'model' };
    } catch (error) {
      if (onFailure === 'propagate') {
        throw error instanceof AIServiceUnavailableError
          ? error
          : new AIServiceUnavailableError('Failed to generate summary', errorMessage(error));
      }

      logger.info('Using extractive summary as fallback', { reason: errorMessage(error) });
      metrics.recordAiCall('summary', 'fallback');
      return { summary: extractiveSummary(text, maxLength), source: 'extractive' };
    }
  }

  /** Sends an assembled context, ending with the new user message, to chat completion. */
  async chatResponse(contextMessages: ContextMessage[]): Promise<string> {
    if (contextMessages.length === 0) {
      throw new ValidationError('Cannot request a response without messages');
    }
    if (!this.isConfigured) {
      throw new AIServiceUnavailableError('AI provider is not configured', 'Set OPENAI_API_KEY to enable chat responses');
    }

    return this.withRetry('chat', contextMessages);
  }

  private async withRetry(kind: 'summary' | 'chat', messages: ContextMessage[]): Promise<string> {
    const { maxRetries } = this.config;
    let lastError: unknown;

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        logger.debug('Calling AI provider', { kind, attempt: attempt + 1, maxRetries });
        const text = await this.provider.complete({
          messages,
          model: this.config.model,
          temperature: this.config.temperature,
          maxTokens: this.config.maxOutputTokens,
        });

        const trimmed = text.trim();
        if (!trimmed) {
          throw new Error('Empty response from AI provider');
        }

        metrics.recordAiCall(kind, 'success');
        return trimmed;
      } catch (error) {
        lastError = error;
        metrics.recordAiCall(kind, 'failure');
        logger.warn('AI provider attempt failed', { kind, attempt: attempt + 1, error: errorMessage(error) });

        if (attempt < maxRetries - 1) {
          await this.sleep(2 ** attempt * 1000);
        }
      }
    }

    logger.error('All AI provider attempts failed', { kind, maxRetries, error: errorMessage(lastError) });
    throw new AIServiceUnavailableError(
      kind === 'summary' ? 'Failed to generate summary after retries' : 'Failed to generate AI response',
      errorMessage(lastError)
    );
  }

  private buildSummaryPrompt(text: string, maxLength: number): string {
    return `Summarize the following text in approximately ${maxLength} words or less.
Make it concise, clear, and capture the key points. Do not include any preamble or
explanation - just provide the summary.

Text:
${text}

Summary:`;
  }
}
