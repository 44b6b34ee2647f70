import OpenAI from 'openai';
import type { AIConfig } from './env';

// Retries are owned by OpenAIService, so the SDK's own are switched off.
export function createOpenAIClient(config: AIConfig): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: 0,
  });
}
