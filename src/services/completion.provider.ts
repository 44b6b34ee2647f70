import type OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { ContextMessage } from '../types/chat.types';

export interface CompletionRequest {
  messages: ContextMessage[];
  model: string;
  temperature: number;
  maxTokens: number;
}

/** The one call the AI adapter makes against a model vendor. */
export interface CompletionProvider {
  complete(request: CompletionRequest): Promise<string>;
}

export class OpenAICompletionProvider implements CompletionProvider {
  constructor(private readonly client: OpenAI) {}

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });

    return response.choices[0]?.message?.content ?? '';
  }
}

function toOpenAIMessage(message: ContextMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}
