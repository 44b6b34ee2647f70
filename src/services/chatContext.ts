import type { ChatMessage, ContextMessage } from '../types/chat.types';

export const DEFAULT_CONTEXT_WINDOW = 20;

export interface ChatContextInput {
  contextSummary: string | null;
  /** Stored messages of the chat, oldest first. */
  history: ChatMessage[];
  newMessage?: string;
  useContext: boolean;
  window?: number;
}

/**
 * Builds the message list sent to the AI provider for one chat turn.
 *
 * With context: an optional system message carrying the context summary,
 * then the last `window` stored messages in chronological order, then the
 * new user message. Anything older than the window reaches the model only
 * through the summary.
 */
export function buildChatContext(input: ChatContextInput): ContextMessage[] {
  const window = input.window ?? DEFAULT_CONTEXT_WINDOW;
  const context: ContextMessage[] = [];

  if (input.useContext) {
    if (input.contextSummary) {
      context.push({
        role: 'system',
        content: `Previous conversation summary: ${input.contextSummary}`,
      });
    }

    const recent = input.history.length > window ? input.history.slice(-window) : input.history;
    for (const message of recent) {
      context.push({ role: message.role, content: message.content });
    }
  }

  if (input.newMessage !== undefined) {
    context.push({ role: 'user', content: input.newMessage });
  }

  return context;
}

export function renderConversation(messages: Pick<ChatMessage, 'role' | 'content'>[]): string {
  return messages.map((message) => `${message.role.toUpperCase()}: ${message.content}`).join('\n\n');
}
