export type MessageRole = 'user' | 'assistant' | 'system';

export interface Chat {
  id: number;
  user_id: string;
  title: string;
  summary: string | null;
  context_summary: string | null;
  message_count: number;
  last_message_at: string | null;
  created_at: string;
  updated_at: string;
}

export interface ChatMessage {
  id: number;
  chat_id: number;
  role: MessageRole;
  content: string;
  summary: string | null;
  tokens_used: number;
  created_at: string;
}

export interface ChatDetail extends Chat {
  messages: ChatMessage[];
}

/** A message as it is sent to the AI provider. */
export interface ContextMessage {
  role: MessageRole;
  content: string;
}

export interface CreateChatDto {
  title?: string;
}

export interface AddMessageDto {
  role: MessageRole;
  content: string;
}

export interface AddedMessage {
  message: ChatMessage;
  message_count: number;
}

export interface AIResponseResult {
  response: string;
  chat_id: number;
  message_count: number;
}

export interface ChatContextView {
  chat_id: number;
  context: ContextMessage[];
  summary: string | null;
  message_count: number;
}

export interface ChatStatistics {
  total_messages: number;
  user_messages: number;
  assistant_messages: number;
  total_tokens: number;
  created_at: string;
  updated_at: string;
  last_message_at: string | null;
}

export interface MessageSummary {
  message_id: number;
  summary: string;
}
