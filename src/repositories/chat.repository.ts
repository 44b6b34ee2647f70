import type { SupabaseClient } from '@supabase/supabase-js';
import type { AddedMessage, Chat, ChatMessage, MessageRole } from '../types/chat.types';
import { databaseError, sanitizeSearch } from './supabase';

export interface MessageDraft {
  role: MessageRole;
  content: string;
  tokens_used: number;
}

export type ChatPatch = Partial<Pick<Chat, 'title' | 'summary' | 'context_summary'>>;

export interface ChatRepository {
  create(userId: string, title: string): Promise<Chat>;
  findById(id: number, userId: string): Promise<Chat | null>;
  list(userId: string, search?: string): Promise<Chat[]>;
  update(id: number, userId: string, patch: ChatPatch): Promise<Chat | null>;
  delete(id: number, userId: string): Promise<boolean>;
  /**
   * Inserts a message and bumps the chat's `message_count` in one
   * transaction, returning the row and the new count.
   */
  appendMessage(chatId: number, draft: MessageDraft): Promise<AddedMessage>;
  /** All messages of a chat, oldest first. */
  listMessages(chatId: number): Promise<ChatMessage[]>;
  /** The newest `limit` messages, oldest first. */
  recentMessages(chatId: number, limit: number): Promise<ChatMessage[]>;
  findMessage(chatId: number, messageId: number): Promise<ChatMessage | null>;
  updateMessageSummary(messageId: number, summary: string): Promise<ChatMessage>;
}

export class SupabaseChatRepository implements ChatRepository {
  constructor(private readonly db: SupabaseClient) {}

  async create(userId: string, title: string): Promise<Chat> {
    const { data, error } = await this.db
      .from('chats')
      .insert({ user_id: userId, title })
      .select()
      .single();

    if (error || !data) {
      throw databaseError(error, 'Failed to create chat');
    }
    return data;
  }

  async findById(id: number, userId: string): Promise<Chat | null> {
    const { data, error } = await this.db
      .from('chats')
      .select('*')
      .eq('id', id)
      .eq('user_id', userId)
      .maybeSingle();

    if (error) {
      throw databaseError(error, 'Failed to fetch chat');
    }
    return data;
  }

  async list(userId: string, search?: string): Promise<Chat[]> {
    let query = this.db
      .from('chats')
      .select('*')
      .eq('user_id', userId)
      .order('updated_at', { ascending: false });

    const term = search ? sanitizeSearch(search) : '';
    if (term) {
      const messageChatIds = await this.chatIdsWithMessage(userId, term);
      const filters = [`title.ilike.%${term}%`, `summary.ilike.%${term}%`];
      if (messageChatIds.length > 0) {
        filters.push(`id.in.(${messageChatIds.join(',')})`);
      }
      query = query.or(filters.join(','));
    }

    const { data, error } = await query;

    if (error) {
      throw databaseError(error, 'Failed to fetch chats');
    }
    return data ?? [];
  }

  async update(id: number, userId: string, patch: ChatPatch): Promise<Chat | null> {
    const { data, error } = await this.db
      .from('chats')
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq('id', id)
      .eq('user_id', userId)
      .select()
      .maybeSingle();

    if (error) {
      throw databaseError(error, 'Failed to update chat');
    }
    return data;
  }

  async delete(id: number, userId: string): Promise<boolean> {
    const { data, error } = await this.db
      .from('chats')
      .delete()
      .eq('id', id)
      .eq('user_id', userId)
      .select('id');

    if (error) {
      throw databaseError(error, 'Failed to delete chat');
    }
    return (data ?? []).length > 0;
  }

  async appendMessage(chatId: number, draft: MessageDraft): Promise<AddedMessage> {
    const { data, error } = await this.db.rpc('append_chat_message', {
      p_chat_id: chatId,
      p_role: draft.role,
      p_content: draft.content,
      p_tokens_used: draft.tokens_used,
    });

    if (error || !data) {
      throw databaseError(error, 'Failed to save chat message');
    }
    return data;
  }

  async listMessages(chatId: number): Promise<ChatMessage[]> {
    const { data, error } = await this.db
      .from('chat_messages')
      .select('*')
      .eq('chat_id', chatId)
      .order('created_at', { ascending: true })
      .order('id', { ascending: true });

    if (error) {
      throw databaseError(error, 'Failed to fetch message history');
    }
    return data ?? [];
  }

  async recentMessages(chatId: number, limit: number): Promise<ChatMessage[]> {
    const { data, error } = await this.db
      .from('chat_messages')
      .select('*')
      .eq('chat_id', chatId)
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(limit);

    if (error) {
      throw databaseError(error, 'Failed to fetch message history');
    }
    return [...(data ?? [])].reverse();
  }

  async findMessage(chatId: number, messageId: number): Promise<ChatMessage | null> {
    const { data, error } = await this.db
      .from('chat_messages')
      .select('*')
      .eq('id', messageId)
      .eq('chat_id', chatId)
      .maybeSingle();

    if (error) {
      throw databaseError(error, 'Failed to fetch message');
    }
    return data;
  }

  async updateMessageSummary(messageId: number, summary: string): Promise<ChatMessage> {
    const { data, error } = await this.db
      .from('chat_messages')
      .update({ summary })
      .eq('id', messageId)
      .select()
      .single();

    if (error || !data) {
      throw databaseError(error, 'Failed to save message summary');
    }
    return data;
  }

  private async chatIdsWithMessage(userId: string, term: string): Promise<number[]> {
    const { data, error } = await this.db
      .from('chat_messages')
      .select('chat_id, chats!inner(user_id)')
      .eq('chats.user_id', userId)
      .ilike('content', `%${term}%`);

    if (error) {
      throw databaseError(error, 'Failed to search chat messages');
    }
    const ids = (data ?? []).map((row: { chat_id: number }) => row.chat_id);
    return [...new Set(ids)];
  }
}
