import { NotFoundError, ValidationError, errorMessage } from '../errors/appErrors';
import type { ChatRepository } from '../repositories/chat.repository';
import type {
  AddMessageDto,
  AddedMessage,
  AIResponseResult,
  Chat,
  ChatContextView,
  ChatDetail,
  ChatMessage,
  ChatStatistics,
  CreateChatDto,
  MessageRole,
  MessageSummary,
} from '../types/chat.types';
import { logger } from '../utils/logger';
import { estimateTokens, isBlank } from '../utils/text';
import { DEFAULT_CONTEXT_WINDOW, buildChatContext, renderConversation } from './chatContext';
import type { FailureMode, OpenAIService } from './openai.service';

export const CHAT_SUMMARY_WORDS = 250;
export const CONTEXT_SUMMARY_WORDS = 100;
export const MESSAGE_SUMMARY_WORDS = 50;

export interface ChatServiceOptions {
  contextWindow?: number;
  summaryThreshold?: number;
}

function defaultTitle(now: Date): string {
  const iso = now.toISOString();
  return `Chat ${iso.slice(0, 10)} ${iso.slice(11, 16)}`;
}

export class ChatService {
  private readonly contextWindow: number;
  private readonly summaryThreshold: number;

  constructor(
    private readonly chats: ChatRepository,
    private readonly ai: OpenAIService,
    options: ChatServiceOptions = {}
  ) {
    this.contextWindow = options.contextWindow ?? DEFAULT_CONTEXT_WINDOW;
    this.summaryThreshold = options.summaryThreshold ?? 10;
  }

  async createChat(userId: string, data: CreateChatDto = {}): Promise<Chat> {
    const title = data.title?.trim() || defaultTitle(new Date());
    const chat = await this.chats.create(userId, title);
    logger.info('Created chat', { chatId: chat.id, userId });
    return chat;
  }

  async getChats(userId: string, search?: string): Promise<Chat[]> {
    return this.chats.list(userId, search);
  }

  async getChat(chatId: number, userId: string): Promise<Chat> {
    const chat = await this.chats.findById(chatId, userId);
    if (!chat) {
      throw new NotFoundError('Chat');
    }
    return chat;
  }

  async getChatDetail(chatId: number, userId: string): Promise<ChatDetail> {
    const chat = await this.getChat(chatId, userId);
    const messages = await this.chats.listMessages(chatId);
    return { ...chat, messages };
  }

  async renameChat(chatId: number, userId: string, title: string): Promise<Chat> {
    if (isBlank(title)) {
      throw new ValidationError('Title cannot be empty');
    }
    const chat = await this.chats.update(chatId, userId, { title: title.trim() });
    if (!chat) {
      throw new NotFoundError('Chat');
    }
    return chat;
  }

  async deleteChat(chatId: number, userId: string): Promise<void> {
    const deleted = await this.chats.delete(chatId, userId);
    if (!deleted) {
      throw new NotFoundError('Chat');
    }
  }

  async getMessages(chatId: number, userId: string): Promise<ChatMessage[]> {
    await this.getChat(chatId, userId);
    return this.chats.listMessages(chatId);
  }

  async addMessage(chatId: number, userId: string, data: AddMessageDto): Promise<AddedMessage> {
    if (isBlank(data.content)) {
      throw new ValidationError('Message content cannot be empty');
    }
    await this.getChat(chatId, userId);
    return this.appendMessage(chatId, userId, data.role, data.content);
  }

  /**
   * Runs one conversational turn. The provider is called before anything is
   * written, so a failed turn leaves the chat untouched; a successful one
   * stores the user message and the reply.
   */
  async getAIResponse(chatId: number, userId: string, message: string, useContext = true): Promise<AIResponseResult> {
    if (isBlank(message)) {
      throw new ValidationError('Message cannot be empty');
    }

    const chat = await this.getChat(chatId, userId);
    const history = useContext ? await this.chats.recentMessages(chatId, this.contextWindow) : [];

    const context = buildChatContext({
      contextSummary: chat.context_summary,
      history,
      newMessage: message,
      useContext,
      window: this.contextWindow,
    });

    const response = await this.ai.chatResponse(context);

    await this.appendMessage(chatId, userId, 'user', message);
    const { message_count } = await this.appendMessage(chatId, userId, 'assistant', response);

    return { response, chat_id: chatId, message_count };
  }

  /** The exact list a turn would send, without calling the provider. */
  async getContext(chatId: number, userId: string, preview?: string): Promise<ChatContextView> {
    const chat = await this.getChat(chatId, userId);
    const history = await this.chats.recentMessages(chatId, this.contextWindow);

    const context = buildChatContext({
      contextSummary: chat.context_summary,
      history,
      newMessage: isBlank(preview) ? undefined : preview,
      useContext: true,
      window: this.contextWindow,
    });

    return {
      chat_id: chat.id,
      context,
      summary: chat.summary,
      message_count: chat.message_count,
    };
  }

  /** Explicit refresh: a provider failure is raised and nothing is written. */
  async updateSummary(chatId: number, userId: string): Promise<Chat> {
    const chat = await this.getChat(chatId, userId);
    return this.refreshSummary(chat, 'propagate');
  }

  async summarizeMessage(chatId: number, userId: string, messageId: number): Promise<MessageSummary> {
    await this.getChat(chatId, userId);
    const message = await this.chats.findMessage(chatId, messageId);
    if (!message) {
      throw new NotFoundError('Message');
    }

    const { summary } = await this.ai.summarize(message.content, MESSAGE_SUMMARY_WORDS, { onFailure: 'propagate' });
    await this.chats.updateMessageSummary(message.id, summary);

    return { message_id: message.id, summary };
  }

  async getStatistics(chatId: number, userId: string): Promise<ChatStatistics> {
    const chat = await this.getChat(chatId, userId);
    const messages = await this.chats.listMessages(chatId);

    return {
      total_messages: messages.length,
      user_messages: messages.filter((m) => m.role === 'user').length,
      assistant_messages: messages.filter((m) => m.role === 'assistant').length,
      total_tokens: messages.reduce((sum, m) => sum + m.tokens_used, 0),
      created_at: chat.created_at,
      updated_at: chat.updated_at,
      last_message_at: chat.last_message_at,
    };
  }

  private async appendMessage(chatId: number, userId: string, role: MessageRole, content: string): Promise<AddedMessage> {
    const added = await this.chats.appendMessage(chatId, {
      role,
      content,
      tokens_used: estimateTokens(content),
    });
    logger.debug('Added chat message', { chatId, role, messageCount: added.message_count });

    if (added.message_count % this.summaryThreshold === 0) {
      try {
        const chat = await this.getChat(chatId, userId);
        await this.refreshSummary(chat, 'absorb');
      } catch (error) {
        logger.warn('Automatic chat summary failed', { chatId, error: errorMessage(error) });
      }
    }

    return added;
  }

  /**
   * Summarizes the whole history into `summary`, then condenses that into
   * the shorter `context_summary` used by later turns.
   */
  private async refreshSummary(chat: Chat, onFailure: FailureMode): Promise<Chat> {
    const messages = await this.chats.listMessages(chat.id);
    if (messages.length === 0) {
      return chat;
    }

    const conversation = renderConversation(messages);
    const full = await this.ai.summarize(conversation, CHAT_SUMMARY_WORDS, { onFailure });
    const condensed = await this.ai.summarize(full.summary, CONTEXT_SUMMARY_WORDS, { onFailure });

    const updated = await this.chats.update(chat.id, chat.user_id, {
      summary: full.summary,
      context_summary: condensed.summary,
    });
    if (!updated) {
      throw new NotFoundError('Chat');
    }

    logger.info('Updated chat summary', { chatId: chat.id, source: full.source });
    return updated;
  }
}
