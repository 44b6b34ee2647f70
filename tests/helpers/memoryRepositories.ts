/**
 * In-memory repositories
 *
 * Stand-ins for the Supabase repositories with the same ownership rules:
 * every lookup is scoped to the owning user and deletes cascade the way the
 * SQL schema does.
 */

import { ConflictError } from '../../src/errors/appErrors';
import type { ChatPatch, ChatRepository, MessageDraft } from '../../src/repositories/chat.repository';
import type { NoteFields, NoteRepository } from '../../src/repositories/note.repository';
import type { TagRepository } from '../../src/repositories/tag.repository';
import type { NewUserProfile, UserRepository } from '../../src/repositories/user.repository';
import type { AddedMessage, Chat, ChatMessage } from '../../src/types/chat.types';
import type { Note, NoteFilters, Tag } from '../../src/types/note.types';
import type { UpdateProfileDto, User } from '../../src/types/user.types';

/** Monotonic clock so rows created in one test get distinct, ordered timestamps. */
class Clock {
  private tick = Date.parse('2026-01-01T00:00:00.000Z');

  now(): string {
    this.tick += 1000;
    return new Date(this.tick).toISOString();
  }
}

interface NoteRow extends Omit<Note, 'tags'> {
  tagIds: number[];
}

export class MemoryStore {
  readonly clock = new Clock();
  readonly users = new Map<string, User>();
  readonly tags = new Map<number, Tag>();
  readonly notes = new Map<number, NoteRow>();
  readonly chats = new Map<number, Chat>();
  readonly messages = new Map<number, ChatMessage>();
  private nextId = 1;

  id(): number {
    return this.nextId++;
  }
}

export class MemoryUserRepository implements UserRepository {
  constructor(private readonly store: MemoryStore) {}

  async findById(id: string): Promise<User | null> {
    return this.store.users.get(id) ?? null;
  }

  async create(profile: NewUserProfile): Promise<User> {
    for (const user of this.store.users.values()) {
      if (user.username === profile.username) {
        throw new ConflictError('A user with that username already exists');
      }
    }
    const now = this.store.clock.now();
    const user: User = { ...profile, created_at: now, updated_at: now };
    this.store.users.set(user.id, user);
    return user;
  }

  async update(id: string, patch: UpdateProfileDto): Promise<User | null> {
    const user = this.store.users.get(id);
    if (!user) return null;
    const updated: User = { ...user, ...patch, updated_at: this.store.clock.now() };
    this.store.users.set(id, updated);
    return updated;
  }
}

export class MemoryTagRepository implements TagRepository {
  constructor(private readonly store: MemoryStore) {}

  async list(userId: string): Promise<Tag[]> {
    return [...this.store.tags.values()]
      .filter((tag) => tag.user_id === userId)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async create(userId: string, name: string): Promise<Tag> {
    if (await this.findByName(name, userId)) {
      throw new ConflictError(`Tag "${name}" already exists`);
    }
    const tag: Tag = { id: this.store.id(), user_id: userId, name, created_at: this.store.clock.now() };
    this.store.tags.set(tag.id, tag);
    return tag;
  }

  async findOrCreate(userId: string, names: string[]): Promise<Tag[]> {
    const tags: Tag[] = [];
    for (const name of names) {
      tags.push((await this.findByName(name, userId)) ?? (await this.create(userId, name)));
    }
    return tags;
  }

  async delete(id: number, userId: string): Promise<boolean> {
    const tag = this.store.tags.get(id);
    if (!tag || tag.user_id !== userId) return false;
    this.store.tags.delete(id);
    for (const note of this.store.notes.values()) {
      note.tagIds = note.tagIds.filter((tagId) => tagId !== id);
    }
    return true;
  }

  private async findByName(name: string, userId: string): Promise<Tag | null> {
    return (await this.list(userId)).find((tag) => tag.name === name) ?? null;
  }
}

export class MemoryNoteRepository implements NoteRepository {
  constructor(private readonly store: MemoryStore) {}

  async create(userId: string, fields: Omit<NoteFields, 'summary'>): Promise<Note> {
    const now = this.store.clock.now();
    const row: NoteRow = {
      id: this.store.id(),
      user_id: userId,
      title: fields.title,
      content: fields.content,
      summary: null,
      tagIds: [],
      created_at: now,
      updated_at: now,
    };
    this.store.notes.set(row.id, row);
    return this.toNote(row);
  }

  async findById(id: number, userId: string): Promise<Note | null> {
    const row = this.store.notes.get(id);
    return row && row.user_id === userId ? this.toNote(row) : null;
  }

  async list(userId: string, filters: NoteFilters = {}): Promise<Note[]> {
    const search = filters.search?.toLowerCase();
    return [...this.store.notes.values()]
      .filter((row) => row.user_id === userId)
      .map((row) => this.toNote(row))
      .filter((note) => !search
        || note.title.toLowerCase().includes(search)
        || note.content.toLowerCase().includes(search))
      .filter((note) => !filters.tag || note.tags.some((tag) => tag.name === filters.tag))
      .sort((a, b) => b.created_at.localeCompare(a.created_at));
  }

  async update(id: number, userId: string, patch: Partial<NoteFields>): Promise<Note | null> {
    const row = this.store.notes.get(id);
    if (!row || row.user_id !== userId) return null;
    Object.assign(row, patch, { updated_at: this.store.clock.now() });
    return this.toNote(row);
  }

  async setSummary(id: number, userId: string, content: string, summary: string): Promise<Note | null> {
    const row = this.store.notes.get(id);
    if (!row || row.user_id !== userId || row.content !== content) return null;
    Object.assign(row, { summary, updated_at: this.store.clock.now() });
    return this.toNote(row);
  }

  async setTags(noteId: number, tagIds: number[]): Promise<void> {
    const row = this.store.notes.get(noteId);
    if (row) {
      row.tagIds = [...tagIds];
    }
  }

  async delete(id: number, userId: string): Promise<boolean> {
    const row = this.store.notes.get(id);
    if (!row || row.user_id !== userId) return false;
    this.store.notes.delete(id);
    return true;
  }

  private toNote(row: NoteRow): Note {
    const { tagIds, ...note } = row;
    const tags = tagIds
      .map((tagId) => this.store.tags.get(tagId))
      .filter((tag): tag is Tag => tag !== undefined)
      .sort((a, b) => a.name.localeCompare(b.name));
    return { ...note, tags };
  }
}

export class MemoryChatRepository implements ChatRepository {
  constructor(private readonly store: MemoryStore) {}

  async create(userId: string, title: string): Promise<Chat> {
    const now = this.store.clock.now();
    const chat: Chat = {
      id: this.store.id(),
      user_id: userId,
      title,
      summary: null,
      context_summary: null,
      message_count: 0,
      last_message_at: null,
      created_at: now,
      updated_at: now,
    };
    this.store.chats.set(chat.id, chat);
    return { ...chat };
  }

  async findById(id: number, userId: string): Promise<Chat | null> {
    const chat = this.store.chats.get(id);
    return chat && chat.user_id === userId ? { ...chat } : null;
  }

  async list(userId: string, search?: string): Promise<Chat[]> {
    const term = search?.toLowerCase();
    return [...this.store.chats.values()]
      .filter((chat) => chat.user_id === userId)
      .filter((chat) => !term
        || chat.title.toLowerCase().includes(term)
        || (chat.summary ?? '').toLowerCase().includes(term)
        || this.messagesOf(chat.id).some((m) => m.content.toLowerCase().includes(term)))
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .map((chat) => ({ ...chat }));
  }

  async update(id: number, userId: string, patch: ChatPatch): Promise<Chat | null> {
    const chat = this.store.chats.get(id);
    if (!chat || chat.user_id !== userId) return null;
    Object.assign(chat, patch, { updated_at: this.store.clock.now() });
    return { ...chat };
  }

  async delete(id: number, userId: string): Promise<boolean> {
    const chat = this.store.chats.get(id);
    if (!chat || chat.user_id !== userId) return false;
    this.store.chats.delete(id);
    for (const message of this.messagesOf(id)) {
      this.store.messages.delete(message.id);
    }
    return true;
  }

  async appendMessage(chatId: number, draft: MessageDraft): Promise<AddedMessage> {
    const chat = this.store.chats.get(chatId);
    if (!chat) {
      throw new Error(`chat ${chatId} does not exist`);
    }
    const now = this.store.clock.now();
    const message: ChatMessage = {
      id: this.store.id(),
      chat_id: chatId,
      role: draft.role,
      content: draft.content,
      summary: null,
      tokens_used: draft.tokens_used,
      created_at: now,
    };
    this.store.messages.set(message.id, message);
    chat.message_count += 1;
    chat.last_message_at = now;
    chat.updated_at = now;
    return { message: { ...message }, message_count: chat.message_count };
  }

  async listMessages(chatId: number): Promise<ChatMessage[]> {
    return this.messagesOf(chatId).map((message) => ({ ...message }));
  }

  async recentMessages(chatId: number, limit: number): Promise<ChatMessage[]> {
    return (await this.listMessages(chatId)).slice(-limit);
  }

  async findMessage(chatId: number, messageId: number): Promise<ChatMessage | null> {
    const message = this.store.messages.get(messageId);
    return message && message.chat_id === chatId ? { ...message } : null;
  }

  async updateMessageSummary(messageId: number, summary: string): Promise<ChatMessage> {
    const message = this.store.messages.get(messageId);
    if (!message) {
      throw new Error(`message ${messageId} does not exist`);
    }
    message.summary = summary;
    return { ...message };
  }

  private messagesOf(chatId: number): ChatMessage[] {
    return [...this.store.messages.values()]
      .filter((message) => message.chat_id === chatId)
      .sort((a, b) => a.created_at.localeCompare(b.created_at) || a.id - b.id);
  }
}
