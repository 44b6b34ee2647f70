import type { SupabaseClient } from '@supabase/supabase-js';
import type { Note, NoteFilters, Tag } from '../types/note.types';
import { databaseError, sanitizeSearch } from './supabase';

export interface NoteFields {
  title: string;
  content: string;
  summary: string | null;
}

export interface NoteRepository {
  create(userId: string, fields: Omit<NoteFields, 'summary'>): Promise<Note>;
  findById(id: number, userId: string): Promise<Note | null>;
  list(userId: string, filters?: NoteFilters): Promise<Note[]>;
  update(id: number, userId: string, patch: Partial<NoteFields>): Promise<Note | null>;
  /**
   * Stores `summary` only while the note still holds `content`. Resolves to
   * null when the note is gone or its content has changed since.
   */
  setSummary(id: number, userId: string, content: string, summary: string): Promise<Note | null>;
  /** Replaces the note's tag set. */
  setTags(noteId: number, tagIds: number[]): Promise<void>;
  delete(id: number, userId: string): Promise<boolean>;
}

interface NoteRow extends Omit<Note, 'tags'> {
  tags: Tag[] | null;
}

const NOTE_COLUMNS = '*, tags(id, user_id, name, created_at)';

function toNote(row: NoteRow): Note {
  const tags = [...(row.tags ?? [])].sort((a, b) => a.name.localeCompare(b.name));
  return { ...row, tags };
}

export class SupabaseNoteRepository implements NoteRepository {
  constructor(private readonly db: SupabaseClient) {}

  async create(userId: string, fields: Omit<NoteFields, 'summary'>): Promise<Note> {
    const { data, error } = await this.db
      .from('notes')
      .insert({ user_id: userId, title: fields.title, content: fields.content })
      .select(NOTE_COLUMNS)
      .single();

    if (error || !data) {
      throw databaseError(error, 'Failed to create note');
    }
    return toNote(data);
  }

  async findById(id: number, userId: string): Promise<Note | null> {
    const { data, error } = await this.db
      .from('notes')
      .select(NOTE_COLUMNS)
      .eq('id', id)
      .eq('user_id', userId)
      .maybeSingle();

    if (error) {
      throw databaseError(error, 'Failed to fetch note');
    }
    return data ? toNote(data) : null;
  }

  async list(userId: string, filters: NoteFilters = {}): Promise<Note[]> {
    let query = this.db
      .from('notes')
      .select(NOTE_COLUMNS)
      .eq('user_id', userId)
      .order('created_at', { ascending: false });

    if (filters.search) {
      const term = sanitizeSearch(filters.search);
      if (term) {
        query = query.or(`title.ilike.%${term}%,content.ilike.%${term}%`);
      }
    }

    if (filters.tag) {
      const noteIds = await this.noteIdsForTag(userId, filters.tag);
      if (noteIds.length === 0) {
        return [];
      }
      query = query.in('id', noteIds);
    }

    const { data, error } = await query;

    if (error) {
      throw databaseError(error, 'Failed to fetch notes');
    }
    return (data ?? []).map(toNote);
  }

  async update(id: number, userId: string, patch: Partial<NoteFields>): Promise<Note | null> {
    const { data, error } = await this.db
      .from('notes')
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq('id', id)
      .eq('user_id', userId)
      .select(NOTE_COLUMNS)
      .maybeSingle();

    if (error) {
      throw databaseError(error, 'Failed to update note');
    }
    return data ? toNote(data) : null;
  }

  async setSummary(id: number, userId: string, content: string, summary: string): Promise<Note | null> {
    const { data, error } = await this.db
      .from('notes')
      .update({ summary, updated_at: new Date().toISOString() })
      .eq('id', id)
      .eq('user_id', userId)
      .eq('content', content)
      .select(NOTE_COLUMNS)
      .maybeSingle();

    if (error) {
      throw databaseError(error, 'Failed to save note summary');
    }
    return data ? toNote(data) : null;
  }

  async setTags(noteId: number, tagIds: number[]): Promise<void> {
    const { error: clearError } = await this.db.from('note_tags').delete().eq('note_id', noteId);
    if (clearError) {
      throw databaseError(clearError, 'Failed to update note tags');
    }

    if (tagIds.length === 0) {
      return;
    }

    const { error } = await this.db
      .from('note_tags')
      .insert(tagIds.map((tagId) => ({ note_id: noteId, tag_id: tagId })));

    if (error) {
      throw databaseError(error, 'Failed to update note tags');
    }
  }

  async delete(id: number, userId: string): Promise<boolean> {
    const { data, error } = await this.db
      .from('notes')
      .delete()
      .eq('id', id)
      .eq('user_id', userId)
      .select('id');

    if (error) {
      throw databaseError(error, 'Failed to delete note');
    }
    return (data ?? []).length > 0;
  }

  private async noteIdsForTag(userId: string, tagName: string): Promise<number[]> {
    const { data, error } = await this.db
      .from('note_tags')
      .select('note_id, tags!inner(name, user_id)')
      .eq('tags.name', tagName)
      .eq('tags.user_id', userId);

    if (error) {
      throw databaseError(error, 'Failed to filter notes by tag');
    }
    return (data ?? []).map((row: { note_id: number }) => row.note_id);
  }
}
