import type { SupabaseClient } from '@supabase/supabase-js';
import type { Tag } from '../types/note.types';
import { databaseError } from './supabase';

export interface TagRepository {
  list(userId: string): Promise<Tag[]>;
  create(userId: string, name: string): Promise<Tag>;
  /** Returns a tag for every name, creating the ones the user does not have yet. */
  findOrCreate(userId: string, names: string[]): Promise<Tag[]>;
  delete(id: number, userId: string): Promise<boolean>;
}

export class SupabaseTagRepository implements TagRepository {
  constructor(private readonly db: SupabaseClient) {}

  async list(userId: string): Promise<Tag[]> {
    const { data, error } = await this.db
      .from('tags')
      .select('*')
      .eq('user_id', userId)
      .order('name', { ascending: true });

    if (error) {
      throw databaseError(error, 'Failed to fetch tags');
    }
    return data ?? [];
  }

  async create(userId: string, name: string): Promise<Tag> {
    const { data, error } = await this.db
      .from('tags')
      .insert({ user_id: userId, name })
      .select()
      .single();

    if (error || !data) {
      throw databaseError(error, 'Failed to create tag', `Tag "${name}" already exists`);
    }
    return data;
  }

  async findOrCreate(userId: string, names: string[]): Promise<Tag[]> {
    if (names.length === 0) {
      return [];
    }

    const { data, error } = await this.db
      .from('tags')
      .upsert(
        names.map((name) => ({ user_id: userId, name })),
        { onConflict: 'user_id,name', ignoreDuplicates: false }
      )
      .select();

    if (error) {
      throw databaseError(error, 'Failed to save tags');
    }
    return data ?? [];
  }

  async delete(id: number, userId: string): Promise<boolean> {
    const { data, error } = await this.db
      .from('tags')
      .delete()
      .eq('id', id)
      .eq('user_id', userId)
      .select('id');

    if (error) {
      throw databaseError(error, 'Failed to delete tag');
    }
    return (data ?? []).length > 0;
  }
}
