import type { SupabaseClient } from '@supabase/supabase-js';
import type { UpdateProfileDto, User } from '../types/user.types';
import { databaseError } from './supabase';

export interface NewUserProfile {
  id: string;
  email: string;
  username: string;
}

export interface UserRepository {
  findById(id: string): Promise<User | null>;
  create(profile: NewUserProfile): Promise<User>;
  update(id: string, patch: UpdateProfileDto): Promise<User | null>;
}

export class SupabaseUserRepository implements UserRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(id: string): Promise<User | null> {
    const { data, error } = await this.db.from('users').select('*').eq('id', id).maybeSingle();

    if (error) {
      throw databaseError(error, 'Failed to fetch user');
    }
    return data;
  }

  async create(profile: NewUserProfile): Promise<User> {
    const { data, error } = await this.db
      .from('users')
      .insert({ id: profile.id, email: profile.email, username: profile.username })
      .select()
      .single();

    if (error || !data) {
      throw databaseError(error, 'Failed to create user profile', 'A user with that username already exists');
    }
    return data;
  }

  async update(id: string, patch: UpdateProfileDto): Promise<User | null> {
    const { data, error } = await this.db
      .from('users')
      .update({ ...patch, updated_at: new Date().toISOString() })
      .eq('id', id)
      .select()
      .maybeSingle();

    if (error) {
      throw databaseError(error, 'Failed to update profile', 'A user with that username already exists');
    }
    return data;
  }
}
