import type { SupabaseClient } from '@supabase/supabase-js';
import { ValidationError, createError } from '../errors/appErrors';
import { logger } from '../utils/logger';

export interface AuthIdentity {
  id: string;
  email: string;
}

export interface AuthSession {
  identity: AuthIdentity;
  accessToken: string;
}

/** Token issuance and verification, delegated to an identity service. */
export interface AuthProvider {
  signUp(email: string, password: string): Promise<AuthIdentity>;
  /** Resolves to null when the credentials are wrong. */
  signIn(email: string, password: string): Promise<AuthSession | null>;
  /** Resolves to null when the token is invalid or expired. */
  verify(token: string): Promise<AuthIdentity | null>;
  remove(userId: string): Promise<void>;
}

export class SupabaseAuthProvider implements AuthProvider {
  constructor(
    private readonly admin: SupabaseClient,
    private readonly anon: SupabaseClient
  ) {}

  async signUp(email: string, password: string): Promise<AuthIdentity> {
    const { data, error } = await this.admin.auth.admin.createUser({
      email,
      password,
      email_confirm: true,
    });

    if (error || !data.user) {
      logger.warn('Auth user creation failed', { email, error: error?.message });
      throw new ValidationError(error?.message || 'Registration failed');
    }

    return { id: data.user.id, email: data.user.email ?? email };
  }

  async signIn(email: string, password: string): Promise<AuthSession | null> {
    const { data, error } = await this.anon.auth.signInWithPassword({ email, password });

    if (error || !data.session || !data.user) {
      return null;
    }

    return {
      identity: { id: data.user.id, email: data.user.email ?? email },
      accessToken: data.session.access_token,
    };
  }

  async verify(token: string): Promise<AuthIdentity | null> {
    const { data, error } = await this.admin.auth.getUser(token);

    if (error || !data.user) {
      return null;
    }

    return { id: data.user.id, email: data.user.email ?? '' };
  }

  async remove(userId: string): Promise<void> {
    const { error } = await this.admin.auth.admin.deleteUser(userId);
    if (error) {
      throw createError(`Failed to delete auth user: ${error.message}`, 500);
    }
  }
}
