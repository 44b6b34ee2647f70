import { AuthError, NotFoundError, ValidationError, errorMessage } from '../errors/appErrors';
import type { UserRepository } from '../repositories/user.repository';
import type { CreateUserDto, LoginDto, LoginResult, UpdateProfileDto, User } from '../types/user.types';
import { logger } from '../utils/logger';
import type { AuthProvider } from './auth.provider';

export interface AuthUser {
  id: string;
  email: string;
  username: string;
}

export interface TokenVerifier {
  verifyToken(token: string): Promise<AuthUser>;
}

export class AuthService implements TokenVerifier {
  constructor(
    private readonly provider: AuthProvider,
    private readonly users: UserRepository
  ) {}

  async register(userData: CreateUserDto): Promise<User> {
    if (userData.password !== userData.password_confirm) {
      throw new ValidationError("Password fields didn't match.", { password: ["Password fields didn't match."] });
    }

    const identity = await this.provider.signUp(userData.email, userData.password);

    try {
      const user = await this.users.create({
        id: identity.id,
        email: identity.email,
        username: userData.username,
      });
      logger.info('User registered', { userId: user.id });
      return user;
    } catch (error) {
      // An auth account without a profile cannot log in.
      try {
        await this.provider.remove(identity.id);
      } catch (cleanupError) {
        logger.error('Failed to delete auth user after registration failure', {
          userId: identity.id,
          error: errorMessage(cleanupError),
        });
      }
      throw error;
    }
  }

  async login(credentials: LoginDto): Promise<LoginResult> {
    const session = await this.provider.signIn(credentials.email, credentials.password);
    if (!session) {
      throw new AuthError('No active account found with the given credentials');
    }

    const user = await this.users.findById(session.identity.id);
    if (!user) {
      throw new AuthError('No active account found with the given credentials');
    }

    return { access: session.accessToken, user };
  }

  async verifyToken(token: string): Promise<AuthUser> {
    const identity = await this.provider.verify(token);
    if (!identity) {
      throw new AuthError('Invalid or expired token');
    }

    const user = await this.users.findById(identity.id);
    if (!user) {
      throw new AuthError('User profile not found');
    }

    return { id: user.id, email: user.email, username: user.username };
  }

  async getProfile(userId: string): Promise<User> {
    const user = await this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User');
    }
    return user;
  }

  async updateProfile(userId: string, updates: UpdateProfileDto): Promise<User> {
    const user = await this.users.update(userId, updates);
    if (!user) {
      throw new NotFoundError('User');
    }
    return user;
  }
}
