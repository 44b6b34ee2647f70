import { NotFoundError, ValidationError } from '../errors/appErrors';
import type { TagRepository } from '../repositories/tag.repository';
import type { Tag } from '../types/note.types';

export const MAX_TAG_LENGTH = 50;

/** Trims, drops blanks and removes duplicates while keeping first-seen order. */
export function normalizeTagNames(names: string[]): string[] {
  const seen = new Set<string>();
  for (const name of names) {
    const trimmed = name.trim();
    if (!trimmed) continue;
    if (trimmed.length > MAX_TAG_LENGTH) {
      throw new ValidationError(`Tag names must be at most ${MAX_TAG_LENGTH} characters`, { tag: trimmed });
    }
    seen.add(trimmed);
  }
  return [...seen];
}

export class TagService {
  constructor(private readonly tags: TagRepository) {}

  async getTags(userId: string): Promise<Tag[]> {
    return this.tags.list(userId);
  }

  async createTag(userId: string, name: string): Promise<Tag> {
    const [normalized] = normalizeTagNames([name]);
    if (!normalized) {
      throw new ValidationError('Tag name cannot be empty');
    }
    return this.tags.create(userId, normalized);
  }

  /** Detaches the tag from every note; the notes themselves stay. */
  async deleteTag(tagId: number, userId: string): Promise<void> {
    const deleted = await this.tags.delete(tagId, userId);
    if (!deleted) {
      throw new NotFoundError('Tag');
    }
  }
}
