import { ConflictError, NotFoundError, ValidationError, errorMessage } from '../errors/appErrors';
import type { NoteFields, NoteRepository } from '../repositories/note.repository';
import type { TagRepository } from '../repositories/tag.repository';
import type {
  CreateNoteDto,
  CreatedNote,
  Note,
  NoteFilters,
  NoteSummary,
  SummaryStatus,
  UpdateNoteDto,
} from '../types/note.types';
import { logger } from '../utils/logger';
import { isBlank } from '../utils/text';
import type { OpenAIService } from './openai.service';
import { normalizeTagNames } from './tag.service';

export const NOTE_SUMMARY_WORDS = 150;

export class NoteService {
  constructor(
    private readonly notes: NoteRepository,
    private readonly tags: TagRepository,
    private readonly ai: OpenAIService
  ) {}

  /**
   * Creates a note and, unless `auto_summarize` is false, attaches a summary.
   * A summary that cannot be produced never fails the request: the note is
   * kept without one and `summary_status` says so.
   */
  async createNote(userId: string, data: CreateNoteDto): Promise<CreatedNote> {
    if (isBlank(data.title)) {
      throw new ValidationError('Title cannot be empty', { title: ['Title cannot be empty'] });
    }
    if (isBlank(data.content)) {
      throw new ValidationError('Content cannot be empty', { content: ['Content cannot be empty'] });
    }

    let note = await this.notes.create(userId, { title: data.title.trim(), content: data.content });

    if (data.tags) {
      note = await this.replaceTags(note, userId, data.tags);
    }

    if (data.auto_summarize === false) {
      return { ...note, summary_status: 'skipped' };
    }

    let status: SummaryStatus;
    try {
      const result = await this.ai.summarize(note.content, NOTE_SUMMARY_WORDS, { onFailure: 'absorb' });
      const updated = await this.notes.setSummary(note.id, userId, note.content, result.summary);
      if (updated) {
        note = updated;
        status = result.source === 'model' ? 'generated' : result.source;
      } else {
        logger.warn('Note changed before its summary was stored', { noteId: note.id });
        note = (await this.notes.findById(note.id, userId)) ?? note;
        status = 'failed';
      }
    } catch (error) {
      logger.warn('Failed to auto-summarize note', { noteId: note.id, error: errorMessage(error) });
      status = 'failed';
    }

    return { ...note, summary_status: status };
  }

  async getNotes(userId: string, filters: NoteFilters = {}): Promise<Note[]> {
    return this.notes.list(userId, filters);
  }

  async getNote(noteId: number, userId: string): Promise<Note> {
    const note = await this.notes.findById(noteId, userId);
    if (!note) {
      throw new NotFoundError('Note');
    }
    return note;
  }

  /**
   * Applies a partial update. A changed `content` clears the summary, since
   * the stored one would describe the old text.
   */
  async updateNote(noteId: number, userId: string, data: UpdateNoteDto): Promise<Note> {
    const existing = await this.getNote(noteId, userId);
    const patch: Partial<NoteFields> = {};

    if (data.title !== undefined) {
      if (isBlank(data.title)) {
        throw new ValidationError('Title cannot be empty', { title: ['Title cannot be empty'] });
      }
      patch.title = data.title.trim();
    }

    if (data.content !== undefined) {
      if (isBlank(data.content)) {
        throw new ValidationError('Content cannot be empty', { content: ['Content cannot be empty'] });
      }
      if (data.content !== existing.content) {
        patch.content = data.content;
        patch.summary = null;
      }
    }

    let note = existing;
    if (Object.keys(patch).length > 0) {
      const updated = await this.notes.update(noteId, userId, patch);
      if (!updated) {
        throw new NotFoundError('Note');
      }
      note = updated;
      if (patch.content !== undefined) {
        logger.info('Note content changed, summary cleared', { noteId });
      }
    }

    if (data.tags !== undefined) {
      note = await this.replaceTags(note, userId, data.tags);
    }

    return note;
  }

  async deleteNote(noteId: number, userId: string): Promise<void> {
    const deleted = await this.notes.delete(noteId, userId);
    if (!deleted) {
      throw new NotFoundError('Note');
    }
  }

  /**
   * Regenerates the summary on request. Failures surface as
   * `AIServiceUnavailableError` and leave the stored summary as it was. A
   * summary of content that was edited in the meantime is discarded.
   */
  async summarizeNote(noteId: number, userId: string): Promise<NoteSummary> {
    const note = await this.getNote(noteId, userId);

    const { summary } = await this.ai.summarize(note.content, NOTE_SUMMARY_WORDS, { onFailure: 'propagate' });

    const updated = await this.notes.setSummary(noteId, userId, note.content, summary);
    if (!updated) {
      throw new ConflictError('Note content changed while the summary was being generated');
    }

    logger.info('Summary generated for note', { noteId });
    return { summary, model: this.ai.model };
  }

  private async replaceTags(note: Note, userId: string, names: string[]): Promise<Note> {
    const tags = await this.tags.findOrCreate(userId, normalizeTagNames(names));
    await this.notes.setTags(note.id, tags.map((tag) => tag.id));
    return (await this.notes.findById(note.id, userId)) ?? note;
  }
}
