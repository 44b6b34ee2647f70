/**
 * Note and tag request schemas
 */

import { z } from 'zod';

const title = z.string().trim().min(1, { message: 'Title cannot be empty' }).max(200);
const content = z.string().refine((value) => value.trim().length > 0, { message: 'Content cannot be empty' });
const tagNames = z.array(z.string().max(50)).max(50);

/**
 * POST /api/notes
 */
export const createNoteSchema = z.object({
  title,
  content,
  tags: tagNames.optional(),
  auto_summarize: z.boolean().optional().default(true),
});

/**
 * PUT /api/notes/:id
 */
export const replaceNoteSchema = z.object({
  title,
  content,
  tags: tagNames.optional(),
});

/**
 * PATCH /api/notes/:id
 */
export const patchNoteSchema = replaceNoteSchema.partial();

export const noteListQuerySchema = z.object({
  search: z.string().trim().max(200).optional(),
  tag: z.string().trim().max(50).optional(),
});

/**
 * POST /api/tags
 */
export const createTagSchema = z.object({
  name: z.string().trim().min(1, { message: 'Tag name cannot be empty' }).max(50),
});

