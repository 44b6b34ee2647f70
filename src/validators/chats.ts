import { z } from 'zod';

export const createChatSchema = z.object({
  title: z.string().max(200).optional(),
});

export const renameChatSchema = z.object({
  title: z.string().trim().min(1, { message: 'Title cannot be empty' }).max(200),
});

export const addMessageSchema = z.object({
  role: z.enum(['user', 'assistant', 'system']),
  content: z.string().refine((value) => value.trim().length > 0, { message: 'Message content cannot be empty' }),
});

export const aiResponseSchema = z.object({
  message: z.string().refine((value) => value.trim().length > 0, { message: 'Message cannot be empty' }),
  use_context: z.boolean().optional().default(true),
});

export const contextQuerySchema = z.object({
  message: z.string().optional(),
});
