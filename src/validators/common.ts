import { z } from 'zod';

export const idParamSchema = z.object({
  id: z.coerce.number().int().positive({ message: 'ID must be a positive integer' }),
});

export const messageParamSchema = idParamSchema.extend({
  messageId: z.coerce.number().int().positive({ message: 'Message ID must be a positive integer' }),
});

export const searchQuerySchema = z.object({
  search: z.string().trim().max(200).optional(),
});
