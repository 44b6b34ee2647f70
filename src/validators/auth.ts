import { z } from 'zod';

export const registerSchema = z.object({
  username: z
    .string()
    .trim()
    .min(1, { message: 'Username is required' })
    .max(150)
    .regex(/^[\w.@+-]+$/, { message: 'Username may contain only letters, digits and @/./+/-/_' }),
  email: z.string().trim().email(),
  password: z.string().min(8, { message: 'Password must be at least 8 characters' }),
  password_confirm: z.string(),
});

export const loginSchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(1, { message: 'Password is required' }),
});

export const updateProfileSchema = z
  .object({
    username: registerSchema.shape.username.optional(),
  })
  .strict();
