import { z } from 'zod';

export const tokenBodySchema = z.object({
  password: z.string().min(1, 'Password is required'),
});

export type TokenBody = z.infer<typeof tokenBodySchema>;
