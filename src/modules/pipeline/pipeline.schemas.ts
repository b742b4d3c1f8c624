import { z } from 'zod';

const idSchema = z.union([z.string().min(1), z.number().int()]).transform(String);

export const messageBodySchema = z.object({
  chatId: idSchema,
  messageId: idSchema,
  text: z.string().optional(),
  caption: z.string().optional(),
  document: z.object({ fileName: z.string().optional() }).optional(),
  video: z.object({ fileName: z.string().optional() }).optional(),
  photo: z.boolean().optional(),
});

export type MessageBody = z.input<typeof messageBodySchema>;

export const queryBodySchema = z.object({
  raw: z.string().min(1, 'Query text is required').max(1000),
  source: z.enum(['text', 'filename', 'caption']).default('text'),
  year: z.number().int().optional(),
});

export type QueryBody = z.input<typeof queryBodySchema>;

export const selectionBodySchema = z.object({
  candidateId: idSchema,
});

export type SelectionBody = z.input<typeof selectionBodySchema>;
