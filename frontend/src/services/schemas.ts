import { z } from 'zod';

export const evidenceItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(''),
  html: z.string(),
  kind: z.enum(['text', 'diagram']).default('text'),
  source: z
    .object({
      url: z.string().min(1),
      page: z.number().int().positive().optional(),
      name: z.string().optional(),
    })
    .optional(),
});

export const chatAnswerSchema = z.object({
  answer: z.string(),
  evidence: z.array(evidenceItemSchema).default([]),
});

export const sessionUserSchema = z.object({
  userId: z.string().min(1),
  username: z.string(),
  fullName: z.string(),
  email: z.string().optional(),
  unit: z.string().optional(),
  roleId: z.string().optional(),
});

export const sessionCheckSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('DEV_MODE'), user: sessionUserSchema }),
  z.object({ status: z.literal('NO_TOKEN'), message: z.string() }),
  z.object({ status: z.literal('SUCCESS'), user: sessionUserSchema }),
  z.object({ status: z.literal('FAILED'), message: z.string() }),
]);

export type SessionUser = z.infer<typeof sessionUserSchema>;
export type SessionCheck = z.infer<typeof sessionCheckSchema>;
