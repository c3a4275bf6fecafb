import { z } from 'zod';

/**
 * Session validation request; a missing token is a valid request (NO_TOKEN)
 */
export const sessionValidateSchema = z.object({
  token: z
    .string()
    .trim()
    .max(4096, 'Token is too long')
    .optional()
    .transform((token) => (token ? token : undefined))
});

export type SessionValidateInput = z.infer<typeof sessionValidateSchema>;

/**
 * Chat message forwarded to the hosting QA service
 */
export const chatMessageSchema = z.object({
  message: z
    .string()
    .trim()
    .min(1, 'Message is required')
    .max(5000, 'Message must be less than 5000 characters'),
  conversationId: z.string().min(1).max(200).optional()
});

export type ChatMessageInput = z.infer<typeof chatMessageSchema>;

// SIPADU sends ids as numbers or strings depending on the deployment
const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

/**
 * Successful answer of GET /api/validate-token
 */
export const sipaduValidSchema = z.object({
  status: z.literal(true),
  user_id: idSchema,
  username: z.string(),
  nama_lengkap: z.string().optional().default(''),
  email: z.string().nullish(),
  unit_kerja: z.string().nullish(),
  user_id_role: idSchema.nullish()
});

export const sipaduRejectedSchema = z.object({
  status: z.literal(false),
  message: z.string().optional()
});

export const sipaduResponseSchema = z.union([sipaduValidSchema, sipaduRejectedSchema]);

export type SipaduResponse = z.infer<typeof sipaduResponseSchema>;

/**
 * One retrieved evidence item as rendered by the overlay
 */
export const evidenceItemSchema = z.object({
  id: z.string().min(1),
  title: z.string().default(''),
  html: z.string(),
  kind: z.enum(['text', 'diagram']).default('text'),
  source: z
    .object({
      url: z.string().min(1),
      page: z.number().int().positive().optional(),
      name: z.string().optional()
    })
    .optional()
});

export const qaAnswerSchema = z.object({
  answer: z.string(),
  evidence: z.array(evidenceItemSchema).default([])
});

export type EvidenceItem = z.infer<typeof evidenceItemSchema>;
export type QaAnswer = z.infer<typeof qaAnswerSchema>;
