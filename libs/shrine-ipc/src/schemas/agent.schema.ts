/**
 * Zod schemas for agent request params
 */

import { z } from 'zod';

export const SecretModeSchema = z.enum(['text', 'binary']);

export const SecretPathSchema = z.string().min(1, 'Secret path must not be empty');

export const EmptyParamsSchema = z.object({}).passthrough();

export const UnlockParamsSchema = z.object({
  password: z.string().min(1, 'Password must not be empty'),
});

export const GetParamsSchema = z.object({
  path: SecretPathSchema,
});

export const SetParamsSchema = z.object({
  path: SecretPathSchema,
  /** base64-encoded value */
  value: z.string().refine((v) => /^[A-Za-z0-9+/]*={0,2}$/.test(v), 'Value must be base64'),
  mode: SecretModeSchema.default('text'),
});

export const RemoveParamsSchema = z.object({
  path: SecretPathSchema,
});

export const ListParamsSchema = z.object({
  pattern: z.string().optional(),
});

export type UnlockParams = z.infer<typeof UnlockParamsSchema>;
export type GetParams = z.infer<typeof GetParamsSchema>;
export type SetParams = z.output<typeof SetParamsSchema>;
export type RemoveParams = z.infer<typeof RemoveParamsSchema>;
export type ListParams = z.infer<typeof ListParamsSchema>;
