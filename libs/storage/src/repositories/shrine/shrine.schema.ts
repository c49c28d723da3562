/**
 * Shrine schemas: Zod validation schemas and derived types
 */

import { z } from 'zod';
import { SecretModeSchema } from '@shrine/ipc';
import { ENCRYPTION_ALGORITHMS } from '../../crypto.js';

export const EncryptionAlgorithmSchema = z.enum(ENCRYPTION_ALGORITHMS);

// ---- Init ----

export const InitShrineSchema = z
  .object({
    /** Required unless `encryption` is `none` */
    password: z.string().min(1, 'Password must not be empty').optional(),
    encryption: EncryptionAlgorithmSchema.default('aes-256-gcm'),
    force: z.boolean().default(false),
    git: z.boolean().default(false),
    iterations: z.number().int().positive().optional(),
  })
  .refine((data) => data.encryption === 'none' || data.password !== undefined, {
    message: 'Password must not be empty',
    path: ['password'],
  });
export type InitShrineInput = z.input<typeof InitShrineSchema>;

// ---- Import ----

export const ImportSecretsSchema = z.object({
  content: z.string(),
  prefix: z.string().default(''),
});
export type ImportSecretsInput = z.input<typeof ImportSecretsSchema>;

// ---- Set ----

export const SetSecretModeSchema = SecretModeSchema.default('text');
