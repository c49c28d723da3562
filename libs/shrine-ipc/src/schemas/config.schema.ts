/**
 * Zod schemas for the per-shrine configuration map
 *
 * The config is stored inside the encrypted payload next to the secrets.
 */

import { z } from 'zod';
import { ValidationError } from '../errors.js';

export const CONFIG_KEYS = {
  GIT_ENABLED: 'git.enabled',
  GIT_COMMIT_AUTO: 'git.commit.auto',
  GIT_PUSH_AUTO: 'git.push.auto',
} as const;

const BOOLEAN_KEYS: ReadonlySet<string> = new Set(Object.values(CONFIG_KEYS));

const configKeySchema = z
  .string()
  .min(1, 'Config key must not be empty')
  .regex(/^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/, 'Config key must be dot-separated words');

export const ConfigValueSchema = z.union([z.boolean(), z.string()]);

export const ShrineConfigSchema = z.record(configKeySchema, ConfigValueSchema);

export const GitSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  commitAuto: z.boolean().default(true),
  pushAuto: z.boolean().default(false),
});

export type ConfigValue = z.infer<typeof ConfigValueSchema>;
export type ShrineConfig = z.infer<typeof ShrineConfigSchema>;
export type GitSettings = z.output<typeof GitSettingsSchema>;

/**
 * Read the git options out of a config map, applying defaults.
 */
export function resolveGitSettings(config: ShrineConfig): GitSettings {
  const flag = (key: string): boolean | undefined => {
    const value = config[key];
    return typeof value === 'boolean' ? value : undefined;
  };

  return GitSettingsSchema.parse({
    enabled: flag(CONFIG_KEYS.GIT_ENABLED),
    commitAuto: flag(CONFIG_KEYS.GIT_COMMIT_AUTO),
    pushAuto: flag(CONFIG_KEYS.GIT_PUSH_AUTO),
  });
}

/**
 * Config written by `init --git`.
 */
export function gitEnabledConfig(): ShrineConfig {
  return {
    [CONFIG_KEYS.GIT_ENABLED]: true,
    [CONFIG_KEYS.GIT_COMMIT_AUTO]: true,
    [CONFIG_KEYS.GIT_PUSH_AUTO]: false,
  };
}

/**
 * Turn a command-line value into a config value. `true`/`false` become
 * booleans; the git options accept nothing else.
 */
export function parseConfigValue(key: string, raw: string): ConfigValue {
  const parsedKey = configKeySchema.safeParse(key);
  if (!parsedKey.success) {
    throw new ValidationError(`Invalid config key "${key}"`, parsedKey.error.issues);
  }

  if (raw === 'true') return true;
  if (raw === 'false') return false;

  if (BOOLEAN_KEYS.has(key)) {
    throw new ValidationError(`Config key "${key}" expects true or false, got "${raw}"`);
  }

  return raw;
}
