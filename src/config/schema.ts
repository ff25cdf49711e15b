import { z } from 'zod';

export const ProfileSchema = z.object({
  name: z.string(),
  email: z.string()
});

export const ProfileSetSchema = z.record(z.string(), ProfileSchema);

export type Profile = z.infer<typeof ProfileSchema>;
export type ProfileSet = z.infer<typeof ProfileSetSchema>;

export type Scope = 'local' | 'global';

export const DEFAULT_PROFILES: ProfileSet = {
  work: {
    name: 'Your Work Name',
    email: 'you@work.com'
  },
  personal: {
    name: 'Your Personal Name',
    email: 'you@personal.com'
  }
};

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

export const SettingsSchema = z.object({
  configDir: optionalText,
  gitBinary: optionalText.transform((value) => value ?? 'git'),
  verbose: z.coerce.number().int().min(0).max(3).default(0),
  logFile: optionalText
}).strict();

export type Settings = z.infer<typeof SettingsSchema>;

export const SETTINGS_ENV = {
  configDir: 'GIT_USR_CONFIG_DIR',
  gitBinary: 'GIT_USR_GIT',
  verbose: 'GIT_USR_VERBOSE',
  logFile: 'GIT_USR_LOG_FILE'
} as const satisfies Record<keyof Settings, string>;
