// config/settings.ts
import { z } from 'zod';

export const LogLevelName = z
  .string()
  .trim()
  .toLowerCase()
  .transform((val) => (val === 'warning' ? 'warn' : val))
  .pipe(z.enum(['debug', 'info', 'warn', 'error']));

export type LogLevelName = z.infer<typeof LogLevelName>;

const SettingsSchema = z.object({
  LOG_LEVEL: LogLevelName.default('info'),
});

export type Settings = {
  logLevel: LogLevelName;
};

type Env = Record<string, string | undefined>;

export function loadSettings(env: Env = process.env): Settings {
  const result = SettingsSchema.safeParse({
    // an empty variable counts as unset
    LOG_LEVEL: env.LOG_LEVEL || undefined,
  });
  if (!result.success) {
    throw new Error(`Invalid environment configuration:\n${z.prettifyError(result.error)}`);
  }
  return { logLevel: result.data.LOG_LEVEL };
}
