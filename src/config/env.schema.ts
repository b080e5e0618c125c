import { z } from 'zod';

/** Telegram usernames: 5-32 chars, letter first. */
const USERNAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]{4,31}$/;

const integerString = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer');

/**
 * Environment variables read at startup. Unknown variables pass through
 * untouched so the rest of `process.env` stays available to ConfigService.
 */
export const EnvSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: z.string().min(1),
    ADMIN_USERNAME: z.string().regex(USERNAME_PATTERN),
    CHAT_LIST_SIZE: integerString.refine(
      value => {
        const size = Number.parseInt(value, 10);
        return size >= 1 && size <= 20;
      },
      { message: 'must be between 1 and 20' },
    ),
    REDIS_HOST: z.string().min(1).optional(),
    REDIS_PORT: integerString.optional(),
    REDIS_PASSWORD: z.string().optional(),
    ALBUM_WAIT_TIMEOUT_MS: integerString
      .refine(value => Number.parseInt(value, 10) > 0, {
        message: 'must be positive',
      })
      .optional(),
    PORT: integerString.optional(),
  })
  .passthrough();

export type Env = z.infer<typeof EnvSchema>;

/**
 * `validate` hook for ConfigModule. Throws with every failing variable listed
 * so startup stops before any connection is opened.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return result.data;
}
