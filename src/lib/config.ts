import { z } from 'zod';

export const DEFAULT_API_BASE_URL = 'https://api.clockify.me/api/v1';

export const preferencesSchema = z.object({
  apiKey: z.string().default(''),
  workspaceId: z.string().default(''),
  userId: z.string().default(''),
  hourlyRate: z.coerce.number().min(0, 'Hourly rate must not be negative').default(25),

  // Display options
  showBillable: z.boolean().default(true),
  showElapsedTime: z.boolean().default(true),
  showProjectName: z.boolean().default(true),
  showTaskName: z.boolean().default(true),
  showClientName: z.boolean().default(true),
  showTopbarTimer: z.boolean().default(true),
  showLastSession: z.boolean().default(true),

  apiBaseUrl: z.string().url().default(DEFAULT_API_BASE_URL),
  requestTimeoutMs: z.coerce.number().int().positive().default(10000),
});

export type Preferences = z.infer<typeof preferencesSchema>;

export const defaultPreferences: Preferences = preferencesSchema.parse({});

const ENV_KEYS = {
  apiKey: 'CLOCKIFY_API_KEY',
  workspaceId: 'CLOCKIFY_WORKSPACE_ID',
  userId: 'CLOCKIFY_USER_ID',
  hourlyRate: 'CLOCKIFY_HOURLY_RATE',
  apiBaseUrl: 'CLOCKIFY_API_URL',
  requestTimeoutMs: 'CLOCKIFY_TIMEOUT_MS',
} as const satisfies Partial<Record<keyof Preferences, string>>;

function collectEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const raw: Record<string, string> = {};
  for (const [field, variable] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value.trim() !== '') {
      raw[field] = value.trim();
    }
  }
  return raw;
}

/**
 * Собирает настройки из переменных окружения.
 * Пустые переменные игнорируются, чтобы сработали значения по умолчанию.
 */
export function loadPreferencesFromEnv(env: NodeJS.ProcessEnv = process.env): Preferences {
  return preferencesSchema.parse(collectEnv(env));
}

/** Only the fields the environment actually sets; applied over stored preferences. */
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): Partial<Preferences> {
  return preferencesSchema.partial().parse(collectEnv(env));
}
