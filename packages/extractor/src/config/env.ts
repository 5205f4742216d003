import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

export const envSchema = z.object({
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Acquisition
  ACQUIRE_TIMEOUT_MS: positiveInt.default(30000),
  RENDER_WAIT_MS: z.coerce.number().int().min(0).default(2000),
  DYNAMIC_ENABLED: booleanString.default('true'),
  REVEAL_PHONE: booleanString.default('true'),
  USER_AGENT: z.string().min(1).optional(),
  CHROMIUM_EXECUTABLE_PATH: z.string().min(1).optional(),

  // Link collection
  LINKS_MAX_PAGES: positiveInt.default(5),
  LINKS_DELAY_MS: z.coerce.number().int().min(0).default(1000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export interface ExtractorConfig {
  logLevel: EnvConfig['LOG_LEVEL'];
  acquireTimeoutMs: number;
  renderWaitMs: number;
  dynamicEnabled: boolean;
  revealPhone: boolean;
  userAgent?: string;
  chromiumExecutablePath?: string;
  linksMaxPages: number;
  linksDelayMs: number;
}

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map(err =>
      `${err.path.join('.')}: ${err.message}`
    ).join('\n');

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}

/**
 * Read the extractor settings from the environment.
 * Empty variables count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ExtractorConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = validateEnv(present);

  return {
    logLevel: parsed.LOG_LEVEL,
    acquireTimeoutMs: parsed.ACQUIRE_TIMEOUT_MS,
    renderWaitMs: parsed.RENDER_WAIT_MS,
    dynamicEnabled: parsed.DYNAMIC_ENABLED,
    revealPhone: parsed.REVEAL_PHONE,
    userAgent: parsed.USER_AGENT,
    chromiumExecutablePath: parsed.CHROMIUM_EXECUTABLE_PATH,
    linksMaxPages: parsed.LINKS_MAX_PAGES,
    linksDelayMs: parsed.LINKS_DELAY_MS,
  };
}
