import { z } from 'zod';

export class ConfigValidationError extends Error {
  constructor(
    public section: string,
    public issues: z.ZodIssue[],
  ) {
    super(
      `Invalid ${section} configuration: ${issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ')}`,
    );
    this.name = 'ConfigValidationError';
  }
}

const booleanString = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultValue;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });

const integerString = (defaultValue: number, min: number) =>
  z.coerce.number().int().min(min).default(defaultValue);

const RuntimeConfigSchema = z.object({
  openai: z.object({
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).default('gpt-4o'),
    baseUrl: z.string().url().optional(),
  }),
  browser: z.object({
    headless: booleanString(true),
    navigationTimeoutMs: integerString(30_000, 1),
  }),
  orchestrator: z.object({
    pageSettleMs: integerString(2_000, 0),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Read the runtime configuration from environment variables.
 * Throws ConfigValidationError with every offending variable listed.
 */
export function parseRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const result = RuntimeConfigSchema.safeParse({
    openai: {
      apiKey: emptyToUndefined(env.OPENAI_API_KEY),
      model: emptyToUndefined(env.OPENAI_MODEL),
      baseUrl: emptyToUndefined(env.OPENAI_BASE_URL),
    },
    browser: {
      headless: env.BROWSER_HEADLESS,
      navigationTimeoutMs: emptyToUndefined(env.NAVIGATION_TIMEOUT_MS),
    },
    orchestrator: {
      pageSettleMs: emptyToUndefined(env.PAGE_SETTLE_MS),
    },
    logLevel: emptyToUndefined(env.LOG_LEVEL),
  });

  if (!result.success) {
    throw new ConfigValidationError('runtime', result.error.issues);
  }
  return result.data;
}
