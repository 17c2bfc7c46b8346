import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://api.openai.com/v1/chat/completions';
export const DEFAULT_MODEL = 'gpt-4o';

function integer(defaultValue: string, min: number) {
  return z
    .string()
    .default(defaultValue)
    .transform((val) => Number(val))
    .pipe(z.number().int().min(min));
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // A missing key is reported per request, not at startup.
  OPENAI_API_KEY: z
    .string()
    .optional()
    .transform((val) => (val && val.trim().length > 0 ? val.trim() : undefined)),
  OPENAI_BASE_URL: z.string().default(DEFAULT_BASE_URL),
  OPENAI_MODEL: z.string().min(1).default(DEFAULT_MODEL),

  LLM_TIMEOUT_MS: integer('60000', 1),
  LLM_MAX_RETRIES: integer('2', 0),
  LLM_RETRY_BASE_DELAY_MS: integer('0', 0),
  LLM_RETRY_MAX_DELAY_MS: integer('8000', 0),
  LLM_CACHE_TTL_MS: integer('300000', 1),
  LLM_CACHE_MAX_ENTRIES: integer('50', 1),
});

export type Env = z.infer<typeof envSchema>;

export class EnvValidationError extends Error {
  public readonly variables: string[];

  constructor(issues: z.ZodIssue[]) {
    const details = issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    super(`Environment validation failed: ${details.join('; ')}`);
    this.name = 'EnvValidationError';
    this.variables = [...new Set(issues.map((issue) => issue.path.join('.')))];
  }
}

let validatedEnv: Env | null = null;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new EnvValidationError(result.error.issues);
  }

  return result.data;
}

export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  validatedEnv = parseEnv(process.env);
  return validatedEnv;
}

export function getEnv(): Env {
  if (process.env.NODE_ENV === 'test') {
    validatedEnv = null;
  }
  if (!validatedEnv) {
    return validateEnv();
  }
  return validatedEnv;
}

export function resetEnv(): void {
  validatedEnv = null;
}
