import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import * as path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const defaultEnvPath = path.resolve(__dirname, '..', '.env');

export const LLM_PROVIDERS = ['deepseek', 'grok', 'github', 'openai'] as const;
export type LlmProviderName = (typeof LLM_PROVIDERS)[number];

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'Telegram bot token is required'),
  // Empty = every user may talk to the bot
  ALLOWED_USER_IDS: z
    .string()
    .default('')
    .transform((val) =>
      val
        .split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0)
        .map((id) => parseInt(id, 10))
    )
    .refine((ids) => ids.every((id) => Number.isInteger(id)), 'ALLOWED_USER_IDS must be a comma-separated list of numbers'),
  BOT_NAME: z.string().default('CommandBot'),
  ENVIRONMENT: z.string().default('test'),
  // LLM providers
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default('deepseek'),
  LLM_MODEL: z.string().optional(),
  OPENAI_API_KEY: z.string().default(''),
  DEEPSEEK_API_KEY: z.string().default(''),
  GITHUB_API_KEY: z.string().default(''),
  GROK_API_KEY: z.string().default(''),
  // News
  NEWS_BASE_URL: z.string().url().default('https://unwire.hk'),
  NEWS_TIME_ZONE: z.string().default('Asia/Hong_Kong'),
  NEWS_TIMEOUT_MS: z.string().default('15000').pipe(positiveInt),
  // Telegram
  TELEGRAM_MAX_LENGTH: z.string().default('2500').pipe(positiveInt),
  SHUTDOWN_GRACE_MS: z.string().default('5000').pipe(positiveInt),
  // Hosting hints for /ping
  AZURE_DEPLOYMENT: z.string().optional(),
  AZURE_WEBSITE_NAME: z.string().optional(),
  AZURE_REGION: z.string().optional(),
});

export type Config = Readonly<z.infer<typeof envSchema>>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Load `.env` into `process.env`. `BOT_ENV_PATH` overrides the default
 * location next to the project root.
 */
export function loadEnvFile(): void {
  const envPath = process.env.BOT_ENV_PATH || defaultEnvPath;
  loadEnv({ path: envPath });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid environment configuration:\n${issues}`);
  }

  return Object.freeze(parsed.data);
}

export function isTestEnvironment(config: Config): boolean {
  return config.ENVIRONMENT.toLowerCase() === 'test';
}

export function getApiKey(config: Config, provider: LlmProviderName): string {
  switch (provider) {
    case 'openai':
      return config.OPENAI_API_KEY;
    case 'deepseek':
      return config.DEEPSEEK_API_KEY;
    case 'github':
      return config.GITHUB_API_KEY;
    case 'grok':
      return config.GROK_API_KEY;
  }
}
