import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { CONFIG_FILE, LLM_CONSTANTS, RETRY_CONSTANTS, TEXT_CONSTANTS, TIME_CONSTANTS } from '../../shared/constants';
import { ConfigError } from '../../shared/errors';
import { Logger, silentLogger } from '../../shared/logger';

// Options a user can set in .gitbrief.yml; environment variables override them
export const UserConfigSchema = z.object({
  language: z.enum(['en', 'ko']).default('en'),
  provider: z.enum(['auto', 'openrouter', 'gemini']).default('auto'),
  models: z.object({
    openrouter: z.string().min(1).default(LLM_CONSTANTS.OPENROUTER_MODEL),
    gemini: z.string().min(1).default(LLM_CONSTANTS.GEMINI_MODEL)
  }).default({}),
  days: z.number().int().min(1).max(TIME_CONSTANTS.MAX_LOOKBACK_DAYS).default(TIME_CONSTANTS.DEFAULT_LOOKBACK_DAYS),
  prompt: z.object({
    maxChars: z.number().int().positive().default(TEXT_CONSTANTS.MAX_PROMPT_CHARS),
    subjectMaxLength: z.number().int().min(20).default(TEXT_CONSTANTS.SUBJECT_MAX_LENGTH)
  }).default({}),
  generation: z.object({
    temperature: z.number().min(0).max(2).default(LLM_CONSTANTS.TEMPERATURE),
    maxOutputTokens: z.number().int().positive().default(LLM_CONSTANTS.MAX_OUTPUT_TOKENS)
  }).default({}),
  retry: z.object({
    retries: z.number().int().min(0).max(10).default(RETRY_CONSTANTS.RETRIES),
    initialBackoffMs: z.number().int().min(0).default(RETRY_CONSTANTS.INITIAL_BACKOFF_MS),
    maxBackoffMs: z.number().int().min(0).default(RETRY_CONSTANTS.MAX_BACKOFF_MS),
    factor: z.number().min(1).default(RETRY_CONSTANTS.FACTOR),
    timeoutMs: z.number().int().positive().default(RETRY_CONSTANTS.TIMEOUT_MS)
  }).default({})
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

export interface AppConfig extends UserConfig {
  repoRoot: string;
  credentials: {
    openrouter?: string;
    gemini?: string;
  };
  slackWebhookUrl?: string;
  debug: boolean;
}

type Env = Record<string, string | undefined>;

// config path -> the environment variable that overrides it
const ENV_VARIABLES: Record<string, string> = {
  language: 'GITBRIEF_LANG',
  provider: 'GITBRIEF_PROVIDER',
  'models.openrouter': 'GITBRIEF_OPENROUTER_MODEL',
  'models.gemini': 'GITBRIEF_GEMINI_MODEL',
  days: 'GITBRIEF_DAYS',
  'prompt.maxChars': 'GITBRIEF_MAX_DIFF'
};

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function overlay(base: RawConfig, patch: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? overlay(current, value) : value;
  }
  return merged;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Builds the one configuration object an invocation uses. Nothing else in the
 * program reads process.env.
 */
export class ConfigManager {
  static load(repoRoot: string, env: Env, logger: Logger = silentLogger): AppConfig {
    const fileConfig = ConfigManager.readFile(repoRoot, logger);
    const envConfig = ConfigManager.fromEnv(env);

    // environment overrides must be valid on their own
    const fromEnv = UserConfigSchema.safeParse(envConfig);
    if (!fromEnv.success) {
      const variables = [...new Set(fromEnv.error.issues.map(issue => ENV_VARIABLES[issue.path.join('.')] ?? issue.path.join('.')))];
      throw new ConfigError(variables, ConfigManager.describe(fromEnv.error));
    }

    let parsed = UserConfigSchema.safeParse(overlay(fileConfig, envConfig));
    if (!parsed.success) {
      logger.warn(`Ignoring ${CONFIG_FILE}: ${ConfigManager.describe(parsed.error)}`);
      parsed = fromEnv;
    }

    return {
      ...parsed.data,
      repoRoot,
      credentials: {
        openrouter: nonEmpty(env.OPENROUTER_API_KEY),
        gemini: nonEmpty(env.GEMINI_API_KEY)
      },
      slackWebhookUrl: nonEmpty(env.SLACK_WEBHOOK_URL),
      debug: env.GITBRIEF_DEBUG === 'true'
    };
  }

  static configPath(repoRoot: string): string {
    return path.join(repoRoot, CONFIG_FILE);
  }

  private static readFile(repoRoot: string, logger: Logger): RawConfig {
    const configPath = ConfigManager.configPath(repoRoot);
    if (!fs.existsSync(configPath)) return {};

    try {
      const content = yaml.load(fs.readFileSync(configPath, 'utf-8'));
      if (content === undefined || content === null) return {};
      if (!isRecord(content)) {
        logger.warn(`Ignoring ${CONFIG_FILE}: expected a mapping at the top level`);
        return {};
      }
      return content;
    } catch (error) {
      logger.warn(`Failed to load ${CONFIG_FILE}: ${error instanceof Error ? error.message : String(error)}`);
      return {};
    }
  }

  private static fromEnv(env: Env): RawConfig {
    const raw: RawConfig = {};
    const lang = nonEmpty(env.GITBRIEF_LANG)?.toLowerCase();
    if (lang) raw.language = lang;
    const provider = nonEmpty(env.GITBRIEF_PROVIDER)?.toLowerCase();
    if (provider) raw.provider = provider;

    const models: RawConfig = {};
    const openrouterModel = nonEmpty(env.GITBRIEF_OPENROUTER_MODEL);
    if (openrouterModel) models.openrouter = openrouterModel;
    const geminiModel = nonEmpty(env.GITBRIEF_GEMINI_MODEL);
    if (geminiModel) models.gemini = geminiModel;
    if (Object.keys(models).length > 0) raw.models = models;

    const days = nonEmpty(env.GITBRIEF_DAYS);
    if (days) raw.days = Number(days);
    const maxChars = nonEmpty(env.GITBRIEF_MAX_DIFF);
    if (maxChars) raw.prompt = { maxChars: Number(maxChars) };

    return raw;
  }

  private static describe(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }

  /**
   * Writes a commented default config. Returns false when one already exists.
   */
  static createDefault(repoRoot: string): boolean {
    const configPath = ConfigManager.configPath(repoRoot);
    if (fs.existsSync(configPath)) {
      return false;
    }

    const defaultConfig = `# gitbrief configuration

# Output and prompt language (en: English, ko: Korean)
language: en

# LLM provider: auto picks OpenRouter first, then Gemini
provider: auto

models:
  openrouter: ${LLM_CONSTANTS.OPENROUTER_MODEL}
  gemini: ${LLM_CONSTANTS.GEMINI_MODEL}

# Default lookback for reports
days: ${TIME_CONSTANTS.DEFAULT_LOOKBACK_DAYS}

prompt:
  maxChars: ${TEXT_CONSTANTS.MAX_PROMPT_CHARS}
  subjectMaxLength: ${TEXT_CONSTANTS.SUBJECT_MAX_LENGTH}

retry:
  retries: ${RETRY_CONSTANTS.RETRIES}
  timeoutMs: ${RETRY_CONSTANTS.TIMEOUT_MS}

# Environment overrides:
# GITBRIEF_LANG, GITBRIEF_PROVIDER, GITBRIEF_DAYS, GITBRIEF_MAX_DIFF,
# GITBRIEF_OPENROUTER_MODEL, GITBRIEF_GEMINI_MODEL, GITBRIEF_DEBUG=true
#
# API keys belong in the environment or a .env file:
# OPENROUTER_API_KEY=your-key
# GEMINI_API_KEY=your-key
# SLACK_WEBHOOK_URL=https://hooks.slack.com/services/...
`;

    fs.writeFileSync(configPath, defaultConfig, 'utf-8');
    return true;
  }
}
