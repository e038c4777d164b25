/**
 * gitbrief defaults
 * Everything here can be overridden through .gitbrief.yml or the environment
 */

export const CONFIG_FILE = '.gitbrief.yml';

// Time
export const TIME_CONSTANTS = {
  DEFAULT_LOOKBACK_DAYS: 7,
  MAX_LOOKBACK_DAYS: 365,
  DAY_MS: 24 * 60 * 60 * 1000,
} as const;

// Prompt sizing
export const TEXT_CONSTANTS = {
  MAX_PROMPT_CHARS: 8000,
  SUBJECT_MAX_LENGTH: 72,
  MAX_PREVIEW_LINES: 20,
  MAX_COMMIT_ROWS: 15,
  MAX_SUBJECT_DISPLAY: 50,
  MAX_SLACK_SUMMARY: 2500,
  MAX_SLACK_COMMITS: 5,
} as const;

// LLM generation + transport
export const LLM_CONSTANTS = {
  TEMPERATURE: 0.3,
  MAX_OUTPUT_TOKENS: 1024,
  OPENROUTER_BASE_URL: 'https://openrouter.ai/api/v1',
  OPENROUTER_MODEL: 'xiaomi/mimo-v2-flash:free',
  GEMINI_MODEL: 'gemini-flash-latest',
  APP_TITLE: 'gitbrief',
} as const;

export const RETRY_CONSTANTS = {
  RETRIES: 2,
  INITIAL_BACKOFF_MS: 1000,
  MAX_BACKOFF_MS: 8000,
  FACTOR: 2,
  TIMEOUT_MS: 60000,
} as const;

// Paths that are usually machine written; their diffs carry little signal
export const GENERATED_PATH_PATTERNS = [
  /(^|\/)package-lock\.json$/,
  /(^|\/)yarn\.lock$/,
  /(^|\/)pnpm-lock\.yaml$/,
  /(^|\/)Cargo\.lock$/,
  /(^|\/)poetry\.lock$/,
  /(^|\/)go\.sum$/,
  /\.min\.(js|css)$/,
  /\.map$/,
  /\.snap$/,
  /(^|\/)(dist|build|out|vendor)\//,
] as const;

export const GENERATED_WEIGHT = 0.1;
