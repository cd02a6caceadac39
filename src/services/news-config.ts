// Ensure you have a .env file with the Mediastack and Gemini credentials.
// See .env.example for the variables read here. Next.js loads .env files itself.

export interface NewsSummaryConfig {
  mediastackUrl: string;
  mediastackApiKey?: string;
  countries: string;
  geminiApiKey?: string;
  geminiModel: string;
  /** Word budget given to the model in the prompt. Not enforced on the response. */
  summaryWordLimit: number;
  cacheTtlSeconds: number;
}

export const DEFAULT_MEDIASTACK_URL = 'http://api.mediastack.com/v1/news';
export const DEFAULT_COUNTRIES = 'in';
export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';
export const DEFAULT_SUMMARY_WORD_LIMIT = 60;
export const DEFAULT_CACHE_TTL_SECONDS = 40000;

type Env = Record<string, string | undefined>;

const requiredKeys = ['MEDIASTACK_API_KEY', 'GEMINI_API_KEY'] as const;

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`Ignoring invalid ${key}='${raw}', using default ${fallback}.`);
    return fallback;
  }
  return parsed;
}

/**
 * Builds the service configuration from environment variables.
 * Missing credentials are reported but do not stop the process; the calls
 * that need them fail later and are recovered per request.
 */
export function loadNewsConfig(env: Env = process.env): NewsSummaryConfig {
  const missing = requiredKeys.filter((key) => !readString(env, key));
  if (missing.length > 0) {
    console.warn(
      `News summary configuration is incomplete. Set the following variables in your .env file: ${missing.join(', ')}`,
    );
  }

  return {
    mediastackUrl: readString(env, 'MEDIASTACK_URL') ?? DEFAULT_MEDIASTACK_URL,
    mediastackApiKey: readString(env, 'MEDIASTACK_API_KEY'),
    countries: readString(env, 'MEDIASTACK_COUNTRIES') ?? DEFAULT_COUNTRIES,
    geminiApiKey: readString(env, 'GEMINI_API_KEY'),
    geminiModel: readString(env, 'GEMINI_MODEL') ?? DEFAULT_GEMINI_MODEL,
    summaryWordLimit: readPositiveInt(env, 'SUMMARY_WORD_LIMIT', DEFAULT_SUMMARY_WORD_LIMIT),
    cacheTtlSeconds: readPositiveInt(env, 'SUMMARIES_CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS),
  };
}

export const newsConfig: NewsSummaryConfig = loadNewsConfig();
