import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';
const DEFAULT_DEEPSEEK_MODEL = 'deepseek-chat';
const DEFAULT_DEEPSEEK_URL = 'https://api.deepseek.com/v1';
const DEFAULT_LLM_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export type BackendConfig = {
  apiKey: string;
  model: string;
  baseUrl?: string;
};

export type AppConfig = {
  port: number;
  jsonLimit: string;
  maxUploadBytes: number;
  llmTimeoutMs: number;
  gemini?: BackendConfig;
  deepseek?: BackendConfig;
};

type Env = Record<string, string | undefined>;

/** Loads the repo-root .env first, then one in the working directory. */
export const loadEnvFiles = () => {
  dotenv.config({ path: path.join(__dirname, '../../../.env') });
  dotenv.config();
};

const positiveInt = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const config: AppConfig = {
    port: positiveInt(env.PORT, 8080),
    jsonLimit: env.JSON_LIMIT || '5mb',
    maxUploadBytes: positiveInt(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    llmTimeoutMs: positiveInt(env.LLM_TIMEOUT_MS, DEFAULT_LLM_TIMEOUT_MS)
  };

  if (env.GEMINI_API_KEY) {
    config.gemini = {
      apiKey: env.GEMINI_API_KEY,
      model: env.GEMINI_MODEL || DEFAULT_GEMINI_MODEL
    };
  }

  if (env.DEEPSEEK_API_KEY) {
    config.deepseek = {
      apiKey: env.DEEPSEEK_API_KEY,
      model: env.DEEPSEEK_MODEL || DEFAULT_DEEPSEEK_MODEL,
      baseUrl: env.DEEPSEEK_BASE_URL || DEFAULT_DEEPSEEK_URL
    };
  }

  return config;
};

export const hasGenerativeBackend = (config: AppConfig) => Boolean(config.gemini || config.deepseek);
