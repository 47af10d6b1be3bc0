const DEFAULT_PORT = 8000;
const DEFAULT_MODEL = 'gemini-2.5-pro';
const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export interface GeminiConfig {
  apiKey: string;
  model: string;
}

export interface AppConfig {
  port: number;
  maxUploadBytes: number;
  corsOrigin: string | null;
  gemini: GeminiConfig;
}

export const API_KEY_NOT_CONFIGURED = 'API_KEY_NOT_CONFIGURED';

type Environment = Record<string, string | undefined>;

const readPositiveInteger = (raw: string | undefined, fallback: number) => {
  const value = Number(raw?.trim());
  if (!raw?.trim() || !Number.isInteger(value) || value <= 0) {
    return fallback;
  }
  return value;
};

const readText = (raw: string | undefined) => {
  const value = raw?.trim();
  return value ? value : null;
};

export const resolveConfig = (env: Environment = process.env): AppConfig => {
  const apiKey = readText(env.GEMINI_API_KEY) ?? readText(env.GOOGLE_API_KEY);
  if (!apiKey) {
    throw new Error(API_KEY_NOT_CONFIGURED);
  }

  return {
    port: readPositiveInteger(env.PORT, DEFAULT_PORT),
    maxUploadBytes: readPositiveInteger(env.MAX_UPLOAD_BYTES, DEFAULT_MAX_UPLOAD_BYTES),
    corsOrigin: readText(env.CORS_ORIGIN),
    gemini: {
      apiKey,
      model: readText(env.GEMINI_MODEL) ?? DEFAULT_MODEL
    }
  };
};
