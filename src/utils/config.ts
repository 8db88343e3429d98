import { logger } from './logger';

export const DEFAULT_MODEL_ID = 'gpt-4o-mini';
export const DEFAULT_TIMEOUT_MS = 120_000;

export interface AppConfig {
  /** Left undefined when not configured; the pipeline reports it on first use. */
  apiKey?: string;
  modelId: string;
  timeoutMs: number;
}

export type ConfigSource = Partial<
  Record<'VITE_OPENAI_API_KEY' | 'VITE_OPENAI_MODEL' | 'VITE_EXTRACTION_TIMEOUT_MS', string>
>;

const parseTimeout = (raw: string | undefined): number => {
  if (raw === undefined || raw.trim() === '') return DEFAULT_TIMEOUT_MS;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warning(`Ignoring invalid VITE_EXTRACTION_TIMEOUT_MS "${raw}", using ${DEFAULT_TIMEOUT_MS} ms`);
    return DEFAULT_TIMEOUT_MS;
  }
  return value;
};

// Read once at startup (main.tsx) and passed down explicitly.
export const loadConfig = (env: ConfigSource = import.meta.env): AppConfig => {
  const apiKey = env.VITE_OPENAI_API_KEY?.trim();
  const modelId = env.VITE_OPENAI_MODEL?.trim();
  return {
    apiKey: apiKey ? apiKey : undefined,
    modelId: modelId ? modelId : DEFAULT_MODEL_ID,
    timeoutMs: parseTimeout(env.VITE_EXTRACTION_TIMEOUT_MS),
  };
};
