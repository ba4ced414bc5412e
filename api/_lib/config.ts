import 'dotenv/config';
import os from 'node:os';
import { MissingCredentialError } from './errors.js';
import { getModelId } from './gemini.js';

export type AppConfig = {
  apiKey: string;
  modelId: string;
  maxUploadBytes: number;
  tempDir: string;
  pollAttempts: number;
  pollDelayMs: number;
  port: number;
};

const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;
const DEFAULT_POLL_ATTEMPTS = 30;
const DEFAULT_POLL_DELAY_MS = 2000;
const DEFAULT_PORT = 8080;

const parseEnvNumber = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const positiveOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && value > 0 ? Math.floor(value) : fallback;

const nonNegativeOr = (value: number | undefined, fallback: number): number =>
  value !== undefined && value >= 0 ? value : fallback;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const apiKey = env.GEMINI_API_KEY?.trim();
  if (!apiKey) {
    throw new MissingCredentialError();
  }

  return {
    apiKey,
    modelId: getModelId(env.GEMINI_MODEL_ID),
    maxUploadBytes: positiveOr(parseEnvNumber(env.MAX_UPLOAD_BYTES), DEFAULT_MAX_UPLOAD_BYTES),
    tempDir: env.QUIZ_TEMP_DIR?.trim() || os.tmpdir(),
    pollAttempts: positiveOr(parseEnvNumber(env.GEMINI_FILE_POLL_ATTEMPTS), DEFAULT_POLL_ATTEMPTS),
    pollDelayMs: nonNegativeOr(parseEnvNumber(env.GEMINI_FILE_POLL_DELAY_MS), DEFAULT_POLL_DELAY_MS),
    port: positiveOr(parseEnvNumber(env.PORT), DEFAULT_PORT)
  };
}
