import type { VercelRequest, VercelResponse } from '@vercel/node';
import type { AnswerFormat, Difficulty, GenerationOptions } from '../types.js';
import { loadConfig, type AppConfig } from './_lib/config.js';
import { buildDocument } from './_lib/contentAssembler.js';
import { statusForError } from './_lib/errors.js';
import { createGeminiClientForKey, type ModelClient } from './_lib/gemini.js';
import { ANSWER_FORMATS, DIFFICULTIES } from './_lib/prompts.js';
import { runQuizGeneration, type PipelineLogger } from './_lib/quizPipeline.js';
import { generationResults, type GenerationResultHolder } from './_lib/resultHolder.js';

type GenerateBody = {
  fileName?: string;
  data?: string;
  difficulty?: string;
  format?: string;
  focus?: string;
};

export type GenerateHandlerDeps = {
  loadConfig: () => AppConfig;
  createClient: (config: AppConfig) => ModelClient;
  holder: GenerationResultHolder;
  logger: PipelineLogger;
};

class RequestError extends Error {
  code: string;
  status: number;

  constructor(code: string, message: string, status = 400) {
    super(message);
    this.code = code;
    this.status = status;
  }
}

const isDifficulty = (value: string): value is Difficulty =>
  DIFFICULTIES.some((difficulty) => difficulty === value);
const isAnswerFormat = (value: string): value is AnswerFormat =>
  ANSWER_FORMATS.some((format) => format === value);

function parseBody(req: VercelRequest): GenerateBody {
  if (!req.body) return {};
  if (typeof req.body === 'string') {
    return JSON.parse(req.body) as GenerateBody;
  }
  return req.body as GenerateBody;
}

export function parseOptions(body: GenerateBody): GenerationOptions {
  const difficulty = body.difficulty ?? 'standard';
  const format = body.format ?? 'essay';
  if (!isDifficulty(difficulty)) {
    throw new RequestError('invalid_options', `Unknown difficulty: ${difficulty}`);
  }
  if (!isAnswerFormat(format)) {
    throw new RequestError('invalid_options', `Unknown format: ${format}`);
  }
  const focus = body.focus?.trim();
  return focus ? { difficulty, format, focus } : { difficulty, format };
}

function decodeUpload(body: GenerateBody, maxUploadBytes: number): { fileName: string; data: Buffer } {
  const fileName = body.fileName?.trim();
  if (!fileName || !body.data) {
    throw new RequestError('missing_file', 'fileName and data are required.');
  }
  const data = Buffer.from(body.data, 'base64');
  if (data.byteLength === 0) {
    throw new RequestError('missing_file', 'Uploaded file is empty.');
  }
  if (data.byteLength > maxUploadBytes) {
    throw new RequestError('payload_too_large', 'Uploaded file is too large.', 413);
  }
  return { fileName, data };
}

export function createGenerateHandler(overrides: Partial<GenerateHandlerDeps> = {}) {
  const deps: GenerateHandlerDeps = {
    loadConfig: () => loadConfig(),
    createClient: (appConfig) =>
      createGeminiClientForKey(appConfig.apiKey, {
        pollAttempts: appConfig.pollAttempts,
        pollDelayMs: appConfig.pollDelayMs
      }),
    holder: generationResults,
    logger: console,
    ...overrides
  };

  return async function handler(req: VercelRequest, res: VercelResponse) {
    if (req.method !== 'POST') {
      return res
        .status(405)
        .json({ error: { code: 'method_not_allowed', message: 'POST required.' } });
    }

    let appConfig: AppConfig;
    try {
      appConfig = deps.loadConfig();
    } catch (error) {
      deps.logger.error('Configuration error:', error);
      return res
        .status(500)
        .json({ error: { code: 'missing_api_key', message: 'Server misconfigured.' } });
    }

    let upload: { fileName: string; data: Buffer };
    let options: GenerationOptions;
    try {
      const body = parseBody(req);
      upload = decodeUpload(body, appConfig.maxUploadBytes);
      options = parseOptions(body);
    } catch (error) {
      if (error instanceof RequestError) {
        return res.status(error.status).json({ error: { code: error.code, message: error.message } });
      }
      return res
        .status(400)
        .json({ error: { code: 'invalid_body', message: 'Request body must be JSON.' } });
    }

    const result = await runQuizGeneration(buildDocument(upload.fileName, upload.data), options, {
      client: deps.createClient(appConfig),
      holder: deps.holder,
      modelId: appConfig.modelId,
      tempDir: appConfig.tempDir,
      logger: deps.logger
    });

    if (result.status === 'error') {
      return res
        .status(statusForError(result.code))
        .json({ error: { code: result.code, message: result.message }, result });
    }
    return res.status(200).json({ result });
  };
}

export default createGenerateHandler();
