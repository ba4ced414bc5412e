import type { GenerationOptions, GenerationResult, UploadedDocument } from '../../types.js';
import { assembleContent } from './contentAssembler.js';
import {
  ModelBlockedError,
  ModelInvocationError,
  TempFileError,
  UploadFailureError,
  describeError,
  toPublicError
} from './errors.js';
import type { ModelClient, ModelResponse, UploadedFileRef } from './gemini.js';
import { mimeTypeFor } from './fileKind.js';
import type { PageLoader } from './pdfText.js';
import type { GenerationResultHolder } from './resultHolder.js';
import { buildTempPath, removeTempFile, writeTempFile } from './tempFile.js';

export type PipelineLogger = {
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export type QuizPipelineDeps = {
  client: ModelClient;
  holder: GenerationResultHolder;
  modelId: string;
  tempDir?: string;
  pageLoader?: PageLoader;
  logger?: PipelineLogger;
};

function isExpectedDeleteError(error: unknown): boolean {
  const status =
    typeof error === 'object' && error !== null && 'status' in error ? Number(error.status) : 0;
  const message = describeError(error);
  return (
    status === 403 ||
    status === 404 ||
    message.includes('PERMISSION_DENIED') ||
    message.includes('not exist')
  );
}

async function cleanupRemoteFile(
  client: ModelClient,
  file: UploadedFileRef,
  logger: PipelineLogger
): Promise<void> {
  try {
    await client.deleteFile(file);
  } catch (error) {
    if (isExpectedDeleteError(error)) {
      logger.info(`Gemini cleanup skipped for ${file.fileName}.`);
      return;
    }
    logger.warn(`Gemini file cleanup failed for ${file.fileName}:`, describeError(error));
  }
}

async function cleanupLocalFile(tempFilePath: string, logger: PipelineLogger): Promise<void> {
  try {
    await removeTempFile(tempFilePath);
  } catch (error) {
    logger.warn(`Temp file cleanup failed for ${tempFilePath}:`, describeError(error));
  }
}

/**
 * Runs one generation cycle for a single upload. Every per-request failure ends up as an
 * error result in the holder; nothing is thrown to the caller.
 */
export async function runQuizGeneration(
  document: UploadedDocument,
  options: GenerationOptions,
  deps: QuizPipelineDeps
): Promise<GenerationResult> {
  const { client, holder, modelId, tempDir, pageLoader, logger = console } = deps;
  holder.reset();

  let tempFilePath: string | undefined;
  let uploaded: UploadedFileRef | undefined;
  let result: GenerationResult;

  try {
    const { parts, kind } = await assembleContent(document, options, { pageLoader });

    // assigned before the write so a partially written file is still removed
    const localPath = buildTempPath(document.fileName, tempDir);
    tempFilePath = localPath;
    try {
      await writeTempFile(localPath, document.data);
    } catch (error) {
      throw new TempFileError(error);
    }

    try {
      logger.info(`Uploading ${kind} file ${document.fileName}...`);
      uploaded = await client.uploadFile(localPath, mimeTypeFor(document.fileName), document.fileName);
      logger.info('Upload complete. Starting analysis...');
    } catch (error) {
      throw new UploadFailureError(error);
    }

    let response: ModelResponse;
    try {
      response = await client.generate(modelId, parts, uploaded);
    } catch (error) {
      throw new ModelInvocationError(error);
    }

    if (response.kind === 'blocked') {
      throw new ModelBlockedError(response.blockReason);
    }
    result = { status: 'success', text: response.text };
  } catch (error) {
    const publicError = toPublicError(error);
    logger.error(`Quiz generation failed (${publicError.code}):`, describeError(error));
    result = { status: 'error', code: publicError.code, message: `Error: ${publicError.message}` };
  } finally {
    if (uploaded) {
      await cleanupRemoteFile(client, uploaded, logger);
    }
    if (tempFilePath) {
      await cleanupLocalFile(tempFilePath, logger);
    }
  }

  holder.set(result);
  return result;
}
