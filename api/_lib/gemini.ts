import { FileState, GoogleGenAI, type GenerateContentResponse, type Part } from '@google/genai';
import type { ContentPart } from '../../types.js';

export type UploadedFileRef = {
  fileName: string;
  fileUri: string;
  mimeType: string;
  displayName: string;
};

export type ModelResponse =
  | { kind: 'text'; text: string }
  | { kind: 'blocked'; blockReason?: string };

/**
 * Upload-then-reference protocol of the hosted model. The quiz pipeline only talks to
 * this interface, so tests can substitute an in-process fake.
 */
export interface ModelClient {
  uploadFile(localPath: string, mimeType: string, displayName: string): Promise<UploadedFileRef>;
  generate(modelId: string, parts: ContentPart[], file?: UploadedFileRef): Promise<ModelResponse>;
  deleteFile(file: UploadedFileRef): Promise<void>;
}

export type GeminiClientOptions = {
  pollAttempts?: number;
  pollDelayMs?: number;
};

type ResponseLike = Pick<GenerateContentResponse, 'candidates' | 'promptFeedback' | 'text'>;

export const DEFAULT_MODEL_ID = 'gemini-2.5-flash';
const MODEL_ALLOWLIST = new Set([DEFAULT_MODEL_ID, 'gemini-2.5-pro', 'gemini-2.0-flash']);

const DEFAULT_POLL_ATTEMPTS = 30;
const DEFAULT_POLL_DELAY_MS = 2000;

export function getModelId(override?: string): string {
  const candidate = override?.trim();
  if (candidate && MODEL_ALLOWLIST.has(candidate)) {
    return candidate;
  }
  return DEFAULT_MODEL_ID;
}

const sleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export function toGeminiParts(parts: ContentPart[], file?: UploadedFileRef): Part[] {
  return parts.map((part) => {
    switch (part.type) {
      case 'instruction':
      case 'documentText':
        return { text: part.text };
      case 'fileRef':
        if (!file) {
          throw new Error('File reference used before the file was uploaded.');
        }
        return { fileData: { fileUri: file.fileUri, mimeType: file.mimeType } };
    }
  });
}

/** A response whose first candidate carries no parts is treated as blocked. */
export function readModelResponse(response: ResponseLike): ModelResponse {
  const candidateParts = response.candidates?.[0]?.content?.parts ?? [];
  if (candidateParts.length === 0) {
    const feedback = response.promptFeedback;
    const blockReason = feedback?.blockReasonMessage || feedback?.blockReason || undefined;
    return { kind: 'blocked', blockReason };
  }
  return { kind: 'text', text: response.text ?? '' };
}

export function createGeminiClient(ai: GoogleGenAI, options: GeminiClientOptions = {}): ModelClient {
  const pollAttempts = options.pollAttempts ?? DEFAULT_POLL_ATTEMPTS;
  const pollDelayMs = options.pollDelayMs ?? DEFAULT_POLL_DELAY_MS;

  return {
    async uploadFile(localPath, mimeType, displayName) {
      const uploadedFile = await ai.files.upload({
        file: localPath,
        config: { displayName, mimeType }
      });
      if (!uploadedFile.name) {
        throw new Error('Gemini upload failed.');
      }

      let remoteFile = uploadedFile;
      let attempts = 0;
      while (remoteFile.state === FileState.PROCESSING && attempts < pollAttempts) {
        await sleep(pollDelayMs);
        remoteFile = await ai.files.get({ name: uploadedFile.name });
        attempts += 1;
      }

      if (remoteFile.state === FileState.FAILED) {
        throw new Error('Gemini file processing failed.');
      }
      if (remoteFile.state === FileState.PROCESSING) {
        throw new Error('Gemini file processing timed out.');
      }

      const fileUri = remoteFile.uri ?? uploadedFile.uri;
      if (!fileUri) {
        throw new Error('Gemini upload returned no file URI.');
      }

      return {
        fileName: uploadedFile.name,
        fileUri,
        mimeType: remoteFile.mimeType ?? mimeType,
        displayName
      };
    },

    async generate(modelId, parts, file) {
      const response = await ai.models.generateContent({
        model: modelId,
        contents: [{ role: 'user', parts: toGeminiParts(parts, file) }]
      });
      return readModelResponse(response);
    },

    async deleteFile(file) {
      await ai.files.delete({ name: file.fileName });
    }
  };
}

export function createGeminiClientForKey(apiKey: string, options: GeminiClientOptions = {}): ModelClient {
  return createGeminiClient(new GoogleGenAI({ apiKey }), options);
}
