export type PublicError = {
  code: string;
  message: string;
};

export class QuizError extends Error {
  code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = 'QuizError';
  }
}

export class MissingCredentialError extends QuizError {
  constructor(message = 'GEMINI_API_KEY is not set.') {
    super('missing_credential', message);
    this.name = 'MissingCredentialError';
  }
}

export class UnsupportedFileKindError extends QuizError {
  constructor(fileName: string) {
    super('unsupported_file_kind', `Unsupported file type: ${fileName}`);
    this.name = 'UnsupportedFileKindError';
  }
}

export class ExtractionFailureError extends QuizError {
  constructor(cause: unknown) {
    super('extraction_failure', `PDF extraction failed: ${describeError(cause)}`);
    this.name = 'ExtractionFailureError';
  }
}

export class TempFileError extends QuizError {
  constructor(cause: unknown) {
    super('temp_file_failure', `Could not write the temporary upload copy: ${describeError(cause)}`);
    this.name = 'TempFileError';
  }
}

export class UploadFailureError extends QuizError {
  constructor(cause: unknown) {
    super('upload_failure', `File upload failed: ${describeError(cause)}`);
    this.name = 'UploadFailureError';
  }
}

export class ModelInvocationError extends QuizError {
  constructor(cause: unknown) {
    super('model_invocation_failure', `Model generation failed: ${describeError(cause)}`);
    this.name = 'ModelInvocationError';
  }
}

export class ModelBlockedError extends QuizError {
  reason: string;

  constructor(reason?: string) {
    const resolved = reason?.trim() || 'unknown reason';
    super('model_blocked', `The model did not return a response (${resolved})`);
    this.reason = resolved;
    this.name = 'ModelBlockedError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error.';
}

export function toPublicError(error: unknown): PublicError {
  if (error instanceof MissingCredentialError) {
    return { code: error.code, message: 'Server misconfigured.' };
  }
  if (error instanceof QuizError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'internal_error', message: 'Processing failed. Please retry.' };
}

export function statusForError(code: string): number {
  switch (code) {
    case 'unsupported_file_kind':
      return 415;
    case 'extraction_failure':
    case 'model_blocked':
      return 422;
    case 'upload_failure':
    case 'model_invocation_failure':
      return 502;
    default:
      return 500;
  }
}
