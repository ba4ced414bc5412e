export type FileKind = 'pdf' | 'image' | 'audio' | 'unsupported';

export type Difficulty = 'standard' | 'hard' | 'easy';

export type AnswerFormat = 'essay' | 'qa' | 'multiple-choice';

export interface UploadedDocument {
  fileName: string;
  data: Buffer;
  kind: FileKind;
}

export interface GenerationOptions {
  readonly difficulty: Difficulty;
  readonly format: AnswerFormat;
  readonly focus?: string;
}

export type ContentPart =
  | { type: 'instruction'; text: string }
  | { type: 'documentText'; text: string }
  | { type: 'fileRef' };

export type GenerationResult =
  | { status: 'success'; text: string }
  | { status: 'error'; code: string; message: string };
