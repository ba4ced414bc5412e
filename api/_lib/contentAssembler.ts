import type { ContentPart, FileKind, GenerationOptions, UploadedDocument } from '../../types.js';
import { ExtractionFailureError, UnsupportedFileKindError } from './errors.js';
import { classifyFileKind } from './fileKind.js';
import { extractPdfContext, loadPages, type PageLoader } from './pdfText.js';
import { buildQuizPrompt } from './promptBuilder.js';
import { AUDIO_INSTRUCTION, IMAGE_INSTRUCTION } from './prompts.js';

export type AssembledContent = {
  parts: ContentPart[];
  kind: Exclude<FileKind, 'unsupported'>;
};

type AssembleOptions = {
  pageLoader?: PageLoader;
};

export function buildDocument(fileName: string, data: Buffer): UploadedDocument {
  return { fileName, data, kind: classifyFileKind(fileName) };
}

async function buildSourceParts(
  document: UploadedDocument,
  kind: AssembledContent['kind'],
  pageLoader: PageLoader
): Promise<ContentPart[]> {
  switch (kind) {
    case 'pdf': {
      let context: string;
      try {
        context = await extractPdfContext(document.data, pageLoader);
      } catch (error) {
        throw new ExtractionFailureError(error);
      }
      return [{ type: 'documentText', text: context }, { type: 'fileRef' }];
    }
    case 'image':
      return [{ type: 'instruction', text: IMAGE_INSTRUCTION }, { type: 'fileRef' }];
    case 'audio':
      return [{ type: 'instruction', text: AUDIO_INSTRUCTION }, { type: 'fileRef' }];
  }
}

export async function assembleContent(
  document: UploadedDocument,
  options: GenerationOptions,
  { pageLoader = loadPages }: AssembleOptions = {}
): Promise<AssembledContent> {
  const kind = document.kind;
  if (kind === 'unsupported') {
    throw new UnsupportedFileKindError(document.fileName);
  }

  const sourceParts = await buildSourceParts(document, kind, pageLoader);
  return {
    parts: [{ type: 'instruction', text: buildQuizPrompt(document.fileName, options) }, ...sourceParts],
    kind
  };
}
