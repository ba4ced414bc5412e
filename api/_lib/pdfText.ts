import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import { Document } from '@langchain/core/documents';
import { CharacterTextSplitter } from '@langchain/textsplitters';

export const PDF_CHUNK_SIZE = 1000;
export const PDF_CHUNK_OVERLAP = 0;
export const CHUNK_SEPARATOR = '\n\n';

export type PageLoader = (data: Buffer) => Promise<string[]>;

export const loadPages: PageLoader = async (data) => {
  const blob = new Blob([new Uint8Array(data)], { type: 'application/pdf' });
  const loader = new PDFLoader(blob, { splitPages: true });
  const documents = await loader.load();
  return documents.map((document) => document.pageContent);
};

export async function splitIntoChunks(
  pages: string[],
  chunkSize = PDF_CHUNK_SIZE,
  chunkOverlap = PDF_CHUNK_OVERLAP
): Promise<string[]> {
  const splitter = new CharacterTextSplitter({ chunkSize, chunkOverlap });
  const chunks = await splitter.splitDocuments(
    pages.map((pageContent) => new Document({ pageContent }))
  );
  return chunks.map((chunk) => chunk.pageContent);
}

export async function extractPdfContext(
  data: Buffer,
  pageLoader: PageLoader = loadPages
): Promise<string> {
  const pages = await pageLoader(data);
  const chunks = await splitIntoChunks(pages);
  return chunks.join(CHUNK_SEPARATOR);
}
