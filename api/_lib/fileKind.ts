import path from 'node:path';
import type { FileKind } from '../../types.js';

const EXTENSION_KINDS: Record<string, Exclude<FileKind, 'unsupported'>> = {
  '.pdf': 'pdf',
  '.png': 'image',
  '.jpg': 'image',
  '.jpeg': 'image',
  '.mp3': 'audio',
  '.wav': 'audio'
};

const EXTENSION_MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.mp3': 'audio/mpeg',
  '.wav': 'audio/wav'
};

export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_KINDS);

export function fileExtension(fileName: string): string {
  return path.extname(fileName).toLowerCase();
}

export function classifyFileKind(fileName: string): FileKind {
  return EXTENSION_KINDS[fileExtension(fileName)] ?? 'unsupported';
}

export function mimeTypeFor(fileName: string): string {
  return EXTENSION_MIME_TYPES[fileExtension(fileName)] ?? 'application/octet-stream';
}

/** Base filename without directories or extension, e.g. `notes/Cell Biology.pdf` -> `Cell Biology`. */
export function subjectName(fileName: string): string {
  return path.parse(path.basename(fileName)).name;
}
