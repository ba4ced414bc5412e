import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileExtension } from './fileKind.js';

export function buildTempPath(fileName: string, dir: string = os.tmpdir()): string {
  const ext = fileExtension(fileName) || '.bin';
  return path.join(dir, `quiz-upload-${Date.now()}-${Math.random().toString(36).slice(2)}${ext}`);
}

export async function writeTempFile(tempFilePath: string, data: Buffer): Promise<void> {
  await fs.writeFile(tempFilePath, data);
}

export async function removeTempFile(tempFilePath: string): Promise<void> {
  await fs.rm(tempFilePath, { force: true });
}
