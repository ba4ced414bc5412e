import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildTempPath, removeTempFile, writeTempFile } from '../../api/_lib/tempFile.js';

describe('temp files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'quiz-temp-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('keeps the upload extension in the temp name', () => {
    const tempPath = buildTempPath('Lecture 4.MP3', dir);
    expect(path.dirname(tempPath)).toBe(dir);
    expect(path.basename(tempPath)).toMatch(/^quiz-upload-\d+-[a-z0-9]+\.mp3$/);
  });

  it('writes and removes the local copy', async () => {
    const tempPath = buildTempPath('board.png', dir);
    await writeTempFile(tempPath, Buffer.from('png-bytes'));
    expect((await readFile(tempPath)).toString()).toBe('png-bytes');

    await removeTempFile(tempPath);
    expect(await readdir(dir)).toEqual([]);
  });

  it('ignores files that are already gone', async () => {
    await expect(removeTempFile(path.join(dir, 'missing.pdf'))).resolves.toBeUndefined();
  });
});
