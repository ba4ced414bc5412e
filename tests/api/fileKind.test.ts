import { describe, expect, it } from 'vitest';
import { classifyFileKind, mimeTypeFor, subjectName } from '../../api/_lib/fileKind.js';

describe('classifyFileKind', () => {
  it.each([
    ['syllabus.pdf', 'pdf'],
    ['board.png', 'image'],
    ['diagram.jpg', 'image'],
    ['diagram.jpeg', 'image'],
    ['lecture.mp3', 'audio'],
    ['lecture.wav', 'audio']
  ])('classifies %s as %s', (fileName, kind) => {
    expect(classifyFileKind(fileName)).toBe(kind);
  });

  it('ignores extension case', () => {
    expect(classifyFileKind('SCAN.PDF')).toBe('pdf');
    expect(classifyFileKind('Photo.JPeG')).toBe('image');
  });

  it.each(['notes.docx', 'notes.txt', 'clip.mp4', 'README', 'archive.pdf.zip'])(
    'marks %s as unsupported',
    (fileName) => {
      expect(classifyFileKind(fileName)).toBe('unsupported');
    }
  );
});

describe('mimeTypeFor', () => {
  it('maps supported extensions to upload mime types', () => {
    expect(mimeTypeFor('a.pdf')).toBe('application/pdf');
    expect(mimeTypeFor('a.jpg')).toBe('image/jpeg');
    expect(mimeTypeFor('a.mp3')).toBe('audio/mpeg');
    expect(mimeTypeFor('a.wav')).toBe('audio/wav');
  });

  it('falls back to octet-stream', () => {
    expect(mimeTypeFor('a.bin')).toBe('application/octet-stream');
  });
});

describe('subjectName', () => {
  it('strips directories and the extension', () => {
    expect(subjectName('uploads/Cell Biology.pdf')).toBe('Cell Biology');
    expect(subjectName('history.notes.png')).toBe('history.notes');
  });
});
