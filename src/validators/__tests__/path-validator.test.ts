import * as path from 'path';
import { describe, it, expect } from 'vitest';
import {
  isPDFFile,
  isZipFile,
  sanitizeInputPath,
  sanitizeOutputPath,
  validatePathWithinDirectory
} from '../path-validator.js';

describe('sanitizeOutputPath', () => {
  it('resolves an audiobook path', () => {
    expect(sanitizeOutputPath('out/book.m4b')).toBe(path.resolve('out/book.m4b'));
  });

  it('refuses system directories, null bytes and other extensions', () => {
    expect(() => sanitizeOutputPath('/etc/book.m4b')).toThrow('Cannot write to system directories');
    expect(() => sanitizeOutputPath('book\0.m4b')).toThrow('null byte');
    expect(() => sanitizeOutputPath('book.mp3')).toThrow('Output must end in one of .m4b, .m4a, .mp4, got ".mp3"');
  });

  it('does not treat a sibling with a common prefix as a system directory', () => {
    expect(sanitizeOutputPath('/etcetera/book.m4b')).toBe('/etcetera/book.m4b');
  });
});

describe('sanitizeInputPath', () => {
  it('accepts listed extensions case-insensitively', () => {
    expect(sanitizeInputPath('Book.EPUB', ['.epub'])).toBe(path.resolve('Book.EPUB'));
  });

  it('rejects other extensions and system files', () => {
    expect(() => sanitizeInputPath('book.txt', ['.epub', '.pdf'])).toThrow('Only .epub, .pdf files are allowed');
    expect(() => sanitizeInputPath('/proc/self/book.pdf', ['.pdf'])).toThrow('Cannot read files from system directories');
  });
});

describe('magic bytes', () => {
  it('recognizes PDF and ZIP headers', () => {
    expect(isPDFFile(new TextEncoder().encode('%PDF-1.7'))).toBe(true);
    expect(isPDFFile(new TextEncoder().encode('%PS'))).toBe(false);
    expect(isZipFile(new Uint8Array([0x50, 0x4b, 0x03, 0x04, 0x14]))).toBe(true);
    expect(isZipFile(new Uint8Array([0x50, 0x4b]))).toBe(false);
  });
});

describe('validatePathWithinDirectory', () => {
  it('throws when a path escapes its directory', () => {
    expect(() => validatePathWithinDirectory('/work/a/../../b.wav', '/work')).toThrow('Path traversal detected');
    expect(() => validatePathWithinDirectory('/work/chapter_0001.wav', '/work')).not.toThrow();
  });
});
