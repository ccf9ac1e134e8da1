import * as path from 'path';

const SYSTEM_DIRS = ['/etc', '/usr', '/bin', '/sbin', '/var/log', '/sys', '/proc', '/boot', '/dev'];

export const OUTPUT_EXTENSIONS = ['.m4b', '.m4a', '.mp4'];

function isWithin(resolved: string, dir: string): boolean {
  return resolved === dir || resolved.startsWith(dir + path.sep);
}

/**
 * Sanitizes and validates an output file path to prevent writes into system directories
 * @throws Error if path contains null bytes, targets system directories, or has an unsupported extension
 */
export function sanitizeOutputPath(outputPath: string): string {
  if (outputPath.includes('\0')) {
    throw new Error('Invalid path: null byte detected');
  }

  const resolved = path.resolve(outputPath);

  if (SYSTEM_DIRS.some(dir => isWithin(resolved, dir))) {
    throw new Error('Cannot write to system directories');
  }

  const extension = path.extname(resolved).toLowerCase();
  if (!OUTPUT_EXTENSIONS.includes(extension)) {
    throw new Error(`Output must end in one of ${OUTPUT_EXTENSIONS.join(', ')}, got "${extension || 'no extension'}"`);
  }

  return resolved;
}

/**
 * Sanitizes and validates an input file path
 * @throws Error if path contains null bytes, targets system directories, or has a disallowed extension
 */
export function sanitizeInputPath(inputPath: string, extensions: readonly string[]): string {
  if (inputPath.includes('\0')) {
    throw new Error('Invalid path: null byte detected');
  }

  const extension = path.extname(inputPath).toLowerCase();
  if (!extensions.includes(extension)) {
    throw new Error(`Only ${extensions.join(', ')} files are allowed`);
  }

  const resolved = path.resolve(inputPath);

  if (SYSTEM_DIRS.some(dir => isWithin(resolved, dir))) {
    throw new Error('Cannot read files from system directories');
  }

  return resolved;
}

/**
 * Validates that a file is actually a PDF by checking magic bytes
 */
export function isPDFFile(buffer: Uint8Array): boolean {
  // PDF files start with %PDF-
  return buffer.length >= 5 &&
         buffer[0] === 0x25 &&
         buffer[1] === 0x50 &&
         buffer[2] === 0x44 &&
         buffer[3] === 0x46 &&
         buffer[4] === 0x2D;
}

/**
 * Validates that a file is a ZIP container (EPUB) by checking magic bytes
 */
export function isZipFile(buffer: Uint8Array): boolean {
  // Local file header: PK\x03\x04
  return buffer.length >= 4 &&
         buffer[0] === 0x50 &&
         buffer[1] === 0x4B &&
         buffer[2] === 0x03 &&
         buffer[3] === 0x04;
}

/**
 * Validates that a resolved file path is within an intended directory
 * @throws Error if path escapes the intended directory
 */
export function validatePathWithinDirectory(filePath: string, intendedDir: string): void {
  const resolvedPath = path.resolve(filePath);
  const resolvedDir = path.resolve(intendedDir);

  if (!isWithin(resolvedPath, resolvedDir)) {
    throw new Error('Path traversal detected');
  }
}
