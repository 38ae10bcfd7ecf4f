import fs from 'fs';
import { TextDecoder } from 'util';
import { ErrorCode } from '../types';
import { ErrorHandler } from '../utils/error-handler';

const REPLACEMENT_CHARACTER = /\uFFFD/g;

// Invalid UTF-8 sequences decode to U+FFFD and are dropped
export function decodeSource(buffer: Uint8Array): string {
  const decoder = new TextDecoder('utf-8', { fatal: false, ignoreBOM: false });
  return decoder.decode(buffer).replace(REPLACEMENT_CHARACTER, '');
}

export function readSourceFile(filePath: string): string {
  let buffer: Buffer;
  try {
    buffer = fs.readFileSync(filePath);
  } catch (error) {
    // fs errors may come from another realm, so no instanceof check here
    const errno = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
    if (errno === 'ENOENT') {
      throw ErrorHandler.createError(ErrorCode.FileNotFound, `File not found: ${filePath}`, error);
    }
    throw ErrorHandler.createError(
      ErrorCode.FileUnreadable,
      `Error reading file ${filePath}: ${ErrorHandler.formatError(error)}`,
      error
    );
  }
  return decodeSource(buffer);
}
