import { stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { FileNotReadableError, IngestErrorCode } from '../errors.js';

export const ALLOWED_EXTENSIONS = ['.xlsx', '.csv'] as const;

/** Extension first, then existence; returns the path unchanged. */
export async function validateFile(path: string): Promise<string> {
  const ext = extname(path).toLowerCase();
  if (!ALLOWED_EXTENSIONS.some((allowed) => allowed === ext)) {
    throw new FileNotReadableError(
      IngestErrorCode.FILE_EXTENSION,
      `Unsupported file extension "${ext || '(none)'}"; expected ${ALLOWED_EXTENSIONS.join(' or ')}.`,
      { path }
    );
  }

  const info = await stat(path).catch(() => null);
  if (!info?.isFile()) {
    throw new FileNotReadableError(IngestErrorCode.FILE_NOT_FOUND, `File not found: ${path}`, {
      path,
    });
  }
  return path;
}
