/**
 * Text file I/O for task documents and generated files.
 *
 * Writes go through write-file-atomic (temp file + rename), so readers
 * see either the previous document or the new one.
 */

import writeFileAtomic from 'write-file-atomic';
import { mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TaskdownError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Replace a UTF-8 text file, creating missing parent directories.
 * Failures surface as FILE_ERROR.
 */
export async function writeTextAtomic(filePath: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, content, 'utf8');
  } catch (err) {
    throw new TaskdownError(ExitCode.FILE_ERROR, `Cannot write ${filePath}`, { cause: err });
  }
}

/**
 * UTF-8 contents of a file, or null when it does not exist.
 */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return null;
    throw new TaskdownError(ExitCode.FILE_ERROR, `Cannot read ${filePath}`, { cause: err });
  }
}
