import { promises as fs } from 'fs';
import path from 'path';
import { ensureDir } from 'fs-extra';
import { ContentError, errorMessage } from '@docvault/shared';
import { normalizeText } from './normalize';

export interface ReadDocumentOptions {
  maxFileSizeBytes: number;
  extensions: string[];
}

export function isSupportedDocument(filename: string, extensions: string[]): boolean {
  const ext = path.extname(filename).toLowerCase();
  return extensions.some((allowed) => allowed.toLowerCase() === ext);
}

/**
 * Names of the supported documents directly inside `dir`, sorted.
 * The directory is created when missing.
 */
export async function listDocuments(dir: string, extensions: string[]): Promise<string[]> {
  await ensureDir(dir);
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isSupportedDocument(entry.name, extensions))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Reads and normalises one document from the knowledge directory.
 *
 * @throws ContentError when the file is missing, unsupported or too large
 */
export async function readDocument(
  dir: string,
  filename: string,
  options: ReadDocumentOptions,
): Promise<string> {
  if (!filename || path.basename(filename) !== filename) {
    throw new ContentError(`"${filename}" is not a file name inside ${dir}`);
  }
  if (!isSupportedDocument(filename, options.extensions)) {
    throw new ContentError(
      `Unsupported file type for ${filename}; expected one of ${options.extensions.join(', ')}`,
    );
  }

  const filePath = path.join(dir, filename);
  let size: number;
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) {
      throw new ContentError(`${filename} is not a regular file`);
    }
    size = stat.size;
  } catch (error) {
    if (error instanceof ContentError) {
      throw error;
    }
    throw new ContentError(`Cannot read ${filename}: ${errorMessage(error)}`, { cause: error });
  }

  if (size > options.maxFileSizeBytes) {
    throw new ContentError(
      `${filename} is ${size} bytes, above the ${options.maxFileSizeBytes} byte limit`,
      { details: { size, maxFileSizeBytes: options.maxFileSizeBytes } },
    );
  }

  return normalizeText(await fs.readFile(filePath, 'utf8'));
}
