import { ConfigError } from '@docvault/shared';

export interface TextChunk {
  index: number;
  /** Half-open range into the source text */
  charStart: number;
  charEnd: number;
  /** Full chunk text, used for embedding */
  text: string;
  /** `text`, capped at `snippetMaxChars` for display */
  snippet: string;
}

export interface ChunkTextOptions {
  snippetMaxChars?: number;
}

/**
 * @throws ConfigError when the parameters cannot produce a valid chunking
 */
export function assertChunkParameters(
  chunkSize: number,
  chunkOverlap: number,
  snippetMaxChars?: number,
): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigError(`chunkSize must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigError(`chunkOverlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`,
    );
  }
  if (snippetMaxChars !== undefined && (!Number.isInteger(snippetMaxChars) || snippetMaxChars <= 0)) {
    throw new ConfigError(`snippetMaxChars must be a positive integer, got ${snippetMaxChars}`);
  }
}

/**
 * Splits `text` into fixed-size windows that advance by
 * `chunkSize - chunkOverlap`. The last window ends exactly at the end of the
 * text, so the ranges cover it without gaps.
 */
export function chunkText(
  text: string,
  chunkSize: number,
  chunkOverlap: number,
  options: ChunkTextOptions = {},
): TextChunk[] {
  assertChunkParameters(chunkSize, chunkOverlap, options.snippetMaxChars);

  const chunks: TextChunk[] = [];
  const step = chunkSize - chunkOverlap;

  for (let start = 0; start < text.length; start += step) {
    const end = Math.min(start + chunkSize, text.length);
    const chunk = text.slice(start, end);
    chunks.push({
      index: chunks.length,
      charStart: start,
      charEnd: end,
      text: chunk,
      snippet:
        options.snippetMaxChars === undefined ? chunk : chunk.slice(0, options.snippetMaxChars),
    });
    if (end === text.length) {
      break;
    }
  }

  return chunks;
}
