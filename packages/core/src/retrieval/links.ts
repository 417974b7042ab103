import path from 'path';
import { pathToFileURL } from 'url';
import { pathExists } from '@docvault/shared';

/**
 * Provenance link for a chunk: a `file://` URL into the knowledge directory
 * when the source file is still there, otherwise a relative link.
 */
export async function buildMatchLink(
  knowledgeDir: string | undefined,
  filename: string,
  charStart: number,
  charEnd: number,
): Promise<string> {
  const fragment = `#chars=${charStart}-${charEnd}`;
  if (knowledgeDir) {
    const candidate = path.resolve(knowledgeDir, filename);
    if (await pathExists(candidate)) {
      return `${pathToFileURL(candidate).href}${fragment}`;
    }
  }
  return `./${filename}${fragment}`;
}
