/**
 * Canonical form of document text: line endings become `\n`, trailing
 * whitespace is removed from every line, runs of blank lines collapse to a
 * single blank line, and the whole text is trimmed.
 *
 * Applying it twice gives the same result as applying it once.
 */
export function normalizeText(text: string): string {
  const lines = text.replace(/\r\n?/g, '\n').split('\n');
  const kept: string[] = [];

  for (const line of lines) {
    const trimmed = line.trimEnd();
    if (trimmed === '' && kept.length > 0 && kept[kept.length - 1] === '') {
      continue;
    }
    kept.push(trimmed);
  }

  return kept.join('\n').trim();
}
