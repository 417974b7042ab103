import type { Match } from './types';

const ANSWER_SEPARATOR = '\n\n';

/**
 * Joins the distinct non-empty snippets in rank order. Text longer than
 * `maxChars` is cut at the last space before the limit and marked with `...`.
 */
export function composeAnswer(snippets: string[], maxChars: number): string {
  const seen = new Set<string>();
  const pieces: string[] = [];
  let total = 0;

  for (const snippet of snippets) {
    if (!snippet || seen.has(snippet)) {
      continue;
    }
    seen.add(snippet);
    pieces.push(snippet);
    total += snippet.length;
    if (total >= maxChars) {
      break;
    }
  }

  const joined = pieces.join(ANSWER_SEPARATOR);
  if (joined.length <= maxChars) {
    return joined;
  }

  const cut = joined.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(' ');
  return `${lastSpace === -1 ? cut : cut.slice(0, lastSpace)}...`;
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

/**
 * Markdown reference table for a list of matches, one row per match.
 */
export function renderReferencesTable(matches: Match[]): string {
  const headers = ['filename', 'checksum', 'index', 'char_start', 'char_end', 'score'];
  const lines = [
    `| ${headers.join(' | ')} |`,
    `| ${headers.map(() => '---').join(' | ')} |`,
  ];

  for (const match of matches) {
    const name = escapeCell(match.filename);
    const cells = [
      match.link ? `[${name}](${match.link})` : name,
      escapeCell(match.checksum),
      String(match.index),
      String(match.charStart),
      String(match.charEnd),
      match.score.toFixed(6),
    ];
    lines.push(`| ${cells.join(' | ')} |`);
  }

  return lines.join('\n');
}
