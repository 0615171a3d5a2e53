/**
 * Line and label helpers shared by the extractor, parser and summary
 */

const LINE_BREAK = /\r\n|\r|\n/;

/**
 * Split text into lines. A trailing line break does not add an empty line.
 */
export function splitLines(text: string): string[] {
  if (text === '') return [];
  const lines = text.split(LINE_BREAK);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Lowercase and drop combining marks, so `Résumé` compares equal to `resume`
 */
export function foldDiacritics(text: string): string {
  return text.normalize('NFD').replace(/\p{M}/gu, '').toLowerCase();
}

/**
 * Split on ASCII comma, fullwidth comma and ideographic comma
 */
export function splitDelimited(text: string): string[] {
  return text
    .split(/[,，、]/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when `line` mentions any of `labels`, ignoring case and diacritics.
 * ASCII labels must stand as whole words (`date` does not match `update`);
 * other labels match as substrings.
 */
export function containsLabel(line: string, labels: readonly string[]): boolean {
  const folded = foldDiacritics(line);
  return labels.some((label) => {
    const needle = foldDiacritics(label);
    if (!needle) return false;
    if (/^[\x00-\x7f]+$/.test(needle)) {
      return new RegExp(`\\b${escapeRegExp(needle)}\\b`).test(folded);
    }
    return folded.includes(needle);
  });
}
