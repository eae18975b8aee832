/**
 * Paragraph Reconstructor
 * Outlook flattens plain-text bodies into one line per visual line and
 * drops or doubles blank lines unpredictably. This rebuilds paragraph
 * boundaries from line adjacency alone.
 *
 * A blank line is placed after a content line when:
 * - the line is exactly a closing word (thanks / regards)
 * - the line is short and ends in terminal punctuation
 * - the line is short and the next line looks like a signature
 *   (`First Last`, or mentions Team / Department / Officer)
 * - the next line is a `From:` reply header
 *
 * All other content lines are joined by a single line break. The
 * thresholds are empirical; see config/parsing.ts.
 */

import {
  CLOSING_WORDS,
  SIGNATURE_KEYWORDS,
  SIGNATURE_NAME_PATTERN,
  TERMINAL_PUNCTUATION,
} from '../config/parsing';

const FROM_HEADER = /^From:/i;

export interface ParagraphOptions {
  /** Lines shorter than this count as short */
  shortLineLength?: number;
}

export function isEmailHeaderLine(line: string): boolean {
  return FROM_HEADER.test(line);
}

function looksLikeSignatureStart(line: string): boolean {
  return (
    SIGNATURE_NAME_PATTERN.test(line) ||
    SIGNATURE_KEYWORDS.some((keyword) => line.includes(keyword))
  );
}

export function needsParagraphBreak(line: string, nextLine: string, shortLineLength = 15): boolean {
  if (CLOSING_WORDS.includes(line)) {
    return true;
  }

  if (line.length >= shortLineLength) {
    return false;
  }

  if (TERMINAL_PUNCTUATION.some((mark) => line.endsWith(mark))) {
    return true;
  }

  return looksLikeSignatureStart(nextLine);
}

function nextContentIndex(lines: string[], start: number): number {
  let j = start;
  while (j < lines.length && !lines[j].trim()) {
    j++;
  }
  return j;
}

/**
 * Rebuild paragraphs from raw lines. Returns trimmed content lines with an
 * empty string marking each paragraph break.
 */
export function reconstructParagraphs(lines: string[], options: ParagraphOptions = {}): string[] {
  const shortLineLength = options.shortLineLength ?? 15;
  const processed: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i].trim();

    if (!line) {
      i++;
      continue;
    }

    processed.push(line);

    const j = nextContentIndex(lines, i + 1);
    if (j < lines.length) {
      const nextLine = lines[j].trim();
      if (needsParagraphBreak(line, nextLine, shortLineLength) || isEmailHeaderLine(nextLine)) {
        processed.push('');
      }
    }

    i = j;
  }

  return processed;
}
