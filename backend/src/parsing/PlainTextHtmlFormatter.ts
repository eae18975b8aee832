/**
 * Plain Text to HTML Formatter
 * Renders a plain-text body as display HTML: escaped, paragraphs rebuilt,
 * reply headers separated by <hr>, quoted runs wrapped.
 */

import { reconstructParagraphs } from '../cleaning/ParagraphReconstructor';
import { wrapQuotedBlocks } from '../cleaning/QuoteWrapper';
import { normalizePlainText } from '../cleaning/TextNormalizer';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

const REPLY_HEADER =
  /^\s*(&gt;\s*)*(From|Sent|To|Subject|Date|Original Message|Forwarded message):/i;
const DASH_SEPARATOR = /^\s*(-{5,}|_{5,})\s*$/;

export interface FormatterOptions {
  shortLineLength?: number;
  /** Separators are only inserted after this many lines */
  replySeparatorMinLine?: number;
}

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char]);
}

/**
 * Insert `<hr>` before reply headers and dash/underscore rules that follow
 * a paragraph break. The first lines are skipped so a message opening with
 * its own header block gets no rule.
 */
export function insertReplySeparators(escapedLines: string[], minLine = 3): string[] {
  const htmlLines: string[] = [];

  escapedLines.forEach((line, index) => {
    const isBoundary = REPLY_HEADER.test(line) || DASH_SEPARATOR.test(line);
    const previous = htmlLines[htmlLines.length - 1];

    if (index >= minLine && isBoundary && previous !== undefined && !previous.trim()) {
      htmlLines.push('<hr>');
    }
    htmlLines.push(line);
  });

  return htmlLines;
}

/**
 * Join lines with `<br>` inside paragraphs and `<br><br>` between them.
 */
export function buildParagraphs(htmlLines: string[]): string {
  const paragraphs: string[] = [];
  let current: string[] = [];

  for (const line of htmlLines) {
    if (line === '') {
      if (current.length > 0) {
        paragraphs.push(current.join('<br>'));
        current = [];
      }
    } else {
      current.push(line);
    }
  }

  if (current.length > 0) {
    paragraphs.push(current.join('<br>'));
  }

  return paragraphs.join('<br><br>');
}

export function formatPlainTextForHtml(text: string, options: FormatterOptions = {}): string {
  if (!text) {
    return '';
  }

  const lines = normalizePlainText(text).split('\n');
  const processed = reconstructParagraphs(lines, { shortLineLength: options.shortLineLength });

  const escaped = processed.map(escapeHtml);
  const htmlLines = insertReplySeparators(escaped, options.replySeparatorMinLine);
  return wrapQuotedBlocks(buildParagraphs(htmlLines));
}
