/**
 * HTML to Text Converter
 * Derives a plain-text body for containers that only carry an HTML body,
 * so snippets, plain mode and banner detection still have text to work on.
 */

import { convert as htmlToText, HtmlToTextOptions } from 'html-to-text';
import logger from '../utils/logger';
import { errorMessage } from '../errors';

const CONVERT_OPTIONS: HtmlToTextOptions = {
  wordwrap: false,
  preserveNewlines: true,
  selectors: [
    { selector: 'script', format: 'skip' },
    { selector: 'style', format: 'skip' },
    { selector: 'head', format: 'skip' },
    { selector: 'img', format: 'skip' },
    // Outlook bodies keep hrefs inline as <url>; drop them here
    { selector: 'a', options: { ignoreHref: true } },
    { selector: 'p', options: { leadingLineBreaks: 1, trailingLineBreaks: 1 } },
    { selector: 'br', format: 'lineBreak' },
  ],
};

export class HtmlToTextConverter {
  convert(html: string | null | undefined): string {
    if (!html || html.trim().length === 0) {
      return '';
    }

    try {
      return this.trimLines(htmlToText(html, CONVERT_OPTIONS));
    } catch (error: unknown) {
      logger.warn('Error converting HTML body to text', {
        error: errorMessage(error),
        htmlPreview: html.substring(0, 100),
      });
      return this.stripHtmlTags(html);
    }
  }

  /**
   * Tag-stripping fallback for markup html-to-text rejects.
   */
  stripHtmlTags(html: string): string {
    const text = html
      .replace(/<(script|style)\b[\s\S]*?<\/\1>/gi, '')
      .replace(/<br\s*\/?>/gi, '\n')
      .replace(/<\/p>/gi, '\n')
      .replace(/<[^>]+>/g, '')
      .replace(/&nbsp;/gi, ' ')
      .replace(/&lt;/gi, '<')
      .replace(/&gt;/gi, '>')
      .replace(/&quot;/gi, '"')
      .replace(/&#39;/g, "'")
      .replace(/&amp;/gi, '&');

    return this.trimLines(text);
  }

  private trimLines(text: string): string {
    return text
      .split('\n')
      .map((line) => line.trimEnd())
      .join('\n')
      .trim();
  }
}
