/**
 * Body Renderer
 * Produces the stored body in one of three modes:
 * - snippet: short plain preview
 * - plain:   plain text with paragraphs rebuilt
 * - full:    display HTML (native HTML body when the container has one)
 */

import logger from '../utils/logger';
import { removeAngleBracketLinks, removeBanners } from '../cleaning/BannerStripper';
import { reconstructParagraphs } from '../cleaning/ParagraphReconstructor';
import { limitConsecutiveNewlines, normalizePlainText } from '../cleaning/TextNormalizer';
import { formatPlainTextForHtml } from './PlainTextHtmlFormatter';
import { BodyContentMode } from './types';

export interface RenderedBody {
  body_content: string;
  is_html: boolean;
}

export interface BodySource {
  plainText: string;
  htmlBody?: string | null;
}

export interface BodyRendererOptions {
  snippetMaxLength?: number;
  snippetTruncateAt?: number;
  shortLineLength?: number;
  replySeparatorMinLine?: number;
}

export class BodyRenderer {
  private readonly options: Required<BodyRendererOptions>;

  constructor(options: BodyRendererOptions = {}) {
    this.options = {
      snippetMaxLength: options.snippetMaxLength ?? 250,
      snippetTruncateAt: options.snippetTruncateAt ?? 247,
      shortLineLength: options.shortLineLength ?? 15,
      replySeparatorMinLine: options.replySeparatorMinLine ?? 3,
    };
  }

  render(mode: BodyContentMode, source: BodySource): RenderedBody {
    const rendered = this.renderMode(mode, source);

    logger.debug('Rendered email body', {
      mode,
      usedHtmlBody: mode === 'full' && Boolean(source.htmlBody),
      length: Array.from(rendered.body_content).length,
    });
    return rendered;
  }

  private renderMode(mode: BodyContentMode, source: BodySource): RenderedBody {
    switch (mode) {
      case 'snippet':
        return { body_content: this.renderSnippet(source.plainText), is_html: false };
      case 'plain':
        return { body_content: this.renderPlain(source.plainText), is_html: false };
      case 'full':
      default:
        return { body_content: this.renderFull(source), is_html: true };
    }
  }

  renderSnippet(plainText: string): string {
    const text = limitConsecutiveNewlines(normalizePlainText(removeBanners(plainText)));
    const { snippetMaxLength, snippetTruncateAt } = this.options;

    // Limits count characters, so astral symbols are one each
    const chars = Array.from(text);
    const snippet =
      chars.length > snippetMaxLength ? `${chars.slice(0, snippetTruncateAt).join('')}...` : text;
    return snippet.trim();
  }

  renderPlain(plainText: string): string {
    const text = normalizePlainText(removeBanners(plainText));
    const lines = reconstructParagraphs(text.split('\n'), {
      shortLineLength: this.options.shortLineLength,
    });
    return limitConsecutiveNewlines(lines.join('\n').trim());
  }

  renderFull(source: BodySource): string {
    if (source.htmlBody) {
      return removeBanners(source.htmlBody);
    }

    const cleaned = removeAngleBracketLinks(removeBanners(source.plainText));
    return formatPlainTextForHtml(cleaned, {
      shortLineLength: this.options.shortLineLength,
      replySeparatorMinLine: this.options.replySeparatorMinLine,
    });
  }
}
