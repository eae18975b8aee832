/**
 * Unit Tests for PlainTextHtmlFormatter
 */

import {
  buildParagraphs,
  escapeHtml,
  formatPlainTextForHtml,
  insertReplySeparators,
} from '../../parsing/PlainTextHtmlFormatter';

describe('PlainTextHtmlFormatter', () => {
  it('escapes HTML special characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#x27;s&lt;/a&gt;'
    );
  });

  describe('insertReplySeparators', () => {
    it('adds a rule before a reply header that follows a paragraph break', () => {
      expect(insertReplySeparators(['a', 'b', '', 'From: x'])).toEqual(['a', 'b', '', '<hr>', 'From: x']);
    });

    it('recognises dash rules and quoted headers', () => {
      expect(insertReplySeparators(['a', 'b', '', '-----'])).toEqual(['a', 'b', '', '<hr>', '-----']);
      expect(insertReplySeparators(['a', 'b', '', '&gt; Sent: Monday'])).toEqual([
        'a',
        'b',
        '',
        '<hr>',
        '&gt; Sent: Monday',
      ]);
    });

    it('skips headers near the start of the message', () => {
      expect(insertReplySeparators(['', 'From: x'])).toEqual(['', 'From: x']);
    });

    it('skips headers that continue a paragraph', () => {
      expect(insertReplySeparators(['a', 'b', 'c', 'From: x'])).toEqual(['a', 'b', 'c', 'From: x']);
    });
  });

  it('joins paragraphs with a double break', () => {
    expect(buildParagraphs(['a', 'b', '', 'c'])).toBe('a<br>b<br><br>c');
    expect(buildParagraphs(['', 'a', '', ''])).toBe('a');
  });

  describe('formatPlainTextForHtml', () => {
    it('renders a reply chain', () => {
      const text = [
        'Hello Council,',
        'The streetlight on Elm Road is broken.',
        '',
        'From: John Smith <john@example.com>',
        'Sent: Monday',
        '> old text',
      ].join('\r\n');

      expect(formatPlainTextForHtml(text)).toBe(
        'Hello Council,<br>The streetlight on Elm Road is broken.<br><br>' +
          '<hr><br>From: John Smith &lt;john@example.com&gt;<br>Sent: Monday<br>' +
          '<div class="email-quote">old text</div>'
      );
    });

    it('returns an empty string for empty text', () => {
      expect(formatPlainTextForHtml('')).toBe('');
    });
  });
});
