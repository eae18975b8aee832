/**
 * Unit Tests for ParagraphReconstructor
 */

import {
  isEmailHeaderLine,
  needsParagraphBreak,
  reconstructParagraphs,
} from '../../cleaning/ParagraphReconstructor';

describe('ParagraphReconstructor', () => {
  describe('needsParagraphBreak', () => {
    it('breaks after a closing word', () => {
      expect(needsParagraphBreak('Thanks', 'anything')).toBe(true);
      expect(needsParagraphBreak('regards', 'anything')).toBe(true);
      expect(needsParagraphBreak('Many thanks', 'anything')).toBe(false);
    });

    it('breaks after a short line ending in terminal punctuation', () => {
      expect(needsParagraphBreak('Hello.', 'More text')).toBe(true);
      expect(needsParagraphBreak('Question?', 'More text')).toBe(true);
      expect(needsParagraphBreak('Dear Sir,', 'More text')).toBe(false);
    });

    it('breaks after a short line followed by a signature', () => {
      expect(needsParagraphBreak('Kind wishes', 'Jane Doe')).toBe(true);
      expect(needsParagraphBreak('Best', 'Waste Services Team')).toBe(true);
      expect(needsParagraphBreak('Best', 'jane doe')).toBe(false);
    });

    it('never breaks after a long line on its own merits', () => {
      expect(needsParagraphBreak('This line is definitely long.', 'Jane Doe')).toBe(false);
    });

    it('honours a custom short-line length', () => {
      expect(needsParagraphBreak('Hello there friend.', 'x', 30)).toBe(true);
      expect(needsParagraphBreak('Hello there friend.', 'x')).toBe(false);
    });
  });

  it('recognises From: headers case-insensitively', () => {
    expect(isEmailHeaderLine('from: someone')).toBe(true);
    expect(isEmailHeaderLine(' From: indented')).toBe(false);
  });

  describe('reconstructParagraphs', () => {
    it('rebuilds a short letter', () => {
      const lines = ['Dear Sir,', 'I am writing about the bins.', 'Thanks', 'John Smith'];

      expect(reconstructParagraphs(lines)).toEqual([
        'Dear Sir,',
        'I am writing about the bins.',
        'Thanks',
        '',
        'John Smith',
      ]);
    });

    it('always breaks before a reply header', () => {
      expect(reconstructParagraphs(['This is a long line of text', 'From: someone'])).toEqual([
        'This is a long line of text',
        '',
        'From: someone',
      ]);
    });

    it('drops blank lines that do not mark a paragraph', () => {
      const lines = ['First long line of the body', '', '', '   ', 'Second long line of the body'];

      expect(reconstructParagraphs(lines)).toEqual([
        'First long line of the body',
        'Second long line of the body',
      ]);
    });

    it('trims content lines and ignores trailing blanks', () => {
      expect(reconstructParagraphs(['  Hello.  ', '', 'More text here', '', ''])).toEqual([
        'Hello.',
        '',
        'More text here',
      ]);
    });

    it('returns nothing for blank input', () => {
      expect(reconstructParagraphs(['', '  '])).toEqual([]);
    });
  });
});
