import { describe, it, expect } from 'vitest';
import { markupToPlainText, parseMarkup, toWinAnsi } from '../lib/pdf-markup.js';

describe('parseMarkup', () => {
  it('splits bold and italic runs', () => {
    expect(parseMarkup('<b>Bold</b> and <i>it</i>')).toEqual([
      [
        { text: 'Bold', bold: true, italic: false },
        { text: ' and ', bold: false, italic: false },
        { text: 'it', bold: false, italic: true },
      ],
    ]);
  });

  it('carries link targets and colours onto nested runs', () => {
    expect(parseMarkup('<link href="https://x.test/a" color="#0000ff"><b>Site</b></link>!')).toEqual([
      [
        { text: 'Site', bold: true, italic: false, href: 'https://x.test/a', color: '#0000ff' },
        { text: '!', bold: false, italic: false },
      ],
    ]);
  });

  it('starts a new line at each break', () => {
    expect(parseMarkup('a<br/>b<br>c')).toEqual([
      [{ text: 'a', bold: false, italic: false }],
      [{ text: 'b', bold: false, italic: false }],
      [{ text: 'c', bold: false, italic: false }],
    ]);
  });

  it('keeps unknown tags as literal text', () => {
    expect(parseMarkup('R&D <team>')).toEqual([[{ text: 'R&D <team>', bold: false, italic: false }]]);
  });

  it('ignores unbalanced closing tags', () => {
    expect(parseMarkup('</b>x')).toEqual([[{ text: 'x', bold: false, italic: false }]]);
  });

  it('returns one empty line for empty markup', () => {
    expect(parseMarkup('')).toEqual([[]]);
  });
});

describe('markupToPlainText', () => {
  it('drops tags and turns breaks into newlines', () => {
    expect(markupToPlainText('<b>Jane</b><br/><link href="mailto:j@x.test" color="#0000ff">j@x.test</link>')).toBe(
      'Jane\nj@x.test',
    );
  });
});

describe('toWinAnsi', () => {
  it('keeps characters the standard fonts can draw', () => {
    expect(toWinAnsi('“Quoted” – café • 10€')).toBe('“Quoted” – café • 10€');
  });

  it('maps bullet variants to the standard bullet', () => {
    expect(toWinAnsi('● one ▪ two')).toBe('• one • two');
  });

  it('decomposes compatibility characters and drops the rest', () => {
    expect(toWinAnsi('ﬁle')).toBe('file');
    expect(toWinAnsi('★ Star')).toBe(' Star');
  });

  it('removes invisible characters and normalises no-break spaces', () => {
    const zeroWidth = String.fromCharCode(0x200b);
    const noBreak = String.fromCharCode(0xa0);
    expect(toWinAnsi(`a${zeroWidth}b${noBreak}c`)).toBe('ab c');
  });
});
