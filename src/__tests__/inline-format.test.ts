import { describe, it, expect } from 'vitest';
import {
  formatContactLine,
  formatInline,
  isBoldWrapped,
  isBulletLine,
  stripBoldMarkers,
  stripTrailingParenthetical,
} from '../lib/inline-format.js';

describe('formatInline', () => {
  it('converts bold and italic markers', () => {
    expect(formatInline('**Bold** and *italic*')).toBe('<b>Bold</b> and <i>italic</i>');
  });

  it('converts markdown links with the default link colour', () => {
    expect(formatInline('[LinkedIn](https://x.com/y)')).toBe(
      '<link href="https://x.com/y" color="#0000ff">LinkedIn</link>',
    );
  });

  it('leaves asterisks and underscores inside link targets alone', () => {
    expect(formatInline('[Site](https://example.com/*draft*/a_b)')).toBe(
      '<link href="https://example.com/*draft*/a_b" color="#0000ff">Site</link>',
    );
  });

  it('uses the configured link colour', () => {
    expect(formatInline('[Docs](https://docs.test)', '#123456')).toBe(
      '<link href="https://docs.test" color="#123456">Docs</link>',
    );
  });

  it('formats bold link labels', () => {
    expect(formatInline('[**Repo**](https://git.test/r)')).toBe(
      '<link href="https://git.test/r" color="#0000ff"><b>Repo</b></link>',
    );
  });

  it('strips decorative emoji', () => {
    expect(formatInline('📧 jane@example.com')).toBe(' jane@example.com');
    expect(formatInline('📍Remote')).toBe('Remote');
  });

  it('does not treat a bold pair as italic', () => {
    expect(formatInline('**Lead**')).toBe('<b>Lead</b>');
  });

  it('returns empty input unchanged', () => {
    expect(formatInline('')).toBe('');
  });

  it('passes plain text through', () => {
    expect(formatInline('Plain text, no markup')).toBe('Plain text, no markup');
  });
});

describe('formatContactLine', () => {
  it('joins formatted items with line breaks and skips blanks', () => {
    expect(formatContactLine(['jane@example.com', '', '*Remote*'])).toBe('jane@example.com<br/><i>Remote</i>');
  });

  it('returns an empty string for no items', () => {
    expect(formatContactLine([])).toBe('');
  });
});

describe('line helpers', () => {
  it('strips bold markers', () => {
    expect(stripBoldMarkers('**Acme** Corp')).toBe('Acme Corp');
  });

  it('strips a trailing parenthetical', () => {
    expect(stripTrailingParenthetical('Jan 2020 - Present (5 years)')).toBe('Jan 2020 - Present');
    expect(stripTrailingParenthetical('Jan 2020 - Present')).toBe('Jan 2020 - Present');
    expect(stripTrailingParenthetical('(Contract) Jan 2020 - Mar 2021')).toBe('(Contract) Jan 2020 - Mar 2021');
  });

  it('recognises bold-wrapped lines', () => {
    expect(isBoldWrapped('**Title**')).toBe(true);
    expect(isBoldWrapped('**')).toBe(false);
    expect(isBoldWrapped('**Acme** | Engineer')).toBe(false);
  });

  it('recognises bullet glyphs and hyphens', () => {
    expect(isBulletLine('- Shipped it')).toBe(true);
    expect(isBulletLine('• Shipped it')).toBe(true);
    expect(isBulletLine('▪ Shipped it')).toBe(true);
    expect(isBulletLine('Shipped it')).toBe(false);
  });
});
