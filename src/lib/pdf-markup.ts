export interface InlineRun {
  text: string;
  bold: boolean;
  italic: boolean;
  href?: string;
  color?: string;
}

/** One visual line of runs; `<br/>` starts a new one. */
export type MarkupLine = InlineRun[];

const TAG_RE = /<(\/?)(b|i|link)(\s[^>]*)?>|<br\s*\/?>/gi;
const ATTR_RE = /([a-zA-Z-]+)="([^"]*)"/g;

interface LinkFrame {
  href?: string;
  color?: string;
}

function parseAttributes(raw: string | undefined): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!raw) return attrs;
  for (const match of raw.matchAll(ATTR_RE)) {
    attrs[match[1].toLowerCase()] = match[2];
  }
  return attrs;
}

/**
 * Splits layout markup into styled runs. Anything that is not one of the
 * known tags is kept as literal text, so "R&D <team>" survives unchanged.
 */
export function parseMarkup(markup: string): MarkupLine[] {
  const lines: MarkupLine[] = [[]];
  let bold = 0;
  let italic = 0;
  const links: LinkFrame[] = [];
  let cursor = 0;

  const pushText = (text: string) => {
    if (!text) return;
    const link = links.at(-1);
    const run: InlineRun = { text, bold: bold > 0, italic: italic > 0 };
    if (link?.href !== undefined) run.href = link.href;
    if (link?.color !== undefined) run.color = link.color;
    lines[lines.length - 1].push(run);
  };

  for (const match of markup.matchAll(TAG_RE)) {
    const index = match.index ?? 0;
    pushText(markup.slice(cursor, index));
    cursor = index + match[0].length;

    const tag = match[2]?.toLowerCase();
    const closing = match[1] === '/';
    if (tag === undefined) {
      lines.push([]);
    } else if (tag === 'b') {
      bold = closing ? Math.max(0, bold - 1) : bold + 1;
    } else if (tag === 'i') {
      italic = closing ? Math.max(0, italic - 1) : italic + 1;
    } else if (closing) {
      links.pop();
    } else {
      const attrs = parseAttributes(match[3]);
      links.push({ href: attrs.href, color: attrs.color });
    }
  }
  pushText(markup.slice(cursor));

  return lines;
}

export function markupToPlainText(markup: string): string {
  return parseMarkup(markup)
    .map((line) => line.map((run) => run.text).join(''))
    .join('\n');
}

/** Glyphs past Latin-1 that a run may keep as-is; everything else past U+00FF goes through NFKD. */
const WINANSI_ABOVE_FF = new Set([
  '\u20AC', '\u201A', '\u0192', '\u201E', '\u2026', '\u2020', '\u2021',
  '\u02C6', '\u2030', '\u0160', '\u2039', '\u0152', '\u017D',
  '\u2018', '\u2019', '\u201C', '\u201D', '\u2022', '\u2013', '\u2014',
  '\u02DC', '\u2122', '\u0161', '\u203A', '\u0153', '\u017E', '\u0178',
]);

/**
 * Reduces text to what the standard PDF fonts can draw. Bullets, dashes,
 * smart quotes and Latin-1 accents pass through; other characters are
 * NFKD-decomposed and anything still outside Latin-1 is dropped.
 * Whitespace is left alone so adjoining runs keep their spacing.
 */
export function toWinAnsi(input: string): string {
  return input
    // Uncommon bullet variants -> standard bullet (U+2022, in WinAnsi)
    .replace(/[\u2023\u25E6\u25CF\u25AA\u2043\u00B7\u2027]/g, '\u2022')
    .replace(/\u2032/g, "'")
    .replace(/\u2033/g, '"')
    .replace(/\u02BC/g, '\u2019')
    .replace(/\u00A0/g, ' ')
    .replace(/[^\x00-\xFF]/g, (ch) => {
      if (WINANSI_ABOVE_FF.has(ch)) return ch;
      return ch.normalize('NFKD').replace(/[^\x00-\xFF]/g, '');
    })
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F\u200B-\u200F\u2028\u2029\uFEFF]/g, '');
}
