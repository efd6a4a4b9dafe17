/**
 * Inline markdown → layout markup.
 *
 * The markup dialect is the small tag set understood by `pdf-markup.ts`:
 * `<b>`, `<i>`, `<link href="…" color="…">` and `<br/>`.
 */

export const DEFAULT_LINK_COLOR = '#0000ff';

const EMOJI_RE = /[📧🔗📄💼🎓🏆📍]/gu;
const LINK_RE = /\[([^\]]+)\]\(([^)]+)\)/g;
const BOLD_RE = /\*\*(.+?)\*\*/g;
const ITALIC_RE = /(?<!\*)\*(?!\*)(.+?)(?<!\*)\*(?!\*)/g;

// Private-use sentinels keep link targets out of reach of the bold/italic passes.
const HREF_OPEN = '\uE000';
const HREF_CLOSE = '\uE001';
const HREF_SLOT_RE = /\uE000(\d+)\uE001/g;

const TRAILING_PARENTHETICAL_RE = /\s*\([^)]*\)\s*$/;

export function formatInline(text: string, linkColor: string = DEFAULT_LINK_COLOR): string {
  if (!text) return text;

  const hrefs: string[] = [];
  let result = text.replace(EMOJI_RE, '');

  result = result.replace(LINK_RE, (_match, label: string, url: string) => {
    hrefs.push(url);
    return `<link href="${HREF_OPEN}${hrefs.length - 1}${HREF_CLOSE}" color="${linkColor}">${label}</link>`;
  });

  result = result.replace(BOLD_RE, '<b>$1</b>');
  result = result.replace(ITALIC_RE, '<i>$1</i>');

  return result.replace(HREF_SLOT_RE, (_match, index: string) => hrefs[Number(index)] ?? '');
}

/**
 * Stacks contact items vertically: each item is formatted and joined with `<br/>`.
 */
export function formatContactLine(items: readonly string[], linkColor?: string): string {
  return items
    .filter(Boolean)
    .map((item) => formatInline(item, linkColor))
    .join('<br/>');
}

export function stripBoldMarkers(text: string): string {
  return text.replace(/\*\*/g, '');
}

/** Removes an already-present duration such as "(2 years)" at the end of a date line. */
export function stripTrailingParenthetical(text: string): string {
  return text.replace(TRAILING_PARENTHETICAL_RE, '').trim();
}

export function isBoldWrapped(line: string): boolean {
  return line.length >= 4 && line.startsWith('**') && line.endsWith('**');
}

const BULLET_GLYPHS = ['•', '●', '▪', '◦', '‣'];

export function isBulletLine(line: string): boolean {
  return line.startsWith('-') || BULLET_GLYPHS.some((glyph) => line.startsWith(glyph));
}
