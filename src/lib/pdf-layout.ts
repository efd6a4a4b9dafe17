import { mkdirSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { jsPDF } from 'jspdf';
import type { RenderResult } from '../types/resume.js';
import { PAGE_SIZES, type FontFace, type FontStyle, type PageSizeName } from './config.js';
import type { DividerBlock, LayoutBlock, ParagraphBlock } from './pdf-blocks.js';
import { parseMarkup, toWinAnsi, type InlineRun } from './pdf-markup.js';
import type { ParagraphStyle } from './pdf-styles.js';

export interface PageMargins {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

export interface PageSetup {
  size: PageSizeName;
  margins: PageMargins;
  showPageNumbers?: boolean;
  /** Font for page numbers. */
  footerFont?: FontFace;
}

interface Segment {
  text: string;
  font: FontFace;
  size: number;
  color: string;
  href?: string;
  width: number;
}

interface Word {
  segments: Segment[];
  spaceBefore: Segment | null;
}

interface LaidOutLine {
  segments: Segment[];
  width: number;
}

const PERMISSION_CODES = new Set(['EACCES', 'EPERM', 'EBUSY']);
const FOOTER_FONT_SIZE = 9;

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function resolveFontStyle(base: FontStyle, run: Pick<InlineRun, 'bold' | 'italic'>): FontStyle {
  const bold = run.bold || base === 'bold' || base === 'bolditalic';
  const italic = run.italic || base === 'italic' || base === 'bolditalic';
  if (bold && italic) return 'bolditalic';
  if (bold) return 'bold';
  if (italic) return 'italic';
  return 'normal';
}

/**
 * Lays out styled blocks on jsPDF pages: greedy word wrap, page breaks
 * between lines, and keep-together groups moved whole to the next page.
 */
export class PdfLayoutEngine {
  private readonly doc: jsPDF;
  private readonly pageWidth: number;
  private readonly pageHeight: number;
  private readonly margins: PageMargins;
  private readonly showPageNumbers: boolean;
  private readonly footerFont: FontFace;
  private readonly blocks: LayoutBlock[] = [];
  private y: number;
  private laidOut = false;

  constructor(setup: PageSetup) {
    const [width, height] = PAGE_SIZES[setup.size];
    this.pageWidth = width;
    this.pageHeight = height;
    this.margins = setup.margins;
    this.showPageNumbers = setup.showPageNumbers ?? false;
    this.footerFont = setup.footerFont ?? { family: 'helvetica', style: 'normal' };
    this.doc = new jsPDF({ orientation: 'portrait', unit: 'pt', format: [width, height] });
    this.y = this.margins.top;
  }

  get contentWidth(): number {
    return this.pageWidth - this.margins.left - this.margins.right;
  }

  private get contentHeight(): number {
    return this.pageHeight - this.margins.top - this.margins.bottom;
  }

  private get bottom(): number {
    return this.pageHeight - this.margins.bottom;
  }

  private get atPageTop(): boolean {
    return this.y <= this.margins.top;
  }

  append(blocks: LayoutBlock[]): void {
    this.blocks.push(...blocks);
  }

  /** Lays out everything appended so far. Returns the page count. */
  layout(): number {
    if (!this.laidOut) {
      for (const block of this.blocks) this.renderBlock(block);
      if (this.showPageNumbers) this.addPageNumbers();
      this.laidOut = true;
    }
    return this.doc.getNumberOfPages();
  }

  build(outputPath: string): RenderResult {
    let pageCount: number;
    let bytes: ArrayBuffer;
    try {
      pageCount = this.layout();
      bytes = this.doc.output('arraybuffer');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, error: { kind: 'write_failed', message: `Error creating PDF: ${message}` } };
    }

    try {
      const dir = path.dirname(outputPath);
      if (dir) mkdirSync(dir, { recursive: true });
      writeFileSync(outputPath, Buffer.from(bytes));
    } catch (error) {
      const code = errorCode(error);
      if (code !== undefined && PERMISSION_CODES.has(code)) {
        return {
          success: false,
          error: {
            kind: 'permission_denied',
            message: `Permission denied writing to '${outputPath}'. Make sure the file isn't open in another application.`,
          },
        };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, error: { kind: 'write_failed', message: `Error creating PDF: ${message}` } };
    }

    return { success: true, pageCount };
  }

  // ─── Measuring ──────────────────────────────────────────────────────────────

  private measureText(text: string, font: FontFace, size: number): number {
    this.doc.setFont(font.family, font.style);
    this.doc.setFontSize(size);
    return this.doc.getTextWidth(text);
  }

  private segmentFor(text: string, run: InlineRun, style: ParagraphStyle): Segment {
    const font: FontFace = { family: style.font.family, style: resolveFontStyle(style.font.style, run) };
    const segment: Segment = {
      text,
      font,
      size: style.fontSize,
      color: run.color ?? style.color,
      width: this.measureText(text, font, style.fontSize),
    };
    if (run.href !== undefined) segment.href = run.href;
    return segment;
  }

  /** Greedy word wrap. Words glued across runs (no whitespace) stay together. */
  wrapParagraph(block: ParagraphBlock): LaidOutLine[] {
    const { style } = block;
    const available = this.contentWidth - style.leftIndent;
    const result: LaidOutLine[] = [];

    for (const markupLine of parseMarkup(block.markup)) {
      const words: Word[] = [];
      let current: Word | null = null;
      let pendingSpace: Segment | null = null;

      for (const run of markupLine) {
        for (const piece of toWinAnsi(run.text).split(/(\s+)/)) {
          if (!piece) continue;
          if (/^\s+$/.test(piece)) {
            current = null;
            pendingSpace = this.segmentFor(' ', run, style);
            continue;
          }
          const segment = this.segmentFor(piece, run, style);
          if (current) {
            // No whitespace since the last piece: the word continues across runs.
            current.segments.push(segment);
          } else {
            current = { segments: [segment], spaceBefore: words.length > 0 ? pendingSpace : null };
            words.push(current);
            pendingSpace = null;
          }
        }
      }

      let line: LaidOutLine = { segments: [], width: 0 };
      for (const word of words) {
        const wordWidth = word.segments.reduce((sum, s) => sum + s.width, 0);
        const space = line.segments.length > 0 ? word.spaceBefore : null;
        const spaceWidth = space?.width ?? 0;
        if (line.segments.length > 0 && line.width + spaceWidth + wordWidth > available) {
          result.push(line);
          line = { segments: [], width: 0 };
        } else if (space) {
          line.segments.push(space);
          line.width += spaceWidth;
        }
        line.segments.push(...word.segments);
        line.width += wordWidth;
      }
      if (line.segments.length > 0) result.push(line);
    }

    return result;
  }

  private measureBlock(block: LayoutBlock, atTop: boolean): number {
    switch (block.kind) {
      case 'spacer':
        return block.height;
      case 'divider':
        return block.thickness + block.paddingBottom;
      case 'paragraph': {
        const lines = this.wrapParagraph(block);
        return (atTop ? 0 : block.style.spaceBefore) + lines.length * block.style.leading + block.style.spaceAfter;
      }
      case 'keep-together':
        return block.blocks.reduce((sum, child, i) => sum + this.measureBlock(child, atTop && i === 0), 0);
    }
  }

  // ─── Drawing ────────────────────────────────────────────────────────────────

  private newPage(): void {
    this.doc.addPage();
    this.y = this.margins.top;
  }

  private ensureRoom(height: number): void {
    if (this.y + height <= this.bottom || this.atPageTop) return;
    this.newPage();
  }

  private renderBlock(block: LayoutBlock): void {
    switch (block.kind) {
      case 'spacer':
        if (this.atPageTop) return;
        this.y += block.height;
        if (this.y > this.bottom) this.newPage();
        return;
      case 'divider':
        this.renderDivider(block);
        return;
      case 'paragraph':
        this.renderParagraph(block);
        return;
      case 'keep-together': {
        const height = this.measureBlock(block, this.atPageTop);
        const fitsEmptyPage = height <= this.contentHeight;
        if (!this.atPageTop && this.y + height > this.bottom && fitsEmptyPage) this.newPage();
        for (const child of block.blocks) this.renderBlock(child);
        return;
      }
    }
  }

  private renderDivider(block: DividerBlock): void {
    this.ensureRoom(block.thickness);
    const width = Math.min(block.width, this.contentWidth);
    this.doc.setDrawColor(block.color);
    this.doc.setLineWidth(block.thickness);
    this.doc.line(this.margins.left, this.y, this.margins.left + width, this.y);
    this.y += block.thickness + block.paddingBottom;
  }

  private renderParagraph(block: ParagraphBlock): void {
    const { style } = block;
    const lines = this.wrapParagraph(block);
    if (!this.atPageTop) this.y += style.spaceBefore;

    const available = this.contentWidth - style.leftIndent;
    for (const line of lines) {
      this.ensureRoom(style.leading);
      const baseline = this.y + style.fontSize;
      let x = this.margins.left + style.leftIndent;
      if (style.alignment === 'center') x += Math.max(0, (available - line.width) / 2);

      for (const segment of line.segments) {
        this.doc.setFont(segment.font.family, segment.font.style);
        this.doc.setFontSize(segment.size);
        this.doc.setTextColor(segment.color);
        this.doc.text(segment.text, x, baseline);
        if (segment.href !== undefined && segment.text.trim()) {
          this.doc.link(x, baseline - segment.size, segment.width, segment.size, { url: segment.href });
        }
        x += segment.width;
      }
      this.y += style.leading;
    }

    this.y += style.spaceAfter;
  }

  private addPageNumbers(): void {
    const total = this.doc.getNumberOfPages();
    for (let i = 1; i <= total; i++) {
      this.doc.setPage(i);
      this.doc.setFont(this.footerFont.family, this.footerFont.style);
      this.doc.setFontSize(FOOTER_FONT_SIZE);
      this.doc.setTextColor('#000000');
      const label = `Page ${i} of ${total}`;
      const width = this.doc.getTextWidth(label);
      this.doc.text(label, this.pageWidth - this.margins.right - width, this.pageHeight - this.margins.bottom / 2);
    }
  }
}
