import type { ParagraphStyle } from './pdf-styles.js';

export interface ParagraphBlock {
  kind: 'paragraph';
  /** Inline markup: `<b>`, `<i>`, `<link href color>`, `<br/>`. */
  markup: string;
  style: ParagraphStyle;
}

export interface SpacerBlock {
  kind: 'spacer';
  height: number;
}

export interface DividerBlock {
  kind: 'divider';
  width: number;
  thickness: number;
  color: string;
  paddingBottom: number;
}

/** Blocks the layout engine must not split across a page boundary. */
export interface KeepTogetherBlock {
  kind: 'keep-together';
  blocks: LayoutBlock[];
}

export type LayoutBlock = ParagraphBlock | SpacerBlock | DividerBlock | KeepTogetherBlock;

export function paragraph(markup: string, style: ParagraphStyle): ParagraphBlock {
  return { kind: 'paragraph', markup, style };
}

export function spacer(height: number): SpacerBlock {
  return { kind: 'spacer', height };
}

export function divider(width: number, thickness: number, color: string, paddingBottom = 8): DividerBlock {
  return { kind: 'divider', width, thickness, color, paddingBottom };
}

export function keepTogether(blocks: LayoutBlock[]): KeepTogetherBlock {
  return { kind: 'keep-together', blocks };
}
