import type { ResumeDocument, Section, SectionKind, Subsection } from '../types/resume.js';
import type { ResumeConfig } from './config.js';
import type { DurationCalculator } from './duration.js';
import {
  formatContactLine,
  formatInline,
  isBoldWrapped,
  isBulletLine,
  stripBoldMarkers,
  stripTrailingParenthetical,
} from './inline-format.js';
import { divider, keepTogether, paragraph, spacer, type LayoutBlock } from './pdf-blocks.js';
import type { StyleSheet } from './pdf-styles.js';

export interface RenderContext {
  styles: StyleSheet;
  config: ResumeConfig;
  duration: DurationCalculator;
}

const SECTION_ROUTES: Array<{ kind: SectionKind; keywords: string[] }> = [
  { kind: 'summary', keywords: ['SUMMARY', 'PROFESSIONAL SUMMARY'] },
  { kind: 'skills', keywords: ['SKILL'] },
  { kind: 'experience', keywords: ['EXPERIENCE'] },
];

const KEEP_TOGETHER_KEYWORDS = ['EDUCATION', 'CERTIFICATION', 'AWARD', 'HONOR'];
const TECH_MARKERS = ['Technologies:', 'Tech used:'];

export function classifySection(name: string): SectionKind {
  const upper = name.toUpperCase();
  const route = SECTION_ROUTES.find(({ keywords }) => keywords.some((keyword) => upper.includes(keyword)));
  return route?.kind ?? 'generic';
}

export function shouldKeepSectionTogether(sectionName: string, keepSectionsTogether: boolean): boolean {
  if (!keepSectionsTogether) return false;
  const upper = sectionName.toUpperCase();
  return KEEP_TOGETHER_KEYWORDS.some((keyword) => upper.includes(keyword));
}

/** True when `line` repeats the captured date range, ignoring a trailing "(…)" on either side. */
export function lineMatchesDates(line: string, dates: string): boolean {
  if (!dates) return false;
  return stripTrailingParenthetical(line) === stripTrailingParenthetical(dates);
}

export function isEarlierExperience(subsectionName: string): boolean {
  return subsectionName.includes('Earlier') && subsectionName.includes('Experience');
}

function isTechLine(line: string): boolean {
  return TECH_MARKERS.some((marker) => line.includes(marker)) || line.startsWith('**Tech');
}

/** Re-annotates the dates of a condensed `**Company** | Title | Dates` line. */
export function annotateCondensedLine(line: string, duration: DurationCalculator): string {
  const parts = line.split('|');
  if (parts.length !== 3) return line;
  const [company, title, dates] = parts.map((part) => part.trim());
  const cleanDates = stripTrailingParenthetical(dates);
  const annotation = duration.computeDuration(cleanDates);
  if (!annotation) return line;
  return `${company} | ${title} | ${cleanDates} ${annotation}`;
}

function fmt(text: string, ctx: RenderContext): string {
  return formatInline(text, ctx.config.colors.link);
}

function pushSection(blocks: LayoutBlock[], group: LayoutBlock[], together: boolean): void {
  if (together) blocks.push(keepTogether(group));
  else blocks.push(...group);
}

function sectionHeading(section: Section, ctx: RenderContext): LayoutBlock[] {
  const { width, thickness, color } = ctx.config.divider;
  return [
    paragraph(section.name, ctx.styles.get('SectionHeader')),
    divider(width, thickness, color ?? ctx.config.colors.primary),
  ];
}

export function renderHeader(blocks: LayoutBlock[], doc: ResumeDocument, ctx: RenderContext): void {
  blocks.push(paragraph(doc.name, ctx.styles.get('Name')));
  blocks.push(paragraph(doc.title, ctx.styles.get('Subtitle')));
  blocks.push(paragraph(formatContactLine(doc.contact, ctx.config.colors.link), ctx.styles.get('Contact')));
}

export function renderSummarySection(blocks: LayoutBlock[], section: Section, ctx: RenderContext): void {
  const group = sectionHeading(section, ctx);
  group.push(paragraph(fmt(section.content.join(' '), ctx), ctx.styles.get('Summary')));
  pushSection(blocks, group, ctx.config.features.keepSectionsTogether);
}

export function renderSkillsSection(blocks: LayoutBlock[], section: Section, ctx: RenderContext): void {
  pushSection(blocks, sectionHeading(section, ctx), ctx.config.features.keepSectionsTogether);

  for (const raw of section.content) {
    const line = raw.trim();
    if (!line) continue;

    if (isBoldWrapped(line)) {
      const category = line.slice(2, -2).trim();
      if (category) blocks.push(paragraph(`<b>${category}</b>`, ctx.styles.get('SkillCategory')));
    } else if (!line.startsWith('**')) {
      const converted = fmt(line, ctx);
      if (converted.trim()) blocks.push(paragraph(converted, ctx.styles.get('SkillList')));
    }
    // An unclosed "**" line is neither a category nor a list.
  }
}

/**
 * Condensed entries from an "Earlier Experience" block. Always one
 * keep-together unit so the short list is never split across pages.
 */
export function renderEarlierExperience(blocks: LayoutBlock[], subsection: Subsection, ctx: RenderContext): void {
  const group: LayoutBlock[] = [
    spacer(12),
    paragraph(`<b>${stripBoldMarkers(subsection.name)}</b>`, ctx.styles.get('JobTitle')),
  ];

  for (const raw of subsection.lines) {
    const line = raw.trim();
    if (!line) continue;
    const converted = fmt(annotateCondensedLine(line, ctx.duration), ctx);
    if (!converted.trim()) continue;
    group.push(paragraph(converted, ctx.styles.get('ResumeBullet')));
    group.push(spacer(4));
  }

  group.push(spacer(6));
  blocks.push(keepTogether(group));
}

export function renderExperienceEntry(blocks: LayoutBlock[], subsection: Subsection, ctx: RenderContext): void {
  if (isEarlierExperience(subsection.name)) {
    renderEarlierExperience(blocks, subsection, ctx);
    return;
  }

  blocks.push(paragraph(`<b>${stripBoldMarkers(subsection.name)}</b>`, ctx.styles.get('JobTitle')));

  let jobTitle: string | null = null;
  let dates: string | null = null;
  let techLine: string | null = null;
  const bullets: string[] = [];
  const lines = subsection.lines;

  for (const [i, raw] of lines.entries()) {
    const line = raw.trim();
    if (!line) continue;

    if (jobTitle === null && line.startsWith('**') && !isBulletLine(line)) {
      jobTitle = fmt(line, ctx);
      const next = lines[i + 1]?.trim();
      if (next && !next.startsWith('**') && !isBulletLine(next)) {
        const cleanDates = stripTrailingParenthetical(next);
        dates = `${cleanDates} ${ctx.duration.computeDuration(cleanDates)}`.trim();
      }
      continue;
    }

    if (dates !== null && lineMatchesDates(line, dates)) continue;

    if (isBulletLine(line)) {
      bullets.push(fmt(line, ctx));
    } else if (isTechLine(line)) {
      techLine = fmt(line, ctx);
    }
  }

  if (jobTitle !== null) {
    const info = dates ? `${jobTitle} | ${dates}` : jobTitle;
    blocks.push(paragraph(info, ctx.styles.get('CompanyInfo')));
  }
  for (const bullet of bullets) {
    if (bullet.trim()) blocks.push(paragraph(bullet, ctx.styles.get('ResumeBullet')));
  }
  if (techLine !== null && techLine.trim()) {
    blocks.push(paragraph(techLine, ctx.styles.get('CompanyInfo')));
  }
  blocks.push(spacer(8));
}

/**
 * Free lines of a generic section, first match wins: condensed
 * `**Company** | Title | Dates`, bullet, bold sub-heading, plain text.
 */
export function renderGenericLines(lines: readonly string[], ctx: RenderContext): LayoutBlock[] {
  const items: LayoutBlock[] = [];

  for (const raw of lines) {
    const line = raw.trim();
    if (!line) continue;

    if (line.startsWith('**') && line.includes('|') && !isBulletLine(line)) {
      const converted = fmt(annotateCondensedLine(line, ctx.duration), ctx);
      if (converted.trim()) {
        items.push(paragraph(converted, ctx.styles.get('ResumeBullet')));
        items.push(spacer(6));
      }
    } else if (isBulletLine(line)) {
      const converted = fmt(line, ctx);
      if (converted.trim()) items.push(paragraph(converted, ctx.styles.get('ResumeBullet')));
    } else if (isBoldWrapped(line)) {
      items.push(paragraph(`<b>${stripBoldMarkers(line).trim()}</b>`, ctx.styles.get('JobTitle')));
    } else {
      const converted = fmt(line, ctx);
      if (converted.trim()) items.push(paragraph(converted, ctx.styles.get('SkillList')));
    }
  }

  return items;
}

export function renderExperienceSection(blocks: LayoutBlock[], section: Section, ctx: RenderContext): void {
  pushSection(blocks, sectionHeading(section, ctx), ctx.config.features.keepSectionsTogether);
  blocks.push(...renderGenericLines(section.content, ctx));
  for (const subsection of section.subsections) {
    renderExperienceEntry(blocks, subsection, ctx);
  }
}

export function renderGenericSection(blocks: LayoutBlock[], section: Section, ctx: RenderContext): void {
  const group = sectionHeading(section, ctx);
  const items = renderGenericLines(section.content, ctx);

  if (shouldKeepSectionTogether(section.name, ctx.config.features.keepSectionsTogether)) {
    blocks.push(keepTogether([...group, ...items, spacer(6)]));
  } else {
    blocks.push(...group, ...items, spacer(6));
  }
}

const RENDERERS: Record<SectionKind, (blocks: LayoutBlock[], section: Section, ctx: RenderContext) => void> = {
  summary: renderSummarySection,
  skills: renderSkillsSection,
  experience: renderExperienceSection,
  generic: renderGenericSection,
};

export function renderSection(blocks: LayoutBlock[], section: Section, ctx: RenderContext): void {
  RENDERERS[classifySection(section.name)](blocks, section, ctx);
}
