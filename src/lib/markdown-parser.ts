import type { ResumeDocument, Section, Subsection } from '../types/resume.js';
import { DEFAULT_CONTACT_LOCATIONS } from './config.js';
import { isBoldWrapped } from './inline-format.js';

/**
 * Walk state. The cursor points into `doc.sections` / the current section's
 * `subsections` by index; every rule returns a fresh state.
 */
interface ParseState {
  doc: ResumeDocument;
  sectionIndex: number | null;
  subsectionIndex: number | null;
}

interface ParseRule {
  name: string;
  matches: (line: string, state: ParseState) => boolean;
  apply: (line: string, state: ParseState) => ParseState;
}

export interface ParseOptions {
  /** Location literals that mark a pre-section line as contact info. */
  contactLocations?: readonly string[];
}

const PLATFORM_TOKENS_CASELESS = ['linkedin.com', 'github.com'];
const PLATFORM_TOKENS = ['LinkedIn', 'GitHub', 'Website', 'Portfolio'];

export function looksLikeContact(line: string, locations: readonly string[]): boolean {
  const lower = line.toLowerCase();
  return (
    line.includes('@')
    || PLATFORM_TOKENS_CASELESS.some((token) => lower.includes(token))
    || PLATFORM_TOKENS.some((token) => line.includes(token))
    || locations.some((location) => line.includes(location))
  );
}

function replaceAt<T>(items: readonly T[], index: number, item: T): T[] {
  return items.map((existing, i) => (i === index ? item : existing));
}

function currentSection(state: ParseState): Section | null {
  return state.sectionIndex === null ? null : state.doc.sections[state.sectionIndex] ?? null;
}

function updateSection(state: ParseState, update: (section: Section) => Section): ParseState {
  const section = currentSection(state);
  if (section === null || state.sectionIndex === null) return state;
  return {
    ...state,
    doc: { ...state.doc, sections: replaceAt(state.doc.sections, state.sectionIndex, update(section)) },
  };
}

function appendContent(line: string, state: ParseState): ParseState {
  const subsectionIndex = state.subsectionIndex;
  if (subsectionIndex !== null) {
    return updateSection(state, (section) => {
      const subsection = section.subsections[subsectionIndex];
      if (!subsection) return section;
      const next: Subsection = { ...subsection, lines: [...subsection.lines, line] };
      return { ...section, subsections: replaceAt(section.subsections, subsectionIndex, next) };
    });
  }
  return updateSection(state, (section) => ({ ...section, content: [...section.content, line] }));
}

/**
 * Ordered classification rules; the first match consumes the line.
 * The title rule precedes the contact rule because some titles contain a
 * location literal, and contact detection precedes content capture because
 * contact lines appear before any `##` section.
 */
export function buildParseRules(locations: readonly string[]): ParseRule[] {
  return [
    {
      name: 'skip',
      matches: (line) => line === '' || line === '---',
      apply: (_line, state) => state,
    },
    {
      name: 'name',
      matches: (line, state) => line.startsWith('# ') && !state.doc.name,
      apply: (line, state) => ({ ...state, doc: { ...state.doc, name: line.slice(2).trim() } }),
    },
    {
      name: 'title',
      matches: (line, state) => isBoldWrapped(line) && !state.doc.title,
      apply: (line, state) => ({ ...state, doc: { ...state.doc, title: line.slice(2, -2).trim() } }),
    },
    {
      name: 'contact',
      matches: (line, state) => state.sectionIndex === null && looksLikeContact(line, locations),
      apply: (line, state) => ({ ...state, doc: { ...state.doc, contact: [...state.doc.contact, line] } }),
    },
    {
      name: 'section',
      matches: (line) => line.startsWith('## '),
      apply: (line, state) => {
        const section: Section = { name: line.slice(3).trim(), content: [], subsections: [] };
        return {
          doc: { ...state.doc, sections: [...state.doc.sections, section] },
          sectionIndex: state.doc.sections.length,
          subsectionIndex: null,
        };
      },
    },
    {
      name: 'subsection',
      matches: (line) => line.startsWith('### '),
      apply: (line, state) => {
        const section = currentSection(state);
        // A subsection without a parent section has nowhere to live.
        if (section === null) return state;
        const subsection: Subsection = { name: line.slice(4).trim(), lines: [] };
        return {
          ...updateSection(state, (s) => ({ ...s, subsections: [...s.subsections, subsection] })),
          subsectionIndex: section.subsections.length,
        };
      },
    },
    {
      name: 'content',
      matches: () => true,
      apply: appendContent,
    },
  ];
}

export function emptyResume(): ResumeDocument {
  return { name: '', title: '', contact: [], sections: [] };
}

/**
 * Recovers the résumé structure from markdown. Never throws for malformed
 * input; missing parts are left empty for validation to report.
 */
export function parseResumeMarkdown(markdown: string, options: ParseOptions = {}): ResumeDocument {
  const rules = buildParseRules(options.contactLocations ?? DEFAULT_CONTACT_LOCATIONS);
  const initial: ParseState = { doc: emptyResume(), sectionIndex: null, subsectionIndex: null };

  const final = markdown
    .split(/\r?\n/)
    .map((raw) => raw.trim())
    .reduce((state, line) => {
      const rule = rules.find((candidate) => candidate.matches(line, state));
      return rule ? rule.apply(line, state) : state;
    }, initial);

  return final.doc;
}
