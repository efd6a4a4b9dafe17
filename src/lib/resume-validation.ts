import type { ResumeDocument, ResumeValidationError, ValidationResult } from '../types/resume.js';

const CHECKS: Array<{ ok: (doc: ResumeDocument) => boolean; error: ResumeValidationError }> = [
  {
    ok: (doc) => Boolean(doc.name),
    error: { kind: 'missing_name', message: 'Resume must contain a name (# Name)' },
  },
  {
    ok: (doc) => Boolean(doc.title),
    error: { kind: 'missing_title', message: 'Resume must contain a title (**Your Title**)' },
  },
  {
    ok: (doc) => doc.sections.length > 0,
    error: { kind: 'missing_sections', message: 'Resume must contain at least one section (## SECTION NAME)' },
  },
];

export function validateResume(doc: ResumeDocument): ValidationResult {
  for (const check of CHECKS) {
    if (!check.ok(doc)) return { success: false, error: { ...check.error } };
  }
  return { success: true };
}
