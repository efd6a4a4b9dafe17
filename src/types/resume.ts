export interface Subsection {
  name: string;
  lines: readonly string[];
}

export interface Section {
  name: string;
  content: readonly string[];
  subsections: readonly Subsection[];
}

export interface ResumeDocument {
  name: string;
  title: string;
  contact: readonly string[];
  sections: readonly Section[];
}

export type SectionKind = 'summary' | 'skills' | 'experience' | 'generic';

export type ValidationErrorKind = 'missing_name' | 'missing_title' | 'missing_sections';

export interface ResumeValidationError {
  kind: ValidationErrorKind;
  message: string;
}

export type ValidationResult =
  | { success: true }
  | { success: false; error: ResumeValidationError };

export type ConversionErrorKind =
  | 'input_not_found'
  | 'input_unreadable'
  | 'input_empty'
  | 'parse_malformed'
  | 'validation_failed'
  | 'permission_denied'
  | 'write_failed'
  | 'invalid_config';

export interface ConversionError {
  kind: ConversionErrorKind;
  message: string;
  /** Extra hints shown to the operator, e.g. nearby markdown files. */
  suggestions?: string[];
}

export type RenderErrorKind = Extract<ConversionErrorKind, 'permission_denied' | 'write_failed'>;

export interface RenderError {
  kind: RenderErrorKind;
  message: string;
}

export type RenderResult =
  | { success: true; pageCount: number }
  | { success: false; error: RenderError };
