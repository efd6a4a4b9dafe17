import { existsSync } from 'node:fs';
import type { ConversionError, ResumeDocument } from '../types/resume.js';
import type { ResumeConfig } from './config.js';
import { buildOutputPath, normalizeOutputPath } from './export-filename.js';
import { renderResumePdf } from './export-pdf.js';
import { hasExpectedExtension, INPUT_EXTENSION, readMarkdownFile, resolveInputFile } from './input-file.js';
import { createRunLogger } from './logger.js';
import { parseResumeMarkdown } from './markdown-parser.js';
import { confirm as promptConfirm } from './prompt.js';
import { validateResume } from './resume-validation.js';

export interface ConvertOptions {
  inputFile: string;
  /** Explicit output path; `.pdf` is appended when missing. */
  outputFile?: string;
  config: ResumeConfig;
  /** Skip the extension and overwrite confirmations. */
  assumeYes?: boolean;
  confirm?: (question: string) => Promise<boolean>;
  now?: () => Date;
}

export type ConversionOutcome =
  | { status: 'converted'; inputPath: string; outputPath: string; pageCount: number }
  | { status: 'cancelled'; reason: string }
  | { status: 'failed'; error: ConversionError };

function failed(error: ConversionError): ConversionOutcome {
  return { status: 'failed', error };
}

export function parseSafely(markdown: string, config: ResumeConfig):
  | { success: true; resume: ResumeDocument }
  | { success: false; error: ConversionError } {
  try {
    return { success: true, resume: parseResumeMarkdown(markdown, { contactLocations: config.contactLocations }) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      success: false,
      error: {
        kind: 'parse_malformed',
        message: `Error parsing markdown: ${message}`,
        suggestions: ['Make sure your markdown file follows the expected resume format'],
      },
    };
  }
}

export async function convertResume(options: ConvertOptions): Promise<ConversionOutcome> {
  const { inputFile, config } = options;
  const ask = options.confirm ?? ((question: string) => promptConfirm(question));
  const log = createRunLogger(inputFile);

  if (!hasExpectedExtension(inputFile) && !options.assumeYes) {
    log.warn(`Input file '${inputFile}' doesn't have a ${INPUT_EXTENSION} extension`);
    if (!(await ask('Continue anyway?'))) return { status: 'cancelled', reason: 'extension' };
  }

  const outputPath = options.outputFile !== undefined
    ? normalizeOutputPath(options.outputFile)
    : buildOutputPath(inputFile, config.paths.outputsFolder);

  if (existsSync(outputPath) && !options.assumeYes) {
    log.warn(`Output file '${outputPath}' already exists`);
    if (!(await ask('Overwrite?'))) return { status: 'cancelled', reason: 'overwrite' };
  }

  log.info(`Converting '${inputFile}' to PDF...`);

  const resolved = resolveInputFile(inputFile, config.paths.inputsFolder);
  if (!resolved.success) return failed(resolved.error);
  if (resolved.fromInputsFolder) log.info(`Found file in inputs folder: ${resolved.path}`);

  const read = readMarkdownFile(resolved.path);
  if (!read.success) return failed(read.error);

  const parsed = parseSafely(read.content, config);
  if (!parsed.success) return failed(parsed.error);

  const validation = validateResume(parsed.resume);
  if (!validation.success) {
    return failed({ kind: 'validation_failed', message: validation.error.message });
  }

  const rendered = renderResumePdf(parsed.resume, outputPath, config, options.now ? { now: options.now } : {});
  if (!rendered.success) return failed(rendered.error);

  return { status: 'converted', inputPath: resolved.path, outputPath, pageCount: rendered.pageCount };
}
