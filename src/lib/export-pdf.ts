import type { RenderResult, ResumeDocument } from '../types/resume.js';
import type { ResumeConfig } from './config.js';
import { DurationCalculator } from './duration.js';
import type { FuzzyDateParser } from './fuzzy-date.js';
import logger from './logger.js';
import type { LayoutBlock } from './pdf-blocks.js';
import { PdfLayoutEngine } from './pdf-layout.js';
import { createStyleSheet } from './pdf-styles.js';
import { renderHeader, renderSection, type RenderContext } from './section-renderers.js';

export interface RenderOptions {
  /** Clock for "Present" date ranges. */
  now?: () => Date;
  /** `null` disables duration annotations regardless of configuration. */
  dateParser?: FuzzyDateParser | null;
}

export function createDurationCalculator(config: ResumeConfig, options: RenderOptions = {}): DurationCalculator {
  return new DurationCalculator({
    enabled: config.features.calculateDurations,
    ...(options.dateParser !== undefined ? { dateParser: options.dateParser } : {}),
    ...(options.now ? { now: options.now } : {}),
  });
}

/**
 * Header blocks followed by every section in source order. The stylesheet is
 * built once per call.
 */
export function buildResumeBlocks(
  resume: ResumeDocument,
  config: ResumeConfig,
  duration: DurationCalculator = createDurationCalculator(config),
): LayoutBlock[] {
  const ctx: RenderContext = { styles: createStyleSheet(config), config, duration };
  const blocks: LayoutBlock[] = [];

  renderHeader(blocks, resume, ctx);
  for (const section of resume.sections) {
    renderSection(blocks, section, ctx);
  }
  return blocks;
}

export function renderResumePdf(
  resume: ResumeDocument,
  outputPath: string,
  config: ResumeConfig,
  options: RenderOptions = {},
): RenderResult {
  const duration = createDurationCalculator(config, options);
  if (config.features.calculateDurations && !duration.canComputeDurations()) {
    logger.warn('Date parsing unavailable; duration annotations will be skipped');
  }

  let result: RenderResult;
  try {
    const engine = new PdfLayoutEngine({
      size: config.page.size,
      margins: config.page.margins,
      showPageNumbers: config.features.showPageNumbers,
      footerFont: config.fonts.base,
    });
    engine.append(buildResumeBlocks(resume, config, duration));
    result = engine.build(outputPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Failed to generate PDF';
    result = { success: false, error: { kind: 'write_failed', message: `Error creating PDF: ${message}` } };
  }

  if (result.success) {
    logger.debug({ outputPath, pageCount: result.pageCount, sections: resume.sections.length }, 'PDF written');
  } else {
    logger.debug({ outputPath, kind: result.error.kind }, 'PDF generation failed');
  }
  return result;
}
