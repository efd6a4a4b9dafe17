import { mkdirSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import logger from './logger.js';

export const OUTPUT_EXTENSION = '.pdf';

// Invisible and bidirectional control characters that must not end up in a
// derived filename.
// Ranges covered:
//   U+0000-U+001F  C0 control characters
//   U+007F         DEL
//   U+200B-U+200F  zero-width chars and directional marks
//   U+202A-U+202E  bidirectional embedding / override controls
//   U+2066-U+2069  bidirectional isolate controls
//   U+FEFF         BOM / zero-width no-break space
const FILENAME_INVISIBLE_RE = /[\u0000-\u001f\u007f\u200b-\u200f\u202a-\u202e\u2066-\u2069\ufeff]/g;

export function expandHome(folder: string): string {
  if (folder === '~') return os.homedir();
  if (folder.startsWith('~/')) return path.join(os.homedir(), folder.slice(2));
  return folder;
}

/** Appends `.pdf` when the caller left the extension off. */
export function normalizeOutputPath(outputFile: string): string {
  return outputFile.toLowerCase().endsWith(OUTPUT_EXTENSION) ? outputFile : `${outputFile}${OUTPUT_EXTENSION}`;
}

export function pdfNameFor(inputFile: string): string {
  const base = path.basename(inputFile).normalize('NFKC').replace(FILENAME_INVISIBLE_RE, '');
  const dot = base.lastIndexOf('.');
  const stem = dot > 0 ? base.slice(0, dot) : base;
  return `${stem || 'resume'}${OUTPUT_EXTENSION}`;
}

/**
 * Default output location for an input file: the outputs folder when one is
 * configured (created on demand), otherwise beside the input.
 */
export function buildOutputPath(inputFile: string, outputsFolder: string, useOutputsFolder = true): string {
  const pdfName = pdfNameFor(inputFile);

  if (useOutputsFolder && outputsFolder) {
    const folder = expandHome(outputsFolder);
    try {
      mkdirSync(folder, { recursive: true });
    } catch (error) {
      logger.warn({ folder, err: error }, 'Could not create outputs folder; saving to current directory instead');
      return pdfName;
    }
    return path.join(folder, pdfName);
  }

  const inputDir = path.dirname(inputFile);
  return inputDir && inputDir !== '.' ? path.join(inputDir, pdfName) : pdfName;
}
