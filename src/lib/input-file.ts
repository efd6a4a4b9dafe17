import { existsSync, readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import type { ConversionError } from '../types/resume.js';
import { expandHome } from './export-filename.js';
import logger from './logger.js';

export const INPUT_EXTENSION = '.md';
const MAX_SUGGESTIONS = 5;

export type ResolveInputResult =
  | { success: true; path: string; fromInputsFolder: boolean }
  | { success: false; error: ConversionError };

export type ReadInputResult =
  | { success: true; content: string }
  | { success: false; error: ConversionError };

export function hasExpectedExtension(inputFile: string, expected = INPUT_EXTENSION): boolean {
  return inputFile.endsWith(expected);
}

/** Up to five `.md` files per directory, labelled with the directory they live in. */
export function findMarkdownSuggestions(directories: string[]): string[] {
  const suggestions: string[] = [];
  for (const dir of directories) {
    let entries: string[];
    try {
      entries = readdirSync(dir);
    } catch (error) {
      logger.debug({ dir, err: error }, 'Skipping unreadable directory while looking for suggestions');
      continue;
    }
    const markdown = entries.filter((entry) => entry.endsWith(INPUT_EXTENSION)).slice(0, MAX_SUGGESTIONS);
    suggestions.push(...markdown.map((entry) => path.join(dir, entry)));
  }
  return suggestions;
}

/**
 * Finds the input at the given path, or, for a relative path, inside the
 * configured inputs folder.
 */
export function resolveInputFile(inputFile: string, inputsFolder: string): ResolveInputResult {
  if (existsSync(inputFile)) {
    return { success: true, path: path.resolve(inputFile), fromInputsFolder: false };
  }

  const folder = inputsFolder ? expandHome(inputsFolder) : '';
  if (folder && !path.isAbsolute(inputFile)) {
    const alternate = path.join(folder, inputFile);
    if (existsSync(alternate)) {
      return { success: true, path: path.resolve(alternate), fromInputsFolder: true };
    }
  }

  const searchDirs = [path.dirname(inputFile) || '.'];
  if (folder && existsSync(folder) && path.resolve(folder) !== path.resolve(searchDirs[0])) {
    searchDirs.push(folder);
  }

  return {
    success: false,
    error: {
      kind: 'input_not_found',
      message: `Input file not found: '${inputFile}'`,
      suggestions: findMarkdownSuggestions(searchDirs),
    },
  };
}

export function readMarkdownFile(filePath: string): ReadInputResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;
    if (code === 'EACCES' || code === 'EPERM') {
      return {
        success: false,
        error: {
          kind: 'input_unreadable',
          message: `Permission denied reading '${filePath}'. Check file permissions and try again.`,
        },
      };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { success: false, error: { kind: 'input_unreadable', message: `Error reading file '${filePath}': ${message}` } };
  }

  if (!content.trim()) {
    return { success: false, error: { kind: 'input_empty', message: `Input file '${filePath}' is empty` } };
  }

  return { success: true, content };
}
