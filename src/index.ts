#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig, type ResumeConfig } from './lib/config.js';
import { convertResume, type ConversionOutcome } from './lib/convert.js';
import logger from './lib/logger.js';

export { parseResumeMarkdown } from './lib/markdown-parser.js';
export { validateResume } from './lib/resume-validation.js';
export { formatInline, formatContactLine } from './lib/inline-format.js';
export { DurationCalculator } from './lib/duration.js';
export { buildResumeBlocks, renderResumePdf } from './lib/export-pdf.js';
export { loadConfig, defaultConfig, resumeConfigSchema } from './lib/config.js';
export { convertResume } from './lib/convert.js';
export type * from './types/resume.js';

const USAGE = [
  'Markdown to PDF Resume Converter',
  '',
  'Usage:',
  '  resume-pdf <input.md> [output.pdf] [--config resume.config.json] [--yes]',
  '',
  'Examples:',
  '  resume-pdf resume.md',
  '  resume-pdf resume.md my_resume.pdf',
].join('\n');

export interface CliIo {
  confirm?: (question: string) => Promise<boolean>;
  now?: () => Date;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function reportOutcome(outcome: ConversionOutcome): number {
  switch (outcome.status) {
    case 'converted':
      logger.info({ output: outcome.outputPath, pages: outcome.pageCount }, 'Resume PDF created successfully');
      return 0;
    case 'cancelled':
      logger.info({ reason: outcome.reason }, 'Cancelled');
      return 0;
    case 'failed':
      logger.error(
        { kind: outcome.error.kind, suggestions: outcome.error.suggestions },
        outcome.error.message,
      );
      return 1;
  }
}

/** Runs the converter for `argv` (without the node/script prefix); resolves to the exit code. */
export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`${message}\n${USAGE}`);
    return 1;
  }

  const loaded = loadConfig({
    ...(parsed.values.config !== undefined ? { configPath: parsed.values.config } : {}),
    ...(io.cwd !== undefined ? { cwd: io.cwd } : {}),
    ...(io.env !== undefined ? { env: io.env } : {}),
  });
  if (!loaded.success) {
    logger.error({ kind: 'invalid_config' }, loaded.error);
    return 1;
  }
  const config: ResumeConfig = loaded.config;

  const [inputFile, outputFile] = parsed.positionals;
  if (parsed.values.help || inputFile === undefined) {
    const folders = [
      config.paths.inputsFolder ? `Configured inputs folder: ${config.paths.inputsFolder}` : '',
      config.paths.outputsFolder ? `Configured exports folder: ${config.paths.outputsFolder}` : '',
    ].filter(Boolean);
    if (parsed.values.help) {
      logger.info([USAGE, ...folders].join('\n'));
      return 0;
    }
    logger.error(['No input file specified', USAGE, ...folders].join('\n'));
    return 1;
  }

  const fromCwd = (file: string) => (io.cwd !== undefined ? path.resolve(io.cwd, file) : file);
  const outcome = await convertResume({
    inputFile: fromCwd(inputFile),
    ...(outputFile !== undefined ? { outputFile: fromCwd(outputFile) } : {}),
    config,
    assumeYes: parsed.values.yes ?? false,
    ...(io.confirm ? { confirm: io.confirm } : {}),
    ...(io.now ? { now: io.now } : {}),
  });
  return reportOutcome(outcome);
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      yes: { type: 'boolean', short: 'y' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/** True when `argv[1]` (possibly a `bin` symlink) points at this module. */
export function isMainModule(argv: readonly string[] = process.argv): boolean {
  const entry = argv[1];
  if (!entry) return false;
  try {
    return realpathSync(path.resolve(entry)) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isMainModule()) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error({ err: error }, 'Unexpected error. Please check your markdown file format and try again');
      process.exitCode = 1;
    });
}
