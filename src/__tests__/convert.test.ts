import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

const { instance } = vi.hoisted(() => {
  const instance = {
    setFont: vi.fn(),
    setFontSize: vi.fn(),
    setTextColor: vi.fn(),
    setDrawColor: vi.fn(),
    setLineWidth: vi.fn(),
    line: vi.fn(),
    link: vi.fn(),
    getTextWidth: vi.fn((text: string) => text.length * 5),
    text: vi.fn(),
    addPage: vi.fn(),
    setPage: vi.fn(),
    getNumberOfPages: vi.fn(() => 1),
    output: vi.fn(() => new TextEncoder().encode('%PDF-1.3').buffer),
  };
  return { instance };
});

vi.mock('jspdf', () => ({
  jsPDF: vi.fn(function JsPDFCtor() {
    return instance;
  }),
}));

import { defaultConfig, type ResumeConfig } from '../lib/config.js';
import { convertResume } from '../lib/convert.js';

const RESUME = '# Jane Doe\n**Engineer**\njane@example.com\n## SKILLS\nTypeScript\n';
const now = () => new Date(2025, 1, 15);

let dir: string;
let config: ResumeConfig;

function configFor(root: string): ResumeConfig {
  const base = defaultConfig();
  return { ...base, paths: { inputsFolder: path.join(root, 'inputs'), outputsFolder: path.join(root, 'outputs') } };
}

beforeEach(() => {
  vi.clearAllMocks();
  dir = mkdtempSync(path.join(os.tmpdir(), 'resume-convert-'));
  config = configFor(dir);
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('convertResume', () => {
  it('converts a resume into the outputs folder', async () => {
    const input = path.join(dir, 'jane.md');
    writeFileSync(input, RESUME);

    const outcome = await convertResume({ inputFile: input, config, now });

    const output = path.join(dir, 'outputs', 'jane.pdf');
    expect(outcome).toEqual({ status: 'converted', inputPath: input, outputPath: output, pageCount: 1 });
    expect(readFileSync(output, 'utf-8')).toBe('%PDF-1.3');
    expect(instance.text).toHaveBeenCalledWith('Jane', expect.any(Number), expect.any(Number));
  });

  it('adds the .pdf extension to an explicit output path', async () => {
    const input = path.join(dir, 'jane.md');
    writeFileSync(input, RESUME);

    const outcome = await convertResume({ inputFile: input, outputFile: path.join(dir, 'custom'), config, now });

    expect(outcome).toMatchObject({ status: 'converted', outputPath: path.join(dir, 'custom.pdf') });
    expect(existsSync(path.join(dir, 'custom.pdf'))).toBe(true);
  });

  it('asks before converting a file without the .md extension', async () => {
    const input = path.join(dir, 'jane.txt');
    writeFileSync(input, RESUME);
    const confirm = vi.fn(async () => false);

    const outcome = await convertResume({ inputFile: input, config, confirm, now });

    expect(outcome).toEqual({ status: 'cancelled', reason: 'extension' });
    expect(confirm).toHaveBeenCalledWith('Continue anyway?');
  });

  it('skips every prompt when told to assume yes', async () => {
    const input = path.join(dir, 'jane.txt');
    writeFileSync(input, RESUME);
    const confirm = vi.fn(async () => false);

    const outcome = await convertResume({ inputFile: input, config, confirm, assumeYes: true, now });

    expect(outcome).toMatchObject({ status: 'converted', outputPath: path.join(dir, 'outputs', 'jane.pdf') });
    expect(confirm).not.toHaveBeenCalled();
  });

  it('asks before overwriting an existing PDF', async () => {
    const input = path.join(dir, 'jane.md');
    const output = path.join(dir, 'jane.pdf');
    writeFileSync(input, RESUME);
    writeFileSync(output, 'old');

    const declined = await convertResume({ inputFile: input, outputFile: output, config, confirm: async () => false, now });
    expect(declined).toEqual({ status: 'cancelled', reason: 'overwrite' });
    expect(readFileSync(output, 'utf-8')).toBe('old');

    const confirm = vi.fn(async () => true);
    const accepted = await convertResume({ inputFile: input, outputFile: output, config, confirm, now });
    expect(accepted).toMatchObject({ status: 'converted', outputPath: output });
    expect(confirm).toHaveBeenCalledWith('Overwrite?');
    expect(readFileSync(output, 'utf-8')).toBe('%PDF-1.3');
  });

  it('finds relative inputs in the inputs folder', async () => {
    const inputs = path.join(dir, 'inputs');
    const input = path.join(inputs, 'convert-test-only-3f9.md');
    mkdirSync(inputs);
    writeFileSync(input, RESUME);

    const outcome = await convertResume({ inputFile: 'convert-test-only-3f9.md', config, now });

    expect(outcome).toMatchObject({ status: 'converted', inputPath: input });
  });

  it('fails with suggestions when the input is missing', async () => {
    writeFileSync(path.join(dir, 'other.md'), RESUME);

    const outcome = await convertResume({ inputFile: path.join(dir, 'missing.md'), config, now });

    expect(outcome).toEqual({
      status: 'failed',
      error: {
        kind: 'input_not_found',
        message: `Input file not found: '${path.join(dir, 'missing.md')}'`,
        suggestions: [path.join(dir, 'other.md')],
      },
    });
  });

  it('fails on an empty input file', async () => {
    const input = path.join(dir, 'blank.md');
    writeFileSync(input, '\n\n');

    const outcome = await convertResume({ inputFile: input, config, now });

    expect(outcome).toEqual({
      status: 'failed',
      error: { kind: 'input_empty', message: `Input file '${input}' is empty` },
    });
  });

  it('fails validation before rendering anything', async () => {
    const input = path.join(dir, 'untitled.md');
    writeFileSync(input, '# Jane Doe\n## SKILLS\nTypeScript\n');

    const outcome = await convertResume({ inputFile: input, config, now });

    expect(outcome).toEqual({
      status: 'failed',
      error: { kind: 'validation_failed', message: 'Resume must contain a title (**Your Title**)' },
    });
    expect(instance.text).not.toHaveBeenCalled();
  });
});
