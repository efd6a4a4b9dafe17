import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { applyEnvOverrides, DEFAULT_CONFIG_FILENAME, defaultConfig, loadConfig } from '../lib/config.js';

describe('defaultConfig', () => {
  it('fills every group with its defaults', () => {
    const config = defaultConfig();
    expect(config.page).toEqual({ size: 'letter', margins: { top: 36, bottom: 36, left: 54, right: 54 } });
    expect(config.features).toEqual({ calculateDurations: true, keepSectionsTogether: true, showPageNumbers: false });
    expect(config.paths).toEqual({ inputsFolder: 'inputs', outputsFolder: 'outputs' });
    expect(config.colors.link).toBe('#0000ff');
    expect(config.contactLocations).toContain('Remote');
  });
});

describe('applyEnvOverrides', () => {
  it('reads feature flags and folders from the environment', () => {
    const config = applyEnvOverrides(defaultConfig(), {
      RESUME_CALCULATE_DURATIONS: 'false',
      RESUME_PAGE_NUMBERS: '1',
      RESUME_KEEP_SECTIONS_TOGETHER: 'TRUE',
      RESUME_OUTPUTS_FOLDER: ' pdfs ',
    });
    expect(config.features).toEqual({ calculateDurations: false, keepSectionsTogether: true, showPageNumbers: true });
    expect(config.paths).toEqual({ inputsFolder: 'inputs', outputsFolder: 'pdfs' });
  });

  it('treats anything other than 1 or true as off', () => {
    const config = applyEnvOverrides(defaultConfig(), { RESUME_KEEP_SECTIONS_TOGETHER: 'yes' });
    expect(config.features.keepSectionsTogether).toBe(false);
  });

  it('allows clearing a folder', () => {
    expect(applyEnvOverrides(defaultConfig(), { RESUME_INPUTS_FOLDER: '' }).paths.inputsFolder).toBe('');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'resume-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', () => {
    const result = loadConfig({ cwd: dir, env: {} });
    expect(result).toEqual({ success: true, config: defaultConfig(), source: null });
  });

  it('merges the config file found in the working directory', () => {
    const file = path.join(dir, DEFAULT_CONFIG_FILENAME);
    writeFileSync(file, JSON.stringify({ page: { size: 'a4' }, features: { showPageNumbers: true } }));

    const result = loadConfig({ cwd: dir, env: {} });
    if (!result.success) throw new Error(result.error);
    expect(result.source).toBe(file);
    expect(result.config.page).toEqual({ size: 'a4', margins: { top: 36, bottom: 36, left: 54, right: 54 } });
    expect(result.config.features.showPageNumbers).toBe(true);
    expect(result.config.features.calculateDurations).toBe(true);
  });

  it('lets the environment override the file', () => {
    writeFileSync(path.join(dir, DEFAULT_CONFIG_FILENAME), JSON.stringify({ features: { showPageNumbers: true } }));
    const result = loadConfig({ cwd: dir, env: { RESUME_PAGE_NUMBERS: '0' } });
    if (!result.success) throw new Error(result.error);
    expect(result.config.features.showPageNumbers).toBe(false);
  });

  it('fails when an explicit config file is missing', () => {
    expect(loadConfig({ cwd: dir, env: {}, configPath: 'missing.json' })).toEqual({
      success: false,
      error: `Config file not found: '${path.join(dir, 'missing.json')}'`,
    });
  });

  it('fails on unreadable JSON', () => {
    writeFileSync(path.join(dir, 'broken.json'), '{ nope');
    const result = loadConfig({ cwd: dir, env: {}, configPath: 'broken.json' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toMatch(/^Could not read config file '.*broken\.json': /);
  });

  it('reports schema violations with their paths', () => {
    const file = path.join(dir, 'custom.json');
    writeFileSync(file, JSON.stringify({ colors: { primary: 'blue' } }));

    const result = loadConfig({ cwd: dir, env: {}, configPath: 'custom.json' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBe(`Invalid config in '${file}': colors.primary: Expected a #rrggbb colour`);
    expect(result.issues?.map((issue) => issue.path)).toEqual([['colors', 'primary']]);
  });
});
