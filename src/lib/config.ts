import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const hexColor = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Expected a #rrggbb colour');
const points = z.number().nonnegative();

export const FONT_STYLES = ['normal', 'bold', 'italic', 'bolditalic'] as const;
export type FontStyle = (typeof FONT_STYLES)[number];

const fontFaceSchema = z.object({
  family: z.string().min(1),
  style: z.enum(FONT_STYLES),
});

export type FontFace = z.infer<typeof fontFaceSchema>;

export const PAGE_SIZES = {
  letter: [612, 792],
  a4: [595.28, 841.89],
  legal: [612, 1008],
} as const satisfies Record<string, readonly [number, number]>;

export type PageSizeName = keyof typeof PAGE_SIZES;

export const DEFAULT_CONTACT_LOCATIONS = [
  'Florida',
  'California',
  'New York',
  'Texas',
  'USA',
  'Remote',
];

export const resumeConfigSchema = z.object({
  colors: z.object({
    primary: hexColor.default('#1e40af'),
    accent: hexColor.default('#1e3a8a'),
    lightGray: hexColor.default('#6b7280'),
    darkGray: hexColor.default('#1f2937'),
    link: hexColor.default('#0000ff'),
  }).default({}),
  fonts: z.object({
    base: fontFaceSchema.default({ family: 'helvetica', style: 'normal' }),
    bold: fontFaceSchema.default({ family: 'helvetica', style: 'bold' }),
    italic: fontFaceSchema.default({ family: 'helvetica', style: 'italic' }),
  }).default({}),
  fontSizes: z.object({
    name: points.default(24),
    subtitle: points.default(12),
    contact: points.default(9),
    sectionHeader: points.default(13),
    jobTitle: points.default(11),
    companyInfo: points.default(10),
    bullet: points.default(9.5),
    skillCategory: points.default(10),
    skillList: points.default(9),
    summary: points.default(10),
  }).default({}),
  page: z.object({
    size: z.enum(['letter', 'a4', 'legal']).default('letter'),
    margins: z.object({
      top: points.default(36),
      bottom: points.default(36),
      left: points.default(54),
      right: points.default(54),
    }).default({}),
  }).default({}),
  spacing: z.object({
    afterName: points.default(6),
    afterSubtitle: points.default(12),
    afterContact: points.default(20),
    afterSectionHeader: points.default(8),
    afterJobTitle: points.default(2),
    afterCompanyInfo: points.default(6),
    afterBullet: points.default(4),
    afterSkillCategory: points.default(2),
    afterSkillList: points.default(6),
    afterSummary: points.default(12),
    beforeSection: points.default(12),
    leadingBullet: points.default(12),
    leadingSummary: points.default(13),
    leadingSkillList: points.default(11),
    bulletIndent: points.default(12),
  }).default({}),
  divider: z.object({
    width: points.default(504),
    thickness: points.default(1),
    /** Falls back to the primary colour. */
    color: hexColor.optional(),
  }).default({}),
  paths: z.object({
    inputsFolder: z.string().default('inputs'),
    outputsFolder: z.string().default('outputs'),
  }).default({}),
  features: z.object({
    calculateDurations: z.boolean().default(true),
    keepSectionsTogether: z.boolean().default(true),
    showPageNumbers: z.boolean().default(false),
  }).default({}),
  contactLocations: z.array(z.string().min(1)).default(DEFAULT_CONTACT_LOCATIONS),
});

export type ResumeConfig = z.infer<typeof resumeConfigSchema>;

export const DEFAULT_CONFIG_FILENAME = 'resume.config.json';

export function defaultConfig(): ResumeConfig {
  return resumeConfigSchema.parse({});
}

function envBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const val = env[key];
  if (val === undefined) return fallback;
  return val === '1' || val.toLowerCase() === 'true';
}

function envString(env: NodeJS.ProcessEnv, key: string, fallback: string): string {
  const val = env[key];
  return val === undefined ? fallback : val.trim();
}

export function applyEnvOverrides(config: ResumeConfig, env: NodeJS.ProcessEnv): ResumeConfig {
  return {
    ...config,
    paths: {
      inputsFolder: envString(env, 'RESUME_INPUTS_FOLDER', config.paths.inputsFolder),
      outputsFolder: envString(env, 'RESUME_OUTPUTS_FOLDER', config.paths.outputsFolder),
    },
    features: {
      calculateDurations: envBool(env, 'RESUME_CALCULATE_DURATIONS', config.features.calculateDurations),
      keepSectionsTogether: envBool(env, 'RESUME_KEEP_SECTIONS_TOGETHER', config.features.keepSectionsTogether),
      showPageNumbers: envBool(env, 'RESUME_PAGE_NUMBERS', config.features.showPageNumbers),
    },
  };
}

export interface LoadConfigOptions {
  /** Explicit config file. When omitted, resume.config.json in cwd is used if present. */
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export type LoadConfigResult =
  | { success: true; config: ResumeConfig; source: string | null }
  | { success: false; error: string; issues?: z.ZodIssue[] };

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const explicit = options.configPath !== undefined;
  const source = path.resolve(cwd, options.configPath ?? DEFAULT_CONFIG_FILENAME);

  let raw: unknown = {};
  if (existsSync(source)) {
    try {
      raw = JSON.parse(readFileSync(source, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { success: false, error: `Could not read config file '${source}': ${message}` };
    }
  } else if (explicit) {
    return { success: false, error: `Config file not found: '${source}'` };
  }

  const parsed = resumeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: `Invalid config in '${source}': ${formatIssues(parsed.error.issues)}`,
      issues: parsed.error.issues,
    };
  }

  return {
    success: true,
    config: applyEnvOverrides(parsed.data, env),
    source: existsSync(source) ? source : null,
  };
}
