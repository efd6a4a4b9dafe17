import type { FontFace, ResumeConfig } from './config.js';

export type Alignment = 'left' | 'center';

export interface ParagraphStyle {
  name: string;
  font: FontFace;
  fontSize: number;
  color: string;
  spaceBefore: number;
  spaceAfter: number;
  leading: number;
  leftIndent: number;
  alignment: Alignment;
}

export type StyleName =
  | 'Name'
  | 'Subtitle'
  | 'Contact'
  | 'SectionHeader'
  | 'JobTitle'
  | 'CompanyInfo'
  | 'ResumeBullet'
  | 'SkillCategory'
  | 'SkillList'
  | 'Summary';

/** Leading used when a style does not set one. */
export const DEFAULT_LEADING_RATIO = 1.2;

type StyleInput = Pick<ParagraphStyle, 'name' | 'font' | 'fontSize' | 'color'> & Partial<ParagraphStyle>;

export class StyleSheet {
  private readonly styles = new Map<string, ParagraphStyle>();

  register(input: StyleInput): ParagraphStyle {
    const style: ParagraphStyle = {
      spaceBefore: 0,
      spaceAfter: 0,
      leading: input.fontSize * DEFAULT_LEADING_RATIO,
      leftIndent: 0,
      alignment: 'left',
      ...input,
    };
    this.styles.set(style.name, style);
    return style;
  }

  has(name: string): boolean {
    return this.styles.has(name);
  }

  get(name: StyleName): ParagraphStyle {
    const style = this.styles.get(name);
    if (!style) throw new Error(`Style '${name}' is not registered`);
    return style;
  }

  names(): string[] {
    return [...this.styles.keys()];
  }
}

export function createStyleSheet(config: ResumeConfig): StyleSheet {
  const { colors, fonts, fontSizes: size, spacing } = config;
  const sheet = new StyleSheet();

  sheet.register({
    name: 'Name',
    font: fonts.bold,
    fontSize: size.name,
    color: colors.primary,
    spaceAfter: spacing.afterName,
    alignment: 'center',
  });
  sheet.register({
    name: 'Subtitle',
    font: fonts.base,
    fontSize: size.subtitle,
    color: colors.accent,
    spaceAfter: spacing.afterSubtitle,
    alignment: 'center',
  });
  sheet.register({
    name: 'Contact',
    font: fonts.base,
    fontSize: size.contact,
    color: colors.lightGray,
    spaceAfter: spacing.afterContact,
    alignment: 'center',
  });
  sheet.register({
    name: 'SectionHeader',
    font: fonts.bold,
    fontSize: size.sectionHeader,
    color: colors.primary,
    spaceBefore: spacing.beforeSection,
    spaceAfter: spacing.afterSectionHeader,
  });
  sheet.register({
    name: 'JobTitle',
    font: fonts.bold,
    fontSize: size.jobTitle,
    color: colors.darkGray,
    spaceAfter: spacing.afterJobTitle,
  });
  sheet.register({
    name: 'CompanyInfo',
    font: fonts.italic,
    fontSize: size.companyInfo,
    color: colors.lightGray,
    spaceAfter: spacing.afterCompanyInfo,
  });
  sheet.register({
    name: 'ResumeBullet',
    font: fonts.base,
    fontSize: size.bullet,
    color: colors.darkGray,
    spaceAfter: spacing.afterBullet,
    leftIndent: spacing.bulletIndent,
    leading: spacing.leadingBullet,
  });
  sheet.register({
    name: 'SkillCategory',
    font: fonts.bold,
    fontSize: size.skillCategory,
    color: colors.darkGray,
    spaceAfter: spacing.afterSkillCategory,
  });
  sheet.register({
    name: 'SkillList',
    font: fonts.base,
    fontSize: size.skillList,
    color: colors.darkGray,
    spaceAfter: spacing.afterSkillList,
    leading: spacing.leadingSkillList,
  });
  sheet.register({
    name: 'Summary',
    font: fonts.base,
    fontSize: size.summary,
    color: colors.darkGray,
    spaceAfter: spacing.afterSummary,
    leading: spacing.leadingSummary,
  });

  return sheet;
}
