export const SECTION_KINDS = [
  'CONTACT',
  'SUMMARY',
  'SKILLS',
  'EXPERIENCE',
  'PROJECTS',
  'EDUCATION',
  'CERTIFICATIONS',
  'OTHER',
] as const;

export type SectionKind = (typeof SECTION_KINDS)[number];

export const SKILL_CATEGORIES = [
  'LANGUAGE',
  'FRAMEWORK',
  'TOOL',
  'SOFT_SKILL',
  'DOMAIN',
] as const;

export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export type MetricType = 'PERCENT' | 'CURRENCY' | 'COUNT' | 'DURATION';

export type ExperienceLevel = 'entry' | 'mid' | 'senior';

// Normalized text of one resume
export interface RawDocument {
  readonly lines: readonly string[];
  readonly bulletLineIndexes: readonly number[];
  readonly sourceByteSize: number;
}

export interface SectionLine {
  index: number;
  text: string;
  bullet: boolean;
}

/**
 * A labeled block of the document. `start`/`end` is the half-open line
 * range, heading line included; `body` holds the lines after the heading
 * (plus inline content of a `Label: content` heading).
 */
export interface Section {
  kind: SectionKind;
  heading: string | null;
  start: number;
  end: number;
  body: SectionLine[];
}

export interface ContactInfo {
  email: string | null;
  phone: string | null;
  location: string | null;
}

export interface SkillToken {
  raw: string;
  canonical: string;
  category: SkillCategory;
  confidence: 'exact' | 'fuzzy';
}

export interface QuantifiedClaim {
  lineIndex: number;
  sectionKind: 'EXPERIENCE' | 'PROJECTS';
  metricType: MetricType;
  value: number;
  text: string;
}

export interface DateRange {
  raw: string;
  startYear: number;
  startMonth: number | null;
  endYear: number | null;
  endMonth: number | null;
  current: boolean;
}

export interface ExperienceEntry {
  sectionKind: 'EXPERIENCE' | 'PROJECTS';
  lineIndex: number;
  title: string | null;
  dateRange: DateRange | null;
}

export interface SectionCoverage {
  sections: number;
  lines: number;
}

export interface ProfileStats {
  wordCount: number;
  lineCount: number;
  bulletLineCount: number;
  actionVerbLineCount: number;
  projectCount: number;
  experienceYears: number;
  experienceLevel: ExperienceLevel;
  hasEducation: boolean;
}

export interface ResumeProfile {
  contact: ContactInfo;
  skills: SkillToken[];
  quantifiedClaims: QuantifiedClaim[];
  experience: ExperienceEntry[];
  sectionCoverage: Record<SectionKind, SectionCoverage>;
  headingCount: number;
  stats: ProfileStats;
}
