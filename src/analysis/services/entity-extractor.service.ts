import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ContactInfo,
  DateRange,
  ExperienceEntry,
  ExperienceLevel,
  ResumeProfile,
  ScoringConfig,
  Section,
  SectionCoverage,
  SectionKind,
  SectionLine,
  SkillDefinition,
  SkillToken,
} from '../../common/interfaces';
import { deepFreeze } from '../../common/utils/object.utils';
import {
  FUZZY_MIN_LENGTH,
  compactKey,
  countWords,
  skillKey,
  tokenizeForSkills,
} from '../../common/utils/text.utils';
import { QuantificationDetectorService } from './quantification-detector.service';

export interface ExtractionOptions {
  // End of open ranges ("Present"); defaults to now
  referenceDate?: Date;
}

type EntrySectionKind = ExperienceEntry['sectionKind'];

const EMAIL = /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/;
const PHONE_CANDIDATE = /\+?\(?\d[\d\s().-]{8,}\d/g;
const LOCATION_LABEL = /^location\s*:\s*(.+)$/i;
const CITY_REGION = /^[A-Za-z][A-Za-z .'-]*,\s*[A-Za-z][A-Za-z .'-]*$/;
const CONTACT_SEPARATOR = /\s*[|\u2022\u00B7]\s*/;

const MONTH_NAME =
  '(?:jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)';
const DATE_TOKEN = `(?:${MONTH_NAME}\\.?\\s+\\d{4}|\\d{1,2}\\/\\d{4}|\\d{4})`;
const DATE_RANGE = new RegExp(
  `\\b(${DATE_TOKEN})\\s*(?:-|\\u2013|\\u2014|to)\\s*(${DATE_TOKEN}|present|current|now)\\b`,
  'gi',
);
const OPEN_END = /^(?:present|current|now)$/i;
const TITLE_TRIM = /^[\s|,;:()@\u2013\u2014-]+|[\s|,;:()@\u2013\u2014-]+$/g;

const MONTHS: Record<string, number> = {
  jan: 1, january: 1, feb: 2, february: 2, mar: 3, march: 3,
  apr: 4, april: 4, may: 5, jun: 6, june: 6, jul: 7, july: 7,
  aug: 8, august: 8, sep: 9, sept: 9, september: 9, oct: 10, october: 10,
  nov: 11, november: 11, dec: 12, december: 12,
};

const MIN_YEAR = 1950;
const MAX_YEAR = 2100;

const VERB_FOLLOWERS = new Set(['at', 'in']);

const SKILL_SECTIONS: SectionKind[] = ['SKILLS', 'EXPERIENCE', 'PROJECTS'];

const isEntrySection = (kind: SectionKind): kind is EntrySectionKind =>
  kind === 'EXPERIENCE' || kind === 'PROJECTS';

// Everything above the first heading, labeled CONTACT or SUMMARY by the segmenter
const isHeaderBlock = (section: Section): boolean =>
  section.heading === null && (section.kind === 'CONTACT' || section.kind === 'SUMMARY');

interface PartialDate {
  year: number;
  month: number | null;
}

@Injectable()
export class EntityExtractorService {
  private readonly logger = new Logger(EntityExtractorService.name);
  private readonly exactSkills = new Map<string, SkillDefinition>();
  private readonly fuzzySkills = new Map<string, SkillDefinition>();
  private readonly longestSkill: number;
  private readonly actionVerbs: Set<string>;
  private readonly verbSkills: Set<string>;

  constructor(
    @Inject('SCORING_CONFIG') private readonly config: ScoringConfig,
    private readonly quantificationDetector: QuantificationDetectorService,
  ) {
    let longest = 1;
    for (const skill of config.taxonomy) {
      for (const key of [skillKey(skill.canonical), ...skill.aliases.map(skillKey)]) {
        if (!this.exactSkills.has(key)) this.exactSkills.set(key, skill);
        const compact = compactKey(key);
        if (compact.length >= FUZZY_MIN_LENGTH && !this.fuzzySkills.has(compact)) {
          this.fuzzySkills.set(compact, skill);
        }
        longest = Math.max(longest, key.split(' ').length);
      }
    }
    this.longestSkill = longest;
    this.actionVerbs = new Set(config.lexicon.actionVerbs.map((verb) => verb.toLowerCase()));
    this.verbSkills = new Set(config.lexicon.verbSkills.map(skillKey));
  }

  /**
   * Build the structured profile for a segmented document. Fields that
   * cannot be found are left null or empty; nothing here throws for
   * malformed content.
   */
  extract(sections: Section[], options: ExtractionOptions = {}): ResumeProfile {
    const referenceDate = options.referenceDate ?? new Date();

    const contact = this.extractContact(sections);
    const skills = this.extractSkills(sections);
    const quantifiedClaims = this.quantificationDetector.detect(sections);
    const experience = sections.flatMap((section) => this.extractEntries(section));

    const sectionCoverage = this.coverage(sections);
    const experienceYears = this.experienceYears(experience, referenceDate);
    const bodyLines = sections.flatMap((section) => section.body);

    const profile: ResumeProfile = {
      contact,
      skills,
      quantifiedClaims,
      experience,
      sectionCoverage,
      headingCount: sections.filter((section) => section.heading !== null).length,
      stats: {
        wordCount: sections.reduce(
          (sum, section) =>
            sum +
            countWords(section.heading ?? '') +
            section.body.reduce((lineSum, line) => lineSum + countWords(line.text), 0),
          0,
        ),
        lineCount: sections.reduce((sum, section) => sum + (section.end - section.start), 0),
        bulletLineCount: bodyLines.filter((line) => line.bullet).length,
        actionVerbLineCount: this.countActionVerbLines(sections),
        projectCount: experience.filter((entry) => entry.sectionKind === 'PROJECTS').length,
        experienceYears,
        experienceLevel: this.levelFor(experienceYears),
        hasEducation: sectionCoverage.EDUCATION.sections > 0,
      },
    };

    this.logger.debug(
      `Extracted ${skills.length} skills, ${experience.length} entries, ${quantifiedClaims.length} claims`,
    );
    return deepFreeze(profile);
  }

  private extractContact(sections: Section[]): ContactInfo {
    const contact: ContactInfo = { email: null, phone: null, location: null };

    for (const section of sections.filter(isHeaderBlock)) {
      for (const { text } of section.body) {
        contact.email ??= findEmail(text);
        contact.phone ??= findPhone(text);
        contact.location ??= findLocation(text);
      }
    }
    return contact;
  }

  private extractSkills(sections: Section[]): SkillToken[] {
    const found = new Map<string, SkillToken>();

    for (const section of sections) {
      if (!SKILL_SECTIONS.includes(section.kind)) continue;
      for (const line of section.body) {
        for (const token of this.matchSkills(line.text)) {
          const existing = found.get(token.canonical);
          if (!existing || (existing.confidence === 'fuzzy' && token.confidence === 'exact')) {
            found.set(token.canonical, token);
          }
        }
      }
    }
    return Array.from(found.values());
  }

  // Greedy longest n-gram match; exact keys win over fuzzy keys of equal length
  private matchSkills(text: string): SkillToken[] {
    const tokens = tokenizeForSkills(text);
    const matches: SkillToken[] = [];

    let position = 0;
    while (position < tokens.length) {
      let consumed = 0;
      const longest = Math.min(this.longestSkill, tokens.length - position);

      for (let size = longest; size > 0 && consumed === 0; size--) {
        const phrase = tokens.slice(position, position + size).join(' ');
        if (size === 1 && this.isVerbUse(phrase, tokens[position + 1])) continue;
        const exact = this.exactSkills.get(phrase);
        if (exact) {
          matches.push(toSkillToken(phrase, exact, 'exact'));
          consumed = size;
          continue;
        }
        const compact = compactKey(phrase);
        const fuzzy =
          compact.length >= FUZZY_MIN_LENGTH ? this.fuzzySkills.get(compact) : undefined;
        if (fuzzy) {
          matches.push(toSkillToken(phrase, fuzzy, 'fuzzy'));
          consumed = size;
        }
      }
      position += consumed > 0 ? consumed : 1;
    }
    return matches;
  }

  // "excel at", "excel in" use the word as a verb, not as the skill
  private isVerbUse(token: string, next: string | undefined): boolean {
    return this.verbSkills.has(token) && next !== undefined && VERB_FOLLOWERS.has(next);
  }

  private extractEntries(section: Section): ExperienceEntry[] {
    const sectionKind = section.kind;
    if (!isEntrySection(sectionKind)) return [];

    const entries: ExperienceEntry[] = [];
    section.body.forEach((line, position) => {
      if (line.bullet) return;
      const match = findDateRange(line.text);
      if (!match) return;

      const remainder = line.text.replace(match[0], '').replace(TITLE_TRIM, '');
      entries.push({
        sectionKind,
        lineIndex: line.index,
        title: remainder.length > 0 ? remainder : previousTitle(section.body, position),
        dateRange: parseDateRange(match[0], match[1], match[2]),
      });
    });

    if (entries.length === 0) {
      const first = section.body.find((line) => !line.bullet);
      if (first) {
        entries.push({ sectionKind, lineIndex: first.index, title: first.text, dateRange: null });
      }
    }
    return entries;
  }

  private coverage(sections: Section[]): Record<SectionKind, SectionCoverage> {
    const coverage = emptyCoverage();
    for (const section of sections) {
      coverage[section.kind].sections += 1;
      coverage[section.kind].lines += section.body.length;
    }
    return coverage;
  }

  private countActionVerbLines(sections: Section[]): number {
    return sections
      .filter((section) => isEntrySection(section.kind))
      .flatMap((section) => section.body)
      .filter((line) => {
        const firstWord = line.text.split(/\s+/)[0].toLowerCase().replace(/[^a-z]/g, '');
        return this.actionVerbs.has(firstWord);
      }).length;
  }

  // Union of EXPERIENCE date ranges, in years with one decimal
  private experienceYears(entries: ExperienceEntry[], referenceDate: Date): number {
    const now = referenceDate.getUTCFullYear() * 12 + referenceDate.getUTCMonth();
    const intervals = entries
      .filter((entry) => entry.sectionKind === 'EXPERIENCE')
      .flatMap((entry) => (entry.dateRange ? [toMonthInterval(entry.dateRange, now)] : []))
      .filter(([start, end]) => end > start)
      .sort((a, b) => a[0] - b[0]);

    let months = 0;
    let current: [number, number] | null = null;
    for (const [start, end] of intervals) {
      if (current && start <= current[1]) {
        current[1] = Math.max(current[1], end);
        continue;
      }
      if (current) months += current[1] - current[0];
      current = [start, end];
    }
    if (current) months += current[1] - current[0];

    return Math.round((months / 12) * 10) / 10;
  }

  private levelFor(years: number): ExperienceLevel {
    let level: ExperienceLevel = 'entry';
    for (const band of this.config.seniority) {
      if (years >= band.minYears) level = band.level;
    }
    return level;
  }
}

const emptyCoverage = (): Record<SectionKind, SectionCoverage> => ({
  CONTACT: { sections: 0, lines: 0 },
  SUMMARY: { sections: 0, lines: 0 },
  SKILLS: { sections: 0, lines: 0 },
  EXPERIENCE: { sections: 0, lines: 0 },
  PROJECTS: { sections: 0, lines: 0 },
  EDUCATION: { sections: 0, lines: 0 },
  CERTIFICATIONS: { sections: 0, lines: 0 },
  OTHER: { sections: 0, lines: 0 },
});

function findEmail(text: string): string | null {
  return text.match(EMAIL)?.[0] ?? null;
}

function findPhone(text: string): string | null {
  for (const match of text.matchAll(PHONE_CANDIDATE)) {
    const candidate = match[0].trim();
    const digits = candidate.replace(/\D/g, '').length;
    if (digits >= 10 && digits <= 15) return candidate;
  }
  return null;
}

function findLocation(text: string): string | null {
  const labeled = text.match(LOCATION_LABEL);
  if (labeled) return labeled[1].trim();

  for (const segment of text.split(CONTACT_SEPARATOR)) {
    const candidate = segment.trim();
    if (CITY_REGION.test(candidate) && !/[\d@]/.test(candidate)) return candidate;
  }
  return null;
}

function toSkillToken(
  raw: string,
  skill: SkillDefinition,
  confidence: SkillToken['confidence'],
): SkillToken {
  return { raw, canonical: skill.canonical, category: skill.category, confidence };
}

function previousTitle(body: SectionLine[], position: number): string | null {
  for (let i = position - 1; i >= 0; i--) {
    if (!body[i].bullet) return body[i].text;
  }
  return null;
}

function parseDate(token: string): PartialDate | null {
  const trimmed = token.trim();
  const numeric = trimmed.match(/^(\d{1,2})\/(\d{4})$/);
  if (numeric) {
    const month = Number(numeric[1]);
    return month >= 1 && month <= 12 ? { year: Number(numeric[2]), month } : null;
  }
  const named = trimmed.match(/^([A-Za-z]{3,9})\.?\s+(\d{4})$/);
  if (named) {
    return { year: Number(named[2]), month: MONTHS[named[1].toLowerCase()] ?? null };
  }
  return /^\d{4}$/.test(trimmed) ? { year: Number(trimmed), month: null } : null;
}

const inYearRange = (year: number): boolean => year >= MIN_YEAR && year <= MAX_YEAR;

// A year without a month starts in January and ends in December
const startIndex = (date: PartialDate): number => date.year * 12 + (date.month ?? 1) - 1;
const endIndex = (date: PartialDate): number => date.year * 12 + (date.month ?? 12) - 1;

// First range whose years all fall within MIN_YEAR..MAX_YEAR
function findDateRange(text: string): RegExpMatchArray | null {
  for (const match of text.matchAll(DATE_RANGE)) {
    const years = match[0].match(/\d{4}/g) ?? [];
    if (years.every((year) => inYearRange(Number(year)))) return match;
  }
  return null;
}

/**
 * Parse the two sides of a matched range. Unparseable or reversed
 * ranges yield null.
 */
export function parseDateRange(raw: string, startToken: string, endToken: string): DateRange | null {
  const start = parseDate(startToken);
  if (!start || !inYearRange(start.year)) return null;

  if (OPEN_END.test(endToken.trim())) {
    return {
      raw,
      startYear: start.year,
      startMonth: start.month,
      endYear: null,
      endMonth: null,
      current: true,
    };
  }

  const end = parseDate(endToken);
  if (!end || !inYearRange(end.year) || endIndex(end) < startIndex(start)) return null;

  return {
    raw,
    startYear: start.year,
    startMonth: start.month,
    endYear: end.year,
    endMonth: end.month,
    current: false,
  };
}

function toMonthInterval(range: DateRange, now: number): [number, number] {
  const start = startIndex({ year: range.startYear, month: range.startMonth });
  const end =
    range.current || range.endYear === null
      ? now
      : endIndex({ year: range.endYear, month: range.endMonth });
  return [start, end];
}
