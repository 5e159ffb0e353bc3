import * as fs from 'fs';
import * as path from 'path';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { CATEGORY_NAMES, ScoringConfig } from '../common/interfaces';
import { deepFreeze } from '../common/utils/object.utils';
import {
  FUZZY_MIN_LENGTH,
  compactKey,
  normalizeHeading,
  skillKey,
} from '../common/utils/text.utils';
import { rulesForCategory } from '../analysis/tools/scoring-rules';
import {
  LexiconFileDto,
  RolesFileDto,
  ScoringFileDto,
  SectionsFileDto,
  SkillsFileDto,
} from './scoring-config.dto';

export const DEFAULT_SCORING_CONFIG_DIR = 'config/scoring';

export const SCORING_CONFIG_FILES = {
  sections: 'sections.json',
  skills: 'skills.json',
  roles: 'roles.json',
  scoring: 'scoring.json',
  lexicon: 'lexicon.json',
} as const;

export type ScoringConfigFiles = Record<keyof typeof SCORING_CONFIG_FILES, unknown>;

/**
 * Raised at startup when the scoring tables are missing or inconsistent.
 * Carries every problem found, not just the first one.
 */
export class ScoringConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid scoring configuration:\n - ${problems.join('\n - ')}`);
    this.name = 'ScoringConfigError';
  }
}

/**
 * Read the raw JSON tables from a directory (relative paths resolve from
 * the working directory).
 */
export function readScoringConfigFiles(dir: string): ScoringConfigFiles {
  const root = path.resolve(process.cwd(), dir);
  const problems: string[] = [];

  const read = (fileName: string): unknown => {
    const filePath = path.join(root, fileName);
    if (!fs.existsSync(filePath)) {
      problems.push(`${fileName}: file not found in ${root}`);
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
      return parsed;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      problems.push(`${fileName}: invalid JSON (${message})`);
      return null;
    }
  };

  const files: ScoringConfigFiles = {
    sections: read(SCORING_CONFIG_FILES.sections),
    skills: read(SCORING_CONFIG_FILES.skills),
    roles: read(SCORING_CONFIG_FILES.roles),
    scoring: read(SCORING_CONFIG_FILES.scoring),
    lexicon: read(SCORING_CONFIG_FILES.lexicon),
  };

  if (problems.length > 0) {
    throw new ScoringConfigError(problems);
  }
  return files;
}

const flattenErrors = (errors: ValidationError[], prefix: string): string[] =>
  errors.flatMap((error) => {
    const at = `${prefix}.${error.property}`;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${at}: ${message}`,
    );
    return [...own, ...flattenErrors(error.children ?? [], at)];
  });

function validateFile<T extends object>(
  cls: ClassConstructor<T>,
  plain: unknown,
  fileName: string,
  problems: string[],
): T | null {
  if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
    problems.push(`${fileName}: expected a JSON object`);
    return null;
  }
  const instance = plainToInstance(cls, plain);
  const errors = validateSync(instance, { whitelist: true });
  if (errors.length > 0) {
    problems.push(...flattenErrors(errors, fileName));
    return null;
  }
  return instance;
}

const isStrictlyDescending = (values: number[]): boolean =>
  values.every((value, i) => i === 0 || value < values[i - 1]);

const duplicatesOf = (values: string[]): string[] => {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value);
    seen.add(value);
  }
  return Array.from(duplicates);
};

function checkSections(sections: SectionsFileDto, problems: string[]): void {
  const kinds = sections.headings.map((heading) => heading.kind);
  for (const kind of duplicatesOf(kinds)) {
    problems.push(`sections.json: heading kind ${kind} declared more than once`);
  }
  const synonyms = sections.headings.flatMap((heading) =>
    heading.synonyms.map(normalizeHeading),
  );
  for (const synonym of duplicatesOf(synonyms)) {
    problems.push(`sections.json: synonym "${synonym}" maps to more than one heading`);
  }
}

function checkTaxonomy(skills: SkillsFileDto, problems: string[]): void {
  const canonicalKeys = skills.skills.map((skill) => skillKey(skill.canonical));
  for (const key of duplicatesOf(canonicalKeys)) {
    problems.push(`skills.json: canonical skill "${key}" declared more than once`);
  }

  // Every lookup key (canonical, alias or its fuzzy form) must resolve to exactly one skill
  const exactOwners = new Map<string, Set<number>>();
  const fuzzyOwners = new Map<string, Set<number>>();
  const claim = (owners: Map<string, Set<number>>, key: string, position: number): void => {
    const existing = owners.get(key);
    if (existing) existing.add(position);
    else owners.set(key, new Set([position]));
  };
  skills.skills.forEach((skill, position) => {
    const keys = [skillKey(skill.canonical), ...skill.aliases.map(skillKey)];
    for (const key of keys) {
      claim(exactOwners, key, position);
      const compact = compactKey(key);
      if (compact.length >= FUZZY_MIN_LENGTH) claim(fuzzyOwners, compact, position);
    }
  });

  const canonicalDuplicates = new Set(duplicatesOf(canonicalKeys));
  const duplicateCompacts = new Set(Array.from(canonicalDuplicates, compactKey));
  for (const [key, owners] of exactOwners) {
    if (owners.size > 1 && !canonicalDuplicates.has(key)) {
      problems.push(`skills.json: alias "${key}" maps to more than one skill`);
    }
  }
  for (const [key, owners] of fuzzyOwners) {
    if (owners.size > 1 && !duplicateCompacts.has(key)) {
      const names = Array.from(owners, (position) => skills.skills[position].canonical);
      problems.push(`skills.json: fuzzy key "${key}" maps to more than one skill (${names.join(', ')})`);
    }
  }
  for (const skill of skills.skills) {
    if (skillKey(skill.canonical).length === 0) {
      problems.push(`skills.json: canonical "${skill.canonical}" has no matchable characters`);
    }
  }
}

function checkRoles(
  roles: RolesFileDto,
  skills: SkillsFileDto,
  problems: string[],
): void {
  const canonicals = new Set(skills.skills.map((skill) => skill.canonical));

  for (const id of duplicatesOf(roles.roles.map((role) => role.id))) {
    problems.push(`roles.json: role id "${id}" declared more than once`);
  }
  for (const role of roles.roles) {
    const required = role.requiredSkills.map((entry) => entry.skill);
    for (const skill of required) {
      if (!canonicals.has(skill)) {
        problems.push(`roles.json: role "${role.id}" requires unknown skill "${skill}"`);
      }
    }
    for (const skill of duplicatesOf(required)) {
      problems.push(`roles.json: role "${role.id}" lists "${skill}" more than once`);
    }
  }

  const bands = roles.fitLevels.map((band) => band.minCompatibility);
  if (!isStrictlyDescending(bands) || bands[bands.length - 1] !== 0) {
    problems.push('roles.json: fitLevels must be strictly descending and end at 0');
  }
}

function checkScoring(scoring: ScoringFileDto, problems: string[]): void {
  const names = scoring.categories.map((category) => category.name);
  for (const name of CATEGORY_NAMES) {
    if (!names.includes(name)) {
      problems.push(`scoring.json: category "${name}" is missing`);
    }
  }
  for (const name of duplicatesOf(names)) {
    problems.push(`scoring.json: category "${name}" declared more than once`);
  }

  const maxTotal = scoring.categories.reduce((sum, category) => sum + category.max, 0);
  if (maxTotal !== 100) {
    problems.push(`scoring.json: category maxima sum to ${maxTotal}, expected 100`);
  }

  for (const category of scoring.categories) {
    const expected = rulesForCategory(category.name).map((rule) => rule.id);
    const declared = Object.keys(category.rules);
    for (const id of expected.filter((ruleId) => !declared.includes(ruleId))) {
      problems.push(`scoring.json: ${category.name} has no points for rule "${id}"`);
    }
    for (const id of declared.filter((ruleId) => !expected.includes(ruleId))) {
      problems.push(`scoring.json: ${category.name} declares unknown rule "${id}"`);
    }

    const points = Object.values(category.rules);
    if (points.some((value) => typeof value !== 'number' || value <= 0)) {
      problems.push(`scoring.json: ${category.name} rule points must be positive numbers`);
      continue;
    }
    const sum = points.reduce((total, value) => total + value, 0);
    if (sum !== category.max) {
      problems.push(
        `scoring.json: ${category.name} rule points sum to ${sum}, expected ${category.max}`,
      );
    }
  }

  const tiers = scoring.gradeTiers.map((tier) => tier.minPoints);
  if (!isStrictlyDescending(tiers) || tiers[tiers.length - 1] !== 0) {
    problems.push('scoring.json: gradeTiers must be strictly descending and end at 0');
  }

  const levels = scoring.seniority.map((band) => band.level).join(',');
  const years = scoring.seniority.map((band) => band.minYears);
  if (
    levels !== 'entry,mid,senior' ||
    years[0] !== 0 ||
    !years.every((value, i) => i === 0 || value > years[i - 1])
  ) {
    problems.push(
      'scoring.json: seniority must list entry, mid and senior with ascending minYears starting at 0',
    );
  }

  const { strengthRatio, weaknessRatio, criticalRatio } = scoring.analysis;
  if (
    !(criticalRatio > 0 && criticalRatio <= weaknessRatio && weaknessRatio <= strengthRatio)
  ) {
    problems.push(
      'scoring.json: analysis ratios must satisfy 0 < criticalRatio <= weaknessRatio <= strengthRatio',
    );
  }

  const { thresholds } = scoring;
  if (thresholds.minWords > thresholds.maxWords) {
    problems.push('scoring.json: thresholds.minWords exceeds thresholds.maxWords');
  }
  if (thresholds.minSkills > thresholds.broadSkills) {
    problems.push('scoring.json: thresholds.minSkills exceeds thresholds.broadSkills');
  }
  if (thresholds.minClaims > thresholds.severalClaims) {
    problems.push('scoring.json: thresholds.minClaims exceeds thresholds.severalClaims');
  }
}

/**
 * Validate the raw tables and assemble the immutable scoring configuration.
 * All problems across all files are reported together.
 */
export function buildScoringConfig(files: ScoringConfigFiles): ScoringConfig {
  const problems: string[] = [];

  const sections = validateFile(SectionsFileDto, files.sections, SCORING_CONFIG_FILES.sections, problems);
  const skills = validateFile(SkillsFileDto, files.skills, SCORING_CONFIG_FILES.skills, problems);
  const roles = validateFile(RolesFileDto, files.roles, SCORING_CONFIG_FILES.roles, problems);
  const scoring = validateFile(ScoringFileDto, files.scoring, SCORING_CONFIG_FILES.scoring, problems);
  const lexicon = validateFile(LexiconFileDto, files.lexicon, SCORING_CONFIG_FILES.lexicon, problems);

  if (sections) checkSections(sections, problems);
  if (skills) checkTaxonomy(skills, problems);
  if (roles && skills) checkRoles(roles, skills, problems);
  if (scoring) checkScoring(scoring, problems);

  if (!sections || !skills || !roles || !scoring || !lexicon || problems.length > 0) {
    throw new ScoringConfigError(problems);
  }

  return deepFreeze<ScoringConfig>({
    sections,
    taxonomy: skills.skills,
    roles: roles.roles,
    fitLevels: roles.fitLevels,
    intake: scoring.intake,
    categories: scoring.categories,
    thresholds: scoring.thresholds,
    gradeTiers: scoring.gradeTiers,
    analysis: scoring.analysis,
    seniority: scoring.seniority,
    lexicon,
  });
}

export function loadScoringConfig(
  dir: string = DEFAULT_SCORING_CONFIG_DIR,
): ScoringConfig {
  return buildScoringConfig(readScoringConfigFiles(dir));
}
