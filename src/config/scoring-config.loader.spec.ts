import * as fs from 'fs';
import * as path from 'path';
import { SCORING_CONFIG_DIR } from '../../test/helpers';
import {
  LexiconFileDto,
  RolesFileDto,
  ScoringFileDto,
  SectionsFileDto,
  SkillsFileDto,
} from './scoring-config.dto';
import {
  ScoringConfigError,
  buildScoringConfig,
  loadScoringConfig,
  readScoringConfigFiles,
} from './scoring-config.loader';

const readJson = <T>(fileName: string): T =>
  JSON.parse(fs.readFileSync(path.join(SCORING_CONFIG_DIR, fileName), 'utf8'));

interface TableSet {
  sections: SectionsFileDto;
  skills: SkillsFileDto;
  roles: RolesFileDto;
  scoring: ScoringFileDto;
  lexicon: LexiconFileDto;
}

const shippedTables = (): TableSet => ({
  sections: readJson('sections.json'),
  skills: readJson('skills.json'),
  roles: readJson('roles.json'),
  scoring: readJson('scoring.json'),
  lexicon: readJson('lexicon.json'),
});

const problemsThrownBy = (action: () => unknown): string[] => {
  try {
    action();
  } catch (error) {
    if (error instanceof ScoringConfigError) return error.problems;
    throw error;
  }
  return [];
};

const problemsOf = (files: Parameters<typeof buildScoringConfig>[0]): string[] =>
  problemsThrownBy(() => buildScoringConfig(files));

describe('scoring config loader', () => {
  it('loads and freezes the shipped tables', () => {
    const config = loadScoringConfig(SCORING_CONFIG_DIR);

    expect(config.taxonomy).toHaveLength(101);
    expect(config.roles).toHaveLength(10);
    expect(config.categories.map((category) => category.name)).toEqual([
      'contact',
      'skills',
      'experience',
      'quantified',
      'content',
    ]);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.roles[0].requiredSkills)).toBe(true);
  });

  it('reports every missing file', () => {
    const dir = path.join(SCORING_CONFIG_DIR, 'missing');

    expect(problemsThrownBy(() => readScoringConfigFiles(dir))).toEqual([
      `sections.json: file not found in ${dir}`,
      `skills.json: file not found in ${dir}`,
      `roles.json: file not found in ${dir}`,
      `scoring.json: file not found in ${dir}`,
      `lexicon.json: file not found in ${dir}`,
    ]);
  });

  it('accepts the shipped tables as plain objects', () => {
    expect(problemsOf(shippedTables())).toEqual([]);
  });

  it('rejects a table that is not an object', () => {
    expect(problemsOf({ ...shippedTables(), scoring: [] })).toEqual([
      'scoring.json: expected a JSON object',
    ]);
  });

  it('requires rule points to add up to the category maximum', () => {
    const tables = shippedTables();
    tables.scoring.categories[0].rules['contact.email'] = 9;

    expect(problemsOf(tables)).toEqual(['scoring.json: contact rule points sum to 16, expected 15']);
  });

  it('requires points for every rule of a category', () => {
    const tables = shippedTables();
    delete tables.scoring.categories[0].rules['contact.phone'];

    expect(problemsOf(tables)).toEqual([
      'scoring.json: contact has no points for rule "contact.phone"',
      'scoring.json: contact rule points sum to 8, expected 15',
    ]);
  });

  it('requires descending grade tiers ending at zero', () => {
    const tables = shippedTables();
    tables.scoring.gradeTiers.reverse();

    expect(problemsOf(tables)).toEqual([
      'scoring.json: gradeTiers must be strictly descending and end at 0',
    ]);
  });

  it('rejects a synonym shared by two headings', () => {
    const tables = shippedTables();
    tables.sections.headings[3].synonyms.push('Skills');

    expect(problemsOf(tables)).toEqual([
      'sections.json: synonym "skills" maps to more than one heading',
    ]);
  });

  it('rejects an alias that names another skill', () => {
    const tables = shippedTables();
    tables.skills.skills.push({ canonical: 'Snake', category: 'LANGUAGE', aliases: ['python'] });

    expect(problemsOf(tables)).toEqual([
      'skills.json: alias "python" maps to more than one skill',
      'skills.json: fuzzy key "python" maps to more than one skill (Python, Snake)',
    ]);
  });

  it('rejects aliases that only collide once separators are removed', () => {
    const tables = shippedTables();
    tables.skills.skills.push({
      canonical: 'Relational Store',
      category: 'TOOL',
      aliases: ['postgre-sql'],
    });

    expect(problemsOf(tables)).toEqual([
      'skills.json: fuzzy key "postgresql" maps to more than one skill (PostgreSQL, Relational Store)',
    ]);
  });

  it('collects problems from several tables at once', () => {
    const tables = shippedTables();
    tables.roles.roles[0].requiredSkills.push({ skill: 'Basket Weaving', weight: 1 });
    tables.scoring.thresholds.minWords = 2000;

    expect(problemsOf(tables)).toEqual([
      'roles.json: role "software-engineer" requires unknown skill "Basket Weaving"',
      'scoring.json: thresholds.minWords exceeds thresholds.maxWords',
    ]);
  });

  it('lists the problems in the error message', () => {
    const tables = shippedTables();
    tables.roles.fitLevels[3].minCompatibility = 10;

    expect(() => buildScoringConfig(tables)).toThrow(
      'Invalid scoring configuration:\n - roles.json: fitLevels must be strictly descending and end at 0',
    );
  });
});
