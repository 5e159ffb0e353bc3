import { RoleProfile, SkillToken } from '../../common/interfaces';
import { FULL_RESUME, buildProfile, loadTestConfig, profileFromText } from '../../../test/helpers';
import { RoleMatcherTool } from './role-matcher.tool';

const token = (canonical: string, confidence: SkillToken['confidence'] = 'exact'): SkillToken => ({
  raw: canonical.toLowerCase(),
  canonical,
  category: 'TOOL',
  confidence,
});

const role = (id: string, requiredSkills: RoleProfile['requiredSkills']): RoleProfile => ({
  id,
  name: id,
  seniority: 'mid',
  requiredSkills,
});

describe('RoleMatcherTool', () => {
  const matcher = new RoleMatcherTool(loadTestConfig());

  describe('match', () => {
    it('subtracts the weight of each missing skill', () => {
      const result = matcher.match(
        buildProfile({ skills: [token('B')] }),
        role('custom', [
          { skill: 'A', weight: 5 },
          { skill: 'B', weight: 3 },
          { skill: 'C', weight: 2 },
        ]),
      );

      expect(result.compatibility).toBe(93);
      expect(result.fitLevel).toBe('Strong');
      expect(result.matchedSkills).toEqual(['B']);
      expect(result.missingSkills).toEqual([
        { skill: 'A', weight: 5 },
        { skill: 'C', weight: 2 },
      ]);
    });

    it('orders missing skills by weight and keeps declared order on ties', () => {
      const result = matcher.match(
        buildProfile(),
        role('ties', [
          { skill: 'X', weight: 6 },
          { skill: 'Y', weight: 8 },
          { skill: 'Z', weight: 6 },
        ]),
      );

      expect(result.missingSkills.map((missing) => missing.skill)).toEqual(['Y', 'X', 'Z']);
      expect(result.compatibility).toBe(80);
      expect(result.fitLevel).toBe('Good');
    });

    it('floors compatibility at zero', () => {
      const result = matcher.match(
        buildProfile(),
        role('heavy', [
          { skill: 'P', weight: 60 },
          { skill: 'Q', weight: 60 },
        ]),
      );

      expect(result.compatibility).toBe(0);
      expect(result.fitLevel).toBe('Poor');
    });

    it('reports fuzzy matches as weak skills', () => {
      const result = matcher.match(
        buildProfile({ skills: [token('Docker'), token('Git', 'fuzzy')] }),
        role('ops', [
          { skill: 'Docker', weight: 10 },
          { skill: 'Git', weight: 10 },
        ]),
      );

      expect(result.matchedSkills).toEqual(['Docker', 'Git']);
      expect(result.weakSkills).toEqual(['Git']);
      expect(result.compatibility).toBe(100);
    });

    it('compares experience against the role seniority', () => {
      const result = matcher.match(
        buildProfile({ stats: { experienceYears: 3 } }),
        { ...role('lead', []), seniority: 'senior' },
      );

      expect(result.experience).toEqual({
        expectedLevel: 'senior',
        minYears: 5,
        estimatedYears: 3,
        meetsExpectation: false,
      });
    });
  });

  describe('with the shipped role catalog', () => {
    const results = matcher.matchAll(profileFromText(FULL_RESUME));

    it('scores every role in catalog order', () => {
      expect(results.map(({ roleId, compatibility }) => [roleId, compatibility])).toEqual([
        ['software-engineer', 77],
        ['frontend-developer', 50],
        ['backend-developer', 100],
        ['full-stack-developer', 88],
        ['data-scientist', 62],
        ['data-analyst', 49],
        ['machine-learning-engineer', 67],
        ['devops-engineer', 58],
        ['mobile-developer', 50],
        ['product-manager', 44],
      ]);
      expect(results[0].missingSkills).toEqual([
        { skill: 'Agile', weight: 6 },
        { skill: 'CI/CD', weight: 6 },
        { skill: 'Problem Solving', weight: 6 },
        { skill: 'Teamwork', weight: 5 },
      ]);
      expect(results[0].fitLevel).toBe('Good');
    });

    it('suggests the closest roles first', () => {
      expect(matcher.suggestRoles(results).map((result) => result.roleId)).toEqual([
        'backend-developer',
        'full-stack-developer',
        'software-engineer',
        'machine-learning-engineer',
      ]);
      expect(matcher.suggestRoles(results, 0)).toEqual([]);
    });

    it('reports readiness for the best role', () => {
      expect(matcher.readiness(results)).toEqual({
        bestRoleId: 'backend-developer',
        compatibility: 100,
        fitLevel: 'Strong',
      });
    });
  });

  it('reports no readiness without roles', () => {
    expect(matcher.readiness([])).toEqual({ bestRoleId: null, compatibility: 0, fitLevel: 'Poor' });
  });

  it('looks up roles by id', () => {
    expect(matcher.findRole('data-analyst')?.name).toBe('Data Analyst');
    expect(matcher.findRole('astronaut')).toBeUndefined();
    expect(matcher.roles).toHaveLength(10);
  });
});
