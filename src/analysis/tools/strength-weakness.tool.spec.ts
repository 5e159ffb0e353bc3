import { CategoryName, CategoryScore, RuleOutcome, ScoreReport } from '../../common/interfaces';
import { buildProfile, loadTestConfig } from '../../../test/helpers';
import { StrengthWeaknessTool } from './strength-weakness.tool';

const outcome = (ruleId: string, points: number, passed: boolean, text: string): RuleOutcome => ({
  ruleId,
  points,
  passed,
  reason: `${passed ? '+' : '-'}${points}: ${text}`,
});

const scored = (
  category: CategoryName,
  label: string,
  max: number,
  outcomes: RuleOutcome[],
): CategoryScore => ({
  category,
  label,
  earned: outcomes.filter((o) => o.passed).reduce((sum, o) => sum + o.points, 0),
  max,
  outcomes,
  reasons: outcomes.map((o) => o.reason),
});

describe('StrengthWeaknessTool', () => {
  const tool = new StrengthWeaknessTool(loadTestConfig());

  const report: ScoreReport = {
    categories: [
      scored('contact', 'Contact Information', 15, [
        outcome('contact.email', 8, true, 'valid email found'),
        outcome('contact.phone', 7, true, 'valid phone number found'),
      ]),
      scored('skills', 'Skills', 30, [
        outcome('skills.breadth', 8, true, '6 recognized skills'),
        outcome('skills.depth', 6, false, 'fewer than 10 recognized skills'),
        outcome('skills.technical', 6, false, 'only 2 languages or frameworks mentioned, 3 expected'),
        outcome('skills.tools', 4, true, '2 tools and platforms'),
        outcome('skills.soft', 3, false, 'no soft skills mentioned'),
        outcome('skills.domain', 3, false, 'no domain specializations mentioned'),
      ]),
      {
        category: 'experience',
        label: 'Experience Quality',
        earned: 0,
        max: 25,
        outcomes: [],
        reasons: ['-25: no experience or projects section found'],
      },
      scored('quantified', 'Quantified Achievements', 20, [
        outcome('quantified.present', 8, true, '2 quantified achievements'),
        outcome('quantified.several', 6, false, 'fewer than 3 quantified achievements'),
        outcome('quantified.variety', 6, true, 'metric types used: PERCENT, COUNT'),
      ]),
      scored('content', 'Content Optimization', 10, [
        outcome('content.headings', 3, true, '4 recognized section headings'),
        outcome('content.core-sections', 3, true, 'skills, experience and education sections present'),
        outcome('content.length', 2, true, '320 words, a scannable length'),
        outcome('content.bullets', 2, true, '8 bullet points'),
      ]),
    ],
    total: 51,
    grade: { minPoints: 45, label: 'Fair', recommendation: 'Significant improvements required' },
  };

  const { strengths, weaknesses } = tool.analyze(buildProfile(), report);

  it('lists full-ratio categories as strengths in category order', () => {
    expect(strengths).toEqual([
      {
        category: 'contact',
        label: 'Contact Information',
        ratio: 1,
        statement: 'Contact Information is a strength (15/15 points)',
        evidence: ['+8: valid email found', '+7: valid phone number found'],
      },
      {
        category: 'content',
        label: 'Content Optimization',
        ratio: 1,
        statement: 'Content Optimization is a strength (10/10 points)',
        evidence: [
          '+3: 4 recognized section headings',
          '+3: skills, experience and education sections present',
          '+2: 320 words, a scannable length',
          '+2: 8 bullet points',
        ],
      },
    ]);
  });

  it('lists weak categories lowest ratio first with their failed rules', () => {
    expect(weaknesses).toEqual([
      {
        category: 'experience',
        label: 'Experience Quality',
        ratio: 0,
        statement: 'Experience Quality needs improvement (0/25 points)',
        issues: ['-25: no experience or projects section found'],
        priority: 'CRITICAL',
      },
      {
        category: 'skills',
        label: 'Skills',
        ratio: 0.4,
        statement: 'Skills needs improvement (12/30 points)',
        issues: [
          '-6: fewer than 10 recognized skills',
          '-6: only 2 languages or frameworks mentioned, 3 expected',
          '-3: no soft skills mentioned',
          '-3: no domain specializations mentioned',
        ],
        priority: 'HIGH',
      },
    ]);
  });

  it('leaves middling categories unclassified', () => {
    const classified = [...strengths, ...weaknesses].map((entry) => entry.category);

    expect(classified).not.toContain('quantified');
  });
});
