import {
  CategoryName,
  ResumeProfile,
  ScoringThresholds,
  SectionKind,
  SkillCategory,
} from '../../common/interfaces';

/**
 * A declarative scoring rule. The points a rule is worth come from
 * `scoring.json` (`categories[].rules[id]`), so the rule itself only
 * states what it checks and how to explain the result.
 */
export interface ScoringRule {
  id: string;
  category: CategoryName;
  test: (profile: ResumeProfile, thresholds: ScoringThresholds) => boolean;
  passReason: (profile: ResumeProfile, thresholds: ScoringThresholds) => string;
  failReason: (profile: ResumeProfile, thresholds: ScoringThresholds) => string;
}

// When a gate fails the whole category scores zero with a single reason
export interface CategoryGate {
  test: (profile: ResumeProfile) => boolean;
  reason: string;
}

const countSkills = (
  profile: ResumeProfile,
  ...categories: SkillCategory[]
): number =>
  profile.skills.filter((skill) => categories.includes(skill.category)).length;

const roleEntries = (profile: ResumeProfile) =>
  profile.experience.filter((entry) => entry.sectionKind === 'EXPERIENCE');

const metricTypes = (profile: ResumeProfile): string[] =>
  Array.from(new Set(profile.quantifiedClaims.map((claim) => claim.metricType)));

const hasContent = (profile: ResumeProfile, kind: SectionKind): boolean =>
  profile.sectionCoverage[kind].lines > 0;

const hasSection = (profile: ResumeProfile, kind: SectionKind): boolean =>
  profile.sectionCoverage[kind].sections > 0;

const shortfall = (count: number, expected: number, noun: string): string =>
  count === 0
    ? `no ${noun} mentioned`
    : `only ${count} ${noun} mentioned, ${expected} expected`;

const CORE_SECTIONS: SectionKind[] = ['SKILLS', 'EXPERIENCE', 'EDUCATION'];

export const SCORING_RULES: readonly ScoringRule[] = [
  // Contact
  {
    id: 'contact.email',
    category: 'contact',
    test: (profile) => profile.contact.email !== null,
    passReason: () => 'valid email found',
    failReason: () => 'no valid email found',
  },
  {
    id: 'contact.phone',
    category: 'contact',
    test: (profile) => profile.contact.phone !== null,
    passReason: () => 'valid phone number found',
    failReason: () => 'no phone number detected',
  },

  // Skills
  {
    id: 'skills.breadth',
    category: 'skills',
    test: (profile, t) => profile.skills.length >= t.minSkills,
    passReason: (profile) => `${profile.skills.length} recognized skills`,
    failReason: (profile, t) =>
      `only ${profile.skills.length} recognized skills, ${t.minSkills} expected`,
  },
  {
    id: 'skills.depth',
    category: 'skills',
    test: (profile, t) => profile.skills.length >= t.broadSkills,
    passReason: (profile) =>
      `broad skill set of ${profile.skills.length} skills`,
    failReason: (_profile, t) => `fewer than ${t.broadSkills} recognized skills`,
  },
  {
    id: 'skills.technical',
    category: 'skills',
    test: (profile, t) =>
      countSkills(profile, 'LANGUAGE', 'FRAMEWORK') >= t.minTechnicalSkills,
    passReason: (profile) =>
      `${countSkills(profile, 'LANGUAGE', 'FRAMEWORK')} languages and frameworks`,
    failReason: (profile, t) =>
      shortfall(
        countSkills(profile, 'LANGUAGE', 'FRAMEWORK'),
        t.minTechnicalSkills,
        'languages or frameworks',
      ),
  },
  {
    id: 'skills.tools',
    category: 'skills',
    test: (profile, t) => countSkills(profile, 'TOOL') >= t.minTools,
    passReason: (profile) => `${countSkills(profile, 'TOOL')} tools and platforms`,
    failReason: (profile, t) =>
      shortfall(countSkills(profile, 'TOOL'), t.minTools, 'tools or platforms'),
  },
  {
    id: 'skills.soft',
    category: 'skills',
    test: (profile, t) => countSkills(profile, 'SOFT_SKILL') >= t.minSoftSkills,
    passReason: (profile) =>
      `${countSkills(profile, 'SOFT_SKILL')} soft skills demonstrated`,
    failReason: (profile, t) =>
      shortfall(countSkills(profile, 'SOFT_SKILL'), t.minSoftSkills, 'soft skills'),
  },
  {
    id: 'skills.domain',
    category: 'skills',
    test: (profile, t) => countSkills(profile, 'DOMAIN') >= t.minDomainSkills,
    passReason: (profile) =>
      `${countSkills(profile, 'DOMAIN')} domain specializations`,
    failReason: (profile, t) =>
      shortfall(
        countSkills(profile, 'DOMAIN'),
        t.minDomainSkills,
        'domain specializations',
      ),
  },

  // Experience quality
  {
    id: 'experience.entries',
    category: 'experience',
    test: (profile) => roleEntries(profile).length > 0,
    passReason: (profile) => `${roleEntries(profile).length} role entries identified`,
    failReason: () => 'no role entries identified in experience',
  },
  {
    id: 'experience.dates',
    category: 'experience',
    test: (profile) => {
      const entries = roleEntries(profile);
      return entries.length > 0 && entries.every((entry) => entry.dateRange !== null);
    },
    passReason: () => 'all role entries have date ranges',
    failReason: (profile) => {
      const entries = roleEntries(profile);
      if (entries.length === 0) return 'no dated role entries';
      const undated = entries.filter((entry) => entry.dateRange === null).length;
      return `${undated} of ${entries.length} role entries missing date ranges`;
    },
  },
  {
    id: 'experience.multiple',
    category: 'experience',
    test: (profile, t) => roleEntries(profile).length >= t.minEntries,
    passReason: (profile) => `${roleEntries(profile).length} positions listed`,
    failReason: (_profile, t) => `fewer than ${t.minEntries} positions listed`,
  },
  {
    id: 'experience.action-verbs',
    category: 'experience',
    test: (profile, t) => profile.stats.actionVerbLineCount >= t.minActionVerbLines,
    passReason: (profile) =>
      `${profile.stats.actionVerbLineCount} lines start with action verbs`,
    failReason: (profile, t) =>
      `only ${profile.stats.actionVerbLineCount} lines start with action verbs, ${t.minActionVerbLines} expected`,
  },
  {
    id: 'experience.projects',
    category: 'experience',
    test: (profile) => hasContent(profile, 'PROJECTS'),
    passReason: () => 'projects section with content',
    failReason: () => 'no projects section',
  },

  // Quantified achievements
  {
    id: 'quantified.present',
    category: 'quantified',
    test: (profile, t) => profile.quantifiedClaims.length >= t.minClaims,
    passReason: (profile) =>
      `${profile.quantifiedClaims.length} quantified achievements`,
    failReason: () => 'no quantified achievements found',
  },
  {
    id: 'quantified.several',
    category: 'quantified',
    test: (profile, t) => profile.quantifiedClaims.length >= t.severalClaims,
    passReason: (_profile, t) => `at least ${t.severalClaims} quantified achievements`,
    failReason: (_profile, t) => `fewer than ${t.severalClaims} quantified achievements`,
  },
  {
    id: 'quantified.variety',
    category: 'quantified',
    test: (profile, t) => metricTypes(profile).length >= t.minMetricTypes,
    passReason: (profile) =>
      `metric types used: ${metricTypes(profile).join(', ')}`,
    failReason: (profile, t) =>
      `only ${metricTypes(profile).length} metric types used, ${t.minMetricTypes} expected`,
  },

  // Content optimization
  {
    id: 'content.headings',
    category: 'content',
    test: (profile, t) => profile.headingCount >= t.minHeadings,
    passReason: (profile) => `${profile.headingCount} recognized section headings`,
    failReason: (profile, t) =>
      profile.headingCount === 0
        ? 'no recognized section headings'
        : `only ${profile.headingCount} recognized section headings, ${t.minHeadings} expected`,
  },
  {
    id: 'content.core-sections',
    category: 'content',
    test: (profile) => CORE_SECTIONS.every((kind) => hasSection(profile, kind)),
    passReason: () => 'skills, experience and education sections present',
    failReason: (profile) =>
      `missing sections: ${CORE_SECTIONS.filter((kind) => !hasSection(profile, kind))
        .map((kind) => kind.toLowerCase())
        .join(', ')}`,
  },
  {
    id: 'content.length',
    category: 'content',
    test: (profile, t) =>
      profile.stats.wordCount >= t.minWords && profile.stats.wordCount <= t.maxWords,
    passReason: (profile) => `${profile.stats.wordCount} words, a scannable length`,
    failReason: (profile, t) =>
      profile.stats.wordCount < t.minWords
        ? `${profile.stats.wordCount} words, below ${t.minWords}`
        : `${profile.stats.wordCount} words, above ${t.maxWords}`,
  },
  {
    id: 'content.bullets',
    category: 'content',
    test: (profile, t) => profile.stats.bulletLineCount >= t.minBulletLines,
    passReason: (profile) => `${profile.stats.bulletLineCount} bullet points`,
    failReason: (profile, t) =>
      `only ${profile.stats.bulletLineCount} bullet points, ${t.minBulletLines} expected`,
  },
];

const hasWorkContent = (profile: ResumeProfile): boolean =>
  hasContent(profile, 'EXPERIENCE') || hasContent(profile, 'PROJECTS');

export const CATEGORY_GATES: Partial<Record<CategoryName, CategoryGate>> = {
  contact: {
    test: (profile) => hasSection(profile, 'CONTACT'),
    reason: 'no contact section found',
  },
  skills: {
    test: (profile) => profile.skills.length > 0,
    reason: 'no recognized skills found',
  },
  experience: {
    test: hasWorkContent,
    reason: 'no experience or projects section found',
  },
  quantified: {
    test: hasWorkContent,
    reason: 'no experience or project lines to measure',
  },
};

export const rulesForCategory = (category: CategoryName): ScoringRule[] =>
  SCORING_RULES.filter((rule) => rule.category === category);
