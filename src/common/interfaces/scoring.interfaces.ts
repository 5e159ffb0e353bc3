import { ExperienceLevel } from './resume.interfaces';

export const CATEGORY_NAMES = [
  'contact',
  'skills',
  'experience',
  'quantified',
  'content',
] as const;

export type CategoryName = (typeof CATEGORY_NAMES)[number];

export interface RuleOutcome {
  ruleId: string;
  points: number;
  passed: boolean;
  reason: string;
}

export interface CategoryScore {
  category: CategoryName;
  label: string;
  earned: number;
  max: number;
  outcomes: RuleOutcome[];
  reasons: string[];
}

export interface GradeTier {
  minPoints: number;
  label: string;
  recommendation: string;
}

export interface ScoreReport {
  readonly categories: readonly CategoryScore[];
  readonly total: number;
  readonly grade: GradeTier;
}

export interface RequiredSkill {
  skill: string;
  weight: number;
}

export interface RoleProfile {
  id: string;
  name: string;
  seniority: ExperienceLevel;
  requiredSkills: RequiredSkill[];
}

export interface RoleExperienceFit {
  expectedLevel: ExperienceLevel;
  minYears: number;
  estimatedYears: number;
  meetsExpectation: boolean;
}

export interface RoleMatchResult {
  roleId: string;
  roleName: string;
  compatibility: number;
  fitLevel: string;
  matchedSkills: string[];
  missingSkills: RequiredSkill[];
  weakSkills: string[];
  experience: RoleExperienceFit;
}

export interface RoleReadiness {
  bestRoleId: string | null;
  compatibility: number;
  fitLevel: string;
}

export type WeaknessPriority = 'CRITICAL' | 'HIGH';

export interface Strength {
  category: CategoryName;
  label: string;
  ratio: number;
  statement: string;
  evidence: string[];
}

export interface Weakness {
  category: CategoryName;
  label: string;
  ratio: number;
  statement: string;
  issues: string[];
  priority: WeaknessPriority;
}

export interface StrengthWeaknessResult {
  strengths: Strength[];
  weaknesses: Weakness[];
}
