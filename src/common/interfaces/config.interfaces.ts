import { ExperienceLevel, SectionKind, SkillCategory } from './resume.interfaces';
import { CategoryName, GradeTier, RoleProfile } from './scoring.interfaces';

export interface SectionHeadingRule {
  kind: SectionKind;
  synonyms: string[];
}

export interface SectionsConfig {
  maxHeadingLength: number;
  maxHeadingWords: number;
  maxContactLines: number;
  // Declared order is the tie-break priority for compound headings
  headings: SectionHeadingRule[];
}

export interface SkillDefinition {
  canonical: string;
  category: SkillCategory;
  aliases: string[];
}

export interface FitLevelBand {
  minCompatibility: number;
  label: string;
}

export interface CategoryDefinition {
  name: CategoryName;
  label: string;
  max: number;
  rules: Record<string, number>;
}

export interface ScoringThresholds {
  minSkills: number;
  broadSkills: number;
  minTechnicalSkills: number;
  minTools: number;
  minSoftSkills: number;
  minDomainSkills: number;
  minEntries: number;
  minActionVerbLines: number;
  minClaims: number;
  severalClaims: number;
  minMetricTypes: number;
  minHeadings: number;
  minWords: number;
  maxWords: number;
  minBulletLines: number;
}

export interface IntakeLimits {
  minCharacters: number;
  minWords: number;
}

export interface AnalysisRatios {
  strengthRatio: number;
  weaknessRatio: number;
  criticalRatio: number;
}

export interface SeniorityBand {
  level: ExperienceLevel;
  minYears: number;
}

export interface Lexicon {
  actionVerbs: string[];
  countNouns: string[];
  durationUnits: string[];
  // Skill names that also read as verbs ("excel at")
  verbSkills: string[];
}

export interface ScoringConfig {
  sections: SectionsConfig;
  taxonomy: SkillDefinition[];
  roles: RoleProfile[];
  fitLevels: FitLevelBand[];
  intake: IntakeLimits;
  categories: CategoryDefinition[];
  thresholds: ScoringThresholds;
  gradeTiers: GradeTier[];
  analysis: AnalysisRatios;
  seniority: SeniorityBand[];
  lexicon: Lexicon;
}
