import 'reflect-metadata';
import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsPositive,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import {
  AnalysisRatios,
  CATEGORY_NAMES,
  CategoryDefinition,
  CategoryName,
  ExperienceLevel,
  FitLevelBand,
  GradeTier,
  IntakeLimits,
  Lexicon,
  RequiredSkill,
  RoleProfile,
  SECTION_KINDS,
  ScoringThresholds,
  SectionHeadingRule,
  SectionKind,
  SectionsConfig,
  SeniorityBand,
  SKILL_CATEGORIES,
  SkillCategory,
  SkillDefinition,
} from '../common/interfaces';

const EXPERIENCE_LEVELS: ExperienceLevel[] = ['entry', 'mid', 'senior'];

// sections.json

export class SectionHeadingRuleDto implements SectionHeadingRule {
  @IsIn([...SECTION_KINDS])
  kind!: SectionKind;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  synonyms!: string[];
}

export class SectionsFileDto implements SectionsConfig {
  @IsInt()
  @Min(1)
  maxHeadingLength!: number;

  @IsInt()
  @Min(1)
  maxHeadingWords!: number;

  @IsInt()
  @Min(0)
  maxContactLines!: number;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => SectionHeadingRuleDto)
  headings!: SectionHeadingRuleDto[];
}

// skills.json

export class SkillDefinitionDto implements SkillDefinition {
  @IsString()
  @IsNotEmpty()
  canonical!: string;

  @IsIn([...SKILL_CATEGORIES])
  category!: SkillCategory;

  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  aliases!: string[];
}

export class SkillsFileDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => SkillDefinitionDto)
  skills!: SkillDefinitionDto[];
}

// roles.json

export class RequiredSkillDto implements RequiredSkill {
  @IsString()
  @IsNotEmpty()
  skill!: string;

  @IsNumber()
  @IsPositive()
  weight!: number;
}

export class RoleProfileDto implements RoleProfile {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsIn(EXPERIENCE_LEVELS)
  seniority!: ExperienceLevel;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => RequiredSkillDto)
  requiredSkills!: RequiredSkillDto[];
}

export class FitLevelBandDto implements FitLevelBand {
  @IsNumber()
  @Min(0)
  @Max(100)
  minCompatibility!: number;

  @IsString()
  @IsNotEmpty()
  label!: string;
}

export class RolesFileDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => FitLevelBandDto)
  fitLevels!: FitLevelBandDto[];

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => RoleProfileDto)
  roles!: RoleProfileDto[];
}

// scoring.json

export class IntakeLimitsDto implements IntakeLimits {
  @IsInt()
  @Min(0)
  minCharacters!: number;

  @IsInt()
  @Min(0)
  minWords!: number;
}

export class CategoryDefinitionDto implements CategoryDefinition {
  @IsIn([...CATEGORY_NAMES])
  name!: CategoryName;

  @IsString()
  @IsNotEmpty()
  label!: string;

  @IsInt()
  @IsPositive()
  max!: number;

  // Keys and point values are checked against the rule registry
  @IsObject()
  rules!: Record<string, number>;
}

export class ScoringThresholdsDto implements ScoringThresholds {
  @IsInt() @Min(0) minSkills!: number;
  @IsInt() @Min(0) broadSkills!: number;
  @IsInt() @Min(0) minTechnicalSkills!: number;
  @IsInt() @Min(0) minTools!: number;
  @IsInt() @Min(0) minSoftSkills!: number;
  @IsInt() @Min(0) minDomainSkills!: number;
  @IsInt() @Min(0) minEntries!: number;
  @IsInt() @Min(0) minActionVerbLines!: number;
  @IsInt() @Min(0) minClaims!: number;
  @IsInt() @Min(0) severalClaims!: number;
  @IsInt() @Min(0) minMetricTypes!: number;
  @IsInt() @Min(0) minHeadings!: number;
  @IsInt() @Min(0) minWords!: number;
  @IsInt() @Min(0) maxWords!: number;
  @IsInt() @Min(0) minBulletLines!: number;
}

export class GradeTierDto implements GradeTier {
  @IsNumber()
  @Min(0)
  @Max(100)
  minPoints!: number;

  @IsString()
  @IsNotEmpty()
  label!: string;

  @IsString()
  recommendation!: string;
}

export class AnalysisRatiosDto implements AnalysisRatios {
  @IsNumber() @Min(0) @Max(1) strengthRatio!: number;
  @IsNumber() @Min(0) @Max(1) weaknessRatio!: number;
  @IsNumber() @Min(0) @Max(1) criticalRatio!: number;
}

export class SeniorityBandDto implements SeniorityBand {
  @IsIn(EXPERIENCE_LEVELS)
  level!: ExperienceLevel;

  @IsNumber()
  @Min(0)
  minYears!: number;
}

export class ScoringFileDto {
  @ValidateNested()
  @Type(() => IntakeLimitsDto)
  intake!: IntakeLimitsDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CategoryDefinitionDto)
  categories!: CategoryDefinitionDto[];

  @ValidateNested()
  @Type(() => ScoringThresholdsDto)
  thresholds!: ScoringThresholdsDto;

  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => GradeTierDto)
  gradeTiers!: GradeTierDto[];

  @ValidateNested()
  @Type(() => AnalysisRatiosDto)
  analysis!: AnalysisRatiosDto;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SeniorityBandDto)
  seniority!: SeniorityBandDto[];
}

// lexicon.json

export class LexiconFileDto implements Lexicon {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  actionVerbs!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  countNouns!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  durationUnits!: string[];

  @IsArray()
  @IsString({ each: true })
  verbSkills!: string[];
}
