import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  RequiredSkill,
  ResumeProfile,
  RoleExperienceFit,
  RoleMatchResult,
  RoleProfile,
  RoleReadiness,
  ScoringConfig,
} from '../../common/interfaces';

export const DEFAULT_SUGGESTION_LIMIT = 4;

@Injectable()
export class RoleMatcherTool {
  private readonly logger = new Logger(RoleMatcherTool.name);

  constructor(@Inject('SCORING_CONFIG') private readonly config: ScoringConfig) {}

  get roles(): RoleProfile[] {
    return this.config.roles;
  }

  findRole(roleId: string): RoleProfile | undefined {
    return this.config.roles.find((role) => role.id === roleId);
  }

  /**
   * Compatibility starts at 100 and loses the weight of every required
   * skill the profile lacks, floored at 0. Missing skills are ordered by
   * weight, heaviest first; equal weights keep the role's declared order.
   */
  match(profile: ResumeProfile, role: RoleProfile): RoleMatchResult {
    const present = new Map(profile.skills.map((skill) => [skill.canonical, skill]));

    const matchedSkills: string[] = [];
    const weakSkills: string[] = [];
    const missing: RequiredSkill[] = [];

    for (const requirement of role.requiredSkills) {
      const token = present.get(requirement.skill);
      if (!token) {
        missing.push({ skill: requirement.skill, weight: requirement.weight });
        continue;
      }
      matchedSkills.push(requirement.skill);
      if (token.confidence === 'fuzzy') weakSkills.push(requirement.skill);
    }

    const missingSkills = [...missing].sort((a, b) => b.weight - a.weight);
    const penalty = missingSkills.reduce((sum, requirement) => sum + requirement.weight, 0);
    const compatibility = Math.min(100, Math.max(0, 100 - penalty));

    return {
      roleId: role.id,
      roleName: role.name,
      compatibility,
      fitLevel: this.fitLevelFor(compatibility),
      matchedSkills,
      missingSkills,
      weakSkills,
      experience: this.experienceFit(profile, role),
    };
  }

  matchAll(profile: ResumeProfile, roles: RoleProfile[] = this.config.roles): RoleMatchResult[] {
    const results = roles.map((role) => this.match(profile, role));
    this.logger.debug(`Matched profile against ${results.length} roles`);
    return results;
  }

  // Highest compatibility first; ties keep the input order
  suggestRoles(
    results: RoleMatchResult[],
    limit: number = DEFAULT_SUGGESTION_LIMIT,
  ): RoleMatchResult[] {
    return [...results]
      .sort((a, b) => b.compatibility - a.compatibility)
      .slice(0, Math.max(0, limit));
  }

  readiness(results: RoleMatchResult[]): RoleReadiness {
    const [best] = this.suggestRoles(results, 1);
    if (!best) {
      return { bestRoleId: null, compatibility: 0, fitLevel: this.fitLevelFor(0) };
    }
    return {
      bestRoleId: best.roleId,
      compatibility: best.compatibility,
      fitLevel: best.fitLevel,
    };
  }

  fitLevelFor(compatibility: number): string {
    const bands = this.config.fitLevels;
    const band =
      bands.find((candidate) => compatibility >= candidate.minCompatibility) ??
      bands[bands.length - 1];
    return band.label;
  }

  private experienceFit(profile: ResumeProfile, role: RoleProfile): RoleExperienceFit {
    const band = this.config.seniority.find((candidate) => candidate.level === role.seniority);
    const minYears = band?.minYears ?? 0;
    return {
      expectedLevel: role.seniority,
      minYears,
      estimatedYears: profile.stats.experienceYears,
      meetsExpectation: profile.stats.experienceYears >= minYears,
    };
  }
}
