import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CategoryDefinition,
  CategoryScore,
  ResumeProfile,
  RuleOutcome,
  ScoringConfig,
} from '../../common/interfaces';
import { CATEGORY_GATES, rulesForCategory } from './scoring-rules';

@Injectable()
export class CategoryScorerTool {
  private readonly logger = new Logger(CategoryScorerTool.name);

  constructor(@Inject('SCORING_CONFIG') private readonly config: ScoringConfig) {}

  /**
   * Score every category in configured order. Categories never read each
   * other's results.
   */
  score(profile: ResumeProfile): CategoryScore[] {
    const scores = this.config.categories.map((definition) =>
      this.scoreCategory(definition, profile),
    );
    this.logger.debug(
      `Category scores: ${scores.map((s) => `${s.category}=${s.earned}/${s.max}`).join(', ')}`,
    );
    return scores;
  }

  scoreCategory(definition: CategoryDefinition, profile: ResumeProfile): CategoryScore {
    const { name, label, max } = definition;

    const gate = CATEGORY_GATES[name];
    if (gate && !gate.test(profile)) {
      return { category: name, label, earned: 0, max, outcomes: [], reasons: [`-${max}: ${gate.reason}`] };
    }

    const outcomes: RuleOutcome[] = rulesForCategory(name).map((rule) => {
      const points = definition.rules[rule.id] ?? 0;
      const passed = rule.test(profile, this.config.thresholds);
      const reason = passed
        ? `+${points}: ${rule.passReason(profile, this.config.thresholds)}`
        : `-${points}: ${rule.failReason(profile, this.config.thresholds)}`;
      return { ruleId: rule.id, points, passed, reason };
    });

    const earned = outcomes
      .filter((outcome) => outcome.passed)
      .reduce((sum, outcome) => sum + outcome.points, 0);

    return {
      category: name,
      label,
      earned: Math.min(max, Math.max(0, earned)),
      max,
      outcomes,
      reasons: outcomes.map((outcome) => outcome.reason),
    };
  }
}
