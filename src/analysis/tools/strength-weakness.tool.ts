import { Inject, Injectable } from '@nestjs/common';
import {
  CATEGORY_NAMES,
  CategoryScore,
  ResumeProfile,
  ScoreReport,
  ScoringConfig,
  Strength,
  StrengthWeaknessResult,
  Weakness,
} from '../../common/interfaces';

const categoryOrder = (category: CategoryScore['category']): number =>
  CATEGORY_NAMES.indexOf(category);

const ratioOf = (category: CategoryScore): number =>
  category.max > 0 ? category.earned / category.max : 0;

@Injectable()
export class StrengthWeaknessTool {
  constructor(@Inject('SCORING_CONFIG') private readonly config: ScoringConfig) {}

  /**
   * Classify categories by their earned/max ratio. Evidence and issues are
   * the category scorer's own reason strings; nothing is re-judged here.
   */
  analyze(_profile: ResumeProfile, report: ScoreReport): StrengthWeaknessResult {
    const { strengthRatio, weaknessRatio, criticalRatio } = this.config.analysis;
    const strengths: Strength[] = [];
    const weaknesses: Weakness[] = [];

    for (const category of report.categories) {
      const ratio = ratioOf(category);
      const points = `${category.earned}/${category.max} points`;

      if (ratio >= strengthRatio) {
        strengths.push({
          category: category.category,
          label: category.label,
          ratio,
          statement: `${category.label} is a strength (${points})`,
          evidence: category.outcomes
            .filter((outcome) => outcome.passed)
            .map((outcome) => outcome.reason),
        });
      } else if (ratio < weaknessRatio) {
        const failed = category.outcomes
          .filter((outcome) => !outcome.passed)
          .map((outcome) => outcome.reason);
        weaknesses.push({
          category: category.category,
          label: category.label,
          ratio,
          statement: `${category.label} needs improvement (${points})`,
          // A gated category has no outcomes, only its single reason
          issues: category.outcomes.length > 0 ? failed : [...category.reasons],
          priority: ratio < criticalRatio ? 'CRITICAL' : 'HIGH',
        });
      }
    }

    strengths.sort(
      (a, b) => b.ratio - a.ratio || categoryOrder(a.category) - categoryOrder(b.category),
    );
    weaknesses.sort(
      (a, b) => a.ratio - b.ratio || categoryOrder(a.category) - categoryOrder(b.category),
    );
    return { strengths, weaknesses };
  }
}
