import { Inject, Injectable } from '@nestjs/common';
import {
  CategoryScore,
  GradeTier,
  ScoreReport,
  ScoringConfig,
} from '../../common/interfaces';
import { deepFreeze } from '../../common/utils/object.utils';

const MAX_TOTAL = 100;

@Injectable()
export class AggregateScorerTool {
  constructor(@Inject('SCORING_CONFIG') private readonly config: ScoringConfig) {}

  /**
   * Combine category scores into the final report. The total is derived
   * from the categories here and nowhere else.
   */
  aggregate(categories: CategoryScore[]): ScoreReport {
    const sum = categories.reduce((total, category) => total + category.earned, 0);
    const total = Math.min(MAX_TOTAL, Math.max(0, sum));

    return deepFreeze({
      categories: categories.map((category) => ({
        ...category,
        outcomes: category.outcomes.map((outcome) => ({ ...outcome })),
        reasons: [...category.reasons],
      })),
      total,
      grade: this.gradeFor(total),
    });
  }

  // Tiers are validated to descend and end at 0, so a match always exists
  gradeFor(total: number): GradeTier {
    const tiers = this.config.gradeTiers;
    const tier = tiers.find((candidate) => total >= candidate.minPoints) ?? tiers[tiers.length - 1];
    return { ...tier };
  }
}
