import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AnalysisInput,
  AnalysisOutcome,
  ContentTooSparse,
  EvaluationResult,
  NarrativeCapability,
  ScoringConfig,
} from '../common/interfaces';
import { countWords } from '../common/utils/text.utils';
import { TextNormalizerService } from './services/text-normalizer.service';
import { SectionSegmenterService } from './services/section-segmenter.service';
import { EntityExtractorService } from './services/entity-extractor.service';
import { NarrativeService } from './services/narrative.service';
import { CategoryScorerTool } from './tools/category-scorer.tool';
import { AggregateScorerTool } from './tools/aggregate-scorer.tool';
import { RoleMatcherTool } from './tools/role-matcher.tool';
import { StrengthWeaknessTool } from './tools/strength-weakness.tool';

export class UnknownRoleError extends Error {
  constructor(public readonly roleId: string) {
    super(`Unknown role: ${roleId}`);
    this.name = 'UnknownRoleError';
  }
}

@Injectable()
export class ResumeAnalysisAgent {
  private readonly logger = new Logger(ResumeAnalysisAgent.name);

  constructor(
    @Inject('SCORING_CONFIG') private readonly config: ScoringConfig,
    @Inject('NARRATIVE_CAPABILITY') private readonly narrativeCapability: NarrativeCapability,
    private readonly textNormalizer: TextNormalizerService,
    private readonly sectionSegmenter: SectionSegmenterService,
    private readonly entityExtractor: EntityExtractorService,
    private readonly categoryScorer: CategoryScorerTool,
    private readonly aggregateScorer: AggregateScorerTool,
    private readonly roleMatcher: RoleMatcherTool,
    private readonly strengthWeakness: StrengthWeaknessTool,
    private readonly narrativeService: NarrativeService,
  ) {}

  /**
   * Run the deterministic pipeline: normalize, segment, extract, score,
   * match roles and classify strengths. Malformed content lowers the
   * score; only an unknown target role id throws.
   */
  evaluate(input: AnalysisInput): EvaluationResult {
    if (input.targetRoleId !== undefined && !this.roleMatcher.findRole(input.targetRoleId)) {
      throw new UnknownRoleError(input.targetRoleId);
    }

    const document = this.textNormalizer.normalize(input.text, input.sourceByteSize);
    const text = document.lines.join('\n');
    const sparse = this.checkIntake(text, input.readable);
    if (sparse) {
      this.logger.warn(`Content too sparse: ${sparse.reason}`);
      return sparse;
    }

    const sections = this.sectionSegmenter.segment(document);
    const profile = this.entityExtractor.extract(sections, {
      referenceDate: input.referenceDate,
    });
    const report = this.aggregateScorer.aggregate(this.categoryScorer.score(profile));

    const roleMatches = this.roleMatcher.matchAll(profile);
    const targetRole =
      input.targetRoleId === undefined
        ? null
        : roleMatches.find((result) => result.roleId === input.targetRoleId) ?? null;
    const { strengths, weaknesses } = this.strengthWeakness.analyze(profile, report);

    this.logger.log(
      `Scored resume: ${report.total}/100 (${report.grade.label}), ${strengths.length} strengths, ${weaknesses.length} weaknesses`,
    );

    return {
      status: 'scored',
      profile,
      report,
      roleMatches,
      roleSuggestions: this.roleMatcher.suggestRoles(roleMatches),
      readiness: this.roleMatcher.readiness(roleMatches),
      targetRole,
      strengths,
      weaknesses,
    };
  }

  /**
   * Evaluate and, when requested, add the AI narrative. The narrative
   * never changes the scored results.
   */
  async analyze(input: AnalysisInput): Promise<AnalysisOutcome> {
    const evaluation = this.evaluate(input);
    if (evaluation.status === 'content_too_sparse') {
      return evaluation;
    }
    if (!input.includeNarrative) {
      return { ...evaluation, narrative: null };
    }

    const narrative = await this.narrativeService.augment(
      this.narrativeCapability,
      {
        profile: evaluation.profile,
        report: evaluation.report,
        weaknesses: evaluation.weaknesses,
        targetRole: evaluation.targetRole ?? undefined,
      },
      input.narrativeTimeoutMs,
    );
    return { ...evaluation, narrative };
  }

  private checkIntake(text: string, readable: boolean): ContentTooSparse | null {
    const characterCount = text.length;
    const wordCount = countWords(text);
    const { minCharacters, minWords } = this.config.intake;

    let reason: string | null = null;
    if (!readable) {
      reason = 'extracted text was judged unreadable';
    } else if (characterCount < minCharacters) {
      reason = `only ${characterCount} characters of text, at least ${minCharacters} required`;
    } else if (wordCount < minWords) {
      reason = `only ${wordCount} words of text, at least ${minWords} required`;
    }

    return reason === null
      ? null
      : { status: 'content_too_sparse', reason, characterCount, wordCount };
  }
}
