import { Injectable, Inject, Logger } from '@nestjs/common';
import { HfInference } from '@huggingface/inference';
import { NarrativeRequest } from '../../common/interfaces';

export interface LLMConfig {
  hfToken?: string;
  llmModel: string;
  maxNewTokens: number;
  timeoutMs: number;
}

@Injectable()
export class LLMService {
  private readonly logger = new Logger(LLMService.name);
  private readonly hf: HfInference | null;
  readonly model: string;

  constructor(@Inject('LLM_CONFIG') private readonly config: LLMConfig) {
    this.hf = config.hfToken ? new HfInference(config.hfToken) : null;
    this.model = config.llmModel;
    if (this.hf) {
      this.logger.log(`LLM Service initialized with model: ${this.model}`);
    } else {
      this.logger.warn('HF_TOKEN not set, AI narrative disabled');
    }
  }

  get enabled(): boolean {
    return this.hf !== null;
  }

  /**
   * Generate career-coach prose for an analyzed resume
   */
  async generateNarrative(request: NarrativeRequest): Promise<string> {
    if (!this.hf) {
      throw new Error('Narrative generation is not configured');
    }

    try {
      const response = await this.hf.textGeneration({
        model: this.model,
        inputs: this.buildNarrativePrompt(request),
        parameters: {
          max_new_tokens: this.config.maxNewTokens,
          temperature: 0.4,
          return_full_text: false,
        },
      });

      const text = this.stripCodeFences(response.generated_text);
      if (text.length === 0) {
        throw new Error('model returned an empty response');
      }
      this.logger.log(`Generated narrative (${text.length} chars)`);
      return text;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to generate narrative: ${message}`);
      throw new Error(`Failed to generate narrative: ${message}`);
    }
  }

  /**
   * Build the prompt from structured results only. Contact details are
   * reduced to whether they were found.
   */
  buildNarrativePrompt(request: NarrativeRequest): string {
    const { profile, report, weaknesses, targetRole } = request;
    const { stats, contact } = profile;

    const categories = report.categories
      .map(
        (category) =>
          `- ${category.label}: ${category.earned}/${category.max}\n${category.reasons
            .map((reason) => `    ${reason}`)
            .join('\n')}`,
      )
      .join('\n');

    const gaps =
      weaknesses.length > 0
        ? weaknesses
            .map((weakness) => `- [${weakness.priority}] ${weakness.label}: ${weakness.issues.join('; ')}`)
            .join('\n')
        : '- none';

    const role = targetRole
      ? `
TARGET ROLE: ${targetRole.roleName}
Compatibility: ${targetRole.compatibility}% (${targetRole.fitLevel})
Matched skills: ${targetRole.matchedSkills.join(', ') || 'none'}
Missing skills: ${targetRole.missingSkills.map((missing) => missing.skill).join(', ') || 'none'}
Expected level: ${targetRole.experience.expectedLevel} (${targetRole.experience.minYears}+ years)
`
      : '';

    return `You are an experienced career coach reviewing a resume that has already been scored by an ATS-style rule engine.
Write a concise assessment in plain prose with three short parts: overall impression, the most important fixes in priority order, and concrete rewrite suggestions.
Do not change or dispute the numeric scores.

PROFILE:
Email provided: ${contact.email !== null ? 'yes' : 'no'}
Phone provided: ${contact.phone !== null ? 'yes' : 'no'}
Location provided: ${contact.location !== null ? 'yes' : 'no'}
Skills (${profile.skills.length}): ${profile.skills.map((skill) => skill.canonical).join(', ') || 'none'}
Experience: ${stats.experienceYears} years (${stats.experienceLevel}), ${profile.experience.length} entries
Quantified achievements: ${profile.quantifiedClaims.length}
Action-verb lines: ${stats.actionVerbLineCount}
Words: ${stats.wordCount}

SCORE: ${report.total}/100 (${report.grade.label})
${categories}

WEAKNESSES:
${gaps}
${role}
ASSESSMENT:`;
  }

  private stripCodeFences(response: string): string {
    const codeBlockMatch = response.match(/```(?:\w+)?\s*([\s\S]*?)```/);
    return (codeBlockMatch ? codeBlockMatch[1] : response).trim();
  }
}
