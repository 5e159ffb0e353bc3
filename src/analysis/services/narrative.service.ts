import { Injectable, Logger } from '@nestjs/common';
import {
  NarrativeCapability,
  NarrativeOutcome,
  NarrativeRequest,
  NarrativeUsageEstimate,
} from '../../common/interfaces';
import { LLMService } from './llm.service';

// Rough prompt-size heuristic for English text
const CHARS_PER_TOKEN = 4;

export class NarrativeTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = 'NarrativeTimeoutError';
  }
}

@Injectable()
export class NarrativeService {
  private readonly logger = new Logger(NarrativeService.name);

  constructor(private readonly llmService: LLMService) {}

  // Absent when no inference token is configured
  createCapability(timeoutMs: number): NarrativeCapability {
    if (!this.llmService.enabled) {
      return { kind: 'absent', reason: 'AI narrative is not configured' };
    }
    return {
      kind: 'present',
      model: this.llmService.model,
      timeoutMs,
      generate: (request) => this.llmService.generateNarrative(request),
    };
  }

  /**
   * Ask the collaborator for prose, bounded by a timeout. Never rejects:
   * absence, errors and timeouts all come back as `unavailable`.
   */
  async augment(
    capability: NarrativeCapability,
    request: NarrativeRequest,
    timeoutMs?: number,
  ): Promise<NarrativeOutcome> {
    if (capability.kind === 'absent') {
      this.logger.warn(`AI insight unavailable: ${capability.reason}`);
      return { status: 'unavailable', reason: capability.reason };
    }

    const limit = timeoutMs ?? capability.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new NarrativeTimeoutError(limit)), limit);
    });

    try {
      const text = await Promise.race([capability.generate(request), timeout]);
      return { status: 'available', text, model: capability.model };
    } catch (error) {
      const reason =
        error instanceof NarrativeTimeoutError
          ? error.message
          : `generation failed: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.warn(`AI insight unavailable: ${reason}`);
      return { status: 'unavailable', reason };
    } finally {
      clearTimeout(timer);
    }
  }

  estimateUsage(request: NarrativeRequest): NarrativeUsageEstimate {
    const promptCharacters = this.llmService.buildNarrativePrompt(request).length;
    return {
      promptCharacters,
      estimatedTokens: Math.ceil(promptCharacters / CHARS_PER_TOKEN),
    };
  }
}
