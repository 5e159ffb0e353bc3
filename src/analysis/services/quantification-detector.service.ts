import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  MetricType,
  QuantifiedClaim,
  ScoringConfig,
  Section,
} from '../../common/interfaces';

type ClaimSectionKind = QuantifiedClaim['sectionKind'];

interface MetricCue {
  type: MetricType;
  pattern: RegExp;
  // Capture group positions for the number and its optional multiplier
  numberGroup: number;
  multiplierGroup: number | null;
}

const NUMBER = '(\\d[\\d,]*(?:\\.\\d+)?)';
const MULTIPLIER = '(?:\\s*(k|m|b|thousand|million|billion)(?![a-z]))?';

const MULTIPLIER_FACTORS: Record<string, number> = {
  k: 1e3,
  thousand: 1e3,
  m: 1e6,
  million: 1e6,
  b: 1e9,
  billion: 1e9,
};

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const alternation = (words: string[]): string =>
  [...words]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');

const isClaimSection = (kind: Section['kind']): kind is ClaimSectionKind =>
  kind === 'EXPERIENCE' || kind === 'PROJECTS';

@Injectable()
export class QuantificationDetectorService {
  private readonly logger = new Logger(QuantificationDetectorService.name);
  // Checked in priority order; a line yields at most one claim
  private readonly cues: MetricCue[];

  constructor(@Inject('SCORING_CONFIG') config: ScoringConfig) {
    const countNouns = alternation(config.lexicon.countNouns);
    const durationUnits = alternation(config.lexicon.durationUnits);

    this.cues = [
      {
        type: 'PERCENT',
        pattern: new RegExp(`${NUMBER}\\s*(?:%|percent\\b|per cent\\b)`, 'i'),
        numberGroup: 1,
        multiplierGroup: null,
      },
      {
        type: 'CURRENCY',
        pattern: new RegExp(`[$\\u20AC\\u00A3\\u00A5\\u20B9]\\s?${NUMBER}${MULTIPLIER}`, 'i'),
        numberGroup: 1,
        multiplierGroup: 2,
      },
      {
        type: 'CURRENCY',
        pattern: new RegExp(`${NUMBER}${MULTIPLIER}\\s*(?:usd|eur|gbp|dollars|euros)\\b`, 'i'),
        numberGroup: 1,
        multiplierGroup: 2,
      },
      {
        type: 'COUNT',
        pattern: new RegExp(`${NUMBER}\\s*x\\b`, 'i'),
        numberGroup: 1,
        multiplierGroup: null,
      },
      {
        type: 'COUNT',
        pattern: new RegExp(
          `${NUMBER}${MULTIPLIER}\\+?\\s+(?:[a-z][\\w-]*\\s+){0,2}(?:${countNouns})\\b`,
          'i',
        ),
        numberGroup: 1,
        multiplierGroup: 2,
      },
      {
        type: 'DURATION',
        pattern: new RegExp(`${NUMBER}\\+?\\s*(?:${durationUnits})\\b`, 'i'),
        numberGroup: 1,
        multiplierGroup: null,
      },
    ];
  }

  /**
   * Find measurable outcomes in experience and project lines.
   */
  detect(sections: Section[]): QuantifiedClaim[] {
    const claims: QuantifiedClaim[] = [];

    for (const section of sections) {
      const sectionKind = section.kind;
      if (!isClaimSection(sectionKind)) continue;

      for (const line of section.body) {
        const claim = this.detectLine(line.text);
        if (claim) {
          claims.push({ lineIndex: line.index, sectionKind, text: line.text, ...claim });
        }
      }
    }

    this.logger.debug(`Detected ${claims.length} quantified claims`);
    return claims;
  }

  private detectLine(text: string): { metricType: MetricType; value: number } | null {
    for (const cue of this.cues) {
      const match = cue.pattern.exec(text);
      if (!match) continue;

      const multiplier =
        cue.multiplierGroup === null ? undefined : match[cue.multiplierGroup];
      return {
        metricType: cue.type,
        value: parseAmount(match[cue.numberGroup], multiplier),
      };
    }
    return null;
  }
}

export function parseAmount(raw: string, multiplier?: string): number {
  const base = Number(raw.replace(/,/g, ''));
  const factor = multiplier ? MULTIPLIER_FACTORS[multiplier.toLowerCase()] ?? 1 : 1;
  return base * factor;
}
