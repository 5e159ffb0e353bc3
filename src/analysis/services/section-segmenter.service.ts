import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  RawDocument,
  ScoringConfig,
  Section,
  SectionKind,
  SectionLine,
} from '../../common/interfaces';
import { normalizeHeading } from '../../common/utils/text.utils';

interface HeadingMatch {
  kind: SectionKind;
  label: string;
  // Content after `Label:` on the same line
  inline: string | null;
}

const HEADING_CONNECTORS = new Set(['and', 'of', '&', 'the', '/']);
const COMPOUND_SEPARATOR = /\s+and\s+|&|\/|,|\|/i;
const TRAILING_PUNCTUATION = /[.!?,;]$/;

@Injectable()
export class SectionSegmenterService {
  private readonly logger = new Logger(SectionSegmenterService.name);
  private readonly synonyms = new Map<string, SectionKind>();
  private readonly priority = new Map<SectionKind, number>();

  constructor(@Inject('SCORING_CONFIG') private readonly config: ScoringConfig) {
    config.sections.headings.forEach((rule, order) => {
      this.priority.set(rule.kind, order);
      for (const synonym of rule.synonyms) {
        this.synonyms.set(normalizeHeading(synonym), rule.kind);
      }
    });
  }

  /**
   * Split a document into labeled sections. The returned ranges are
   * contiguous and cover every line exactly once.
   */
  segment(document: RawDocument): Section[] {
    const { lines } = document;
    if (lines.length === 0) return [];

    const bullets = new Set(document.bulletLineIndexes);
    const bodyLines = (from: number, to: number): SectionLine[] => {
      const body: SectionLine[] = [];
      for (let index = from; index < to; index++) {
        body.push({ index, text: lines[index], bullet: bullets.has(index) });
      }
      return body;
    };

    const headings: Array<{ index: number; match: HeadingMatch }> = [];
    lines.forEach((line, index) => {
      if (bullets.has(index)) return;
      const match = this.matchHeading(line);
      if (match) headings.push({ index, match });
    });

    if (headings.length === 0) {
      this.logger.debug(`No headings in ${lines.length} lines`);
      return [
        { kind: 'OTHER', heading: null, start: 0, end: lines.length, body: bodyLines(0, lines.length) },
      ];
    }

    const sections: Section[] = [];
    const firstHeading = headings[0].index;
    const contactEnd = Math.min(firstHeading, this.config.sections.maxContactLines);
    if (contactEnd > 0) {
      sections.push({ kind: 'CONTACT', heading: null, start: 0, end: contactEnd, body: bodyLines(0, contactEnd) });
    }
    if (contactEnd < firstHeading) {
      sections.push({
        kind: 'SUMMARY',
        heading: null,
        start: contactEnd,
        end: firstHeading,
        body: bodyLines(contactEnd, firstHeading),
      });
    }

    headings.forEach(({ index, match }, position) => {
      const end = position + 1 < headings.length ? headings[position + 1].index : lines.length;
      const body = bodyLines(index + 1, end);
      if (match.inline !== null) {
        body.unshift({ index, text: match.inline, bullet: false });
      }
      sections.push({ kind: match.kind, heading: match.label, start: index, end, body });
    });

    this.logger.debug(
      `Segmented ${lines.length} lines into ${sections.length} sections (${headings.length} headings)`,
    );
    return sections;
  }

  private matchHeading(line: string): HeadingMatch | null {
    const colon = line.indexOf(':');
    if (colon > 0) {
      const label = line.slice(0, colon).trim();
      const rest = line.slice(colon + 1).trim();
      const kind = this.classify(label);
      if (!kind) return null;
      return { kind, label, inline: rest.length > 0 ? rest : null };
    }

    const kind = this.classify(line);
    return kind ? { kind, label: line, inline: null } : null;
  }

  private classify(label: string): SectionKind | null {
    const { maxHeadingLength, maxHeadingWords } = this.config.sections;
    const words = label.split(/\s+/).filter((word) => word.length > 0);
    if (
      words.length === 0 ||
      label.length > maxHeadingLength ||
      words.length > maxHeadingWords ||
      TRAILING_PUNCTUATION.test(label) ||
      !isHeadingCase(words)
    ) {
      return null;
    }

    const exact = this.synonyms.get(normalizeHeading(label));
    if (exact) return exact;

    // Compound headings resolve to the highest-priority part
    const parts = label
      .split(COMPOUND_SEPARATOR)
      .map(normalizeHeading)
      .filter((part) => part.length > 0);
    if (parts.length < 2) return null;

    let best: SectionKind | null = null;
    for (const part of parts) {
      const kind = this.synonyms.get(part);
      if (!kind) return null;
      if (best === null || this.rank(kind) < this.rank(best)) best = kind;
    }
    return best;
  }

  private rank(kind: SectionKind): number {
    return this.priority.get(kind) ?? Number.MAX_SAFE_INTEGER;
  }
}

function isHeadingCase(words: string[]): boolean {
  const text = words.join(' ');
  if (!/[A-Za-z]/.test(text)) return false;
  if (text === text.toUpperCase()) return true;

  return words.every((word) => {
    if (HEADING_CONNECTORS.has(word)) return true;
    const firstLetter = word.match(/[A-Za-z]/);
    return firstLetter === null || firstLetter[0] === firstLetter[0].toUpperCase();
  });
}
