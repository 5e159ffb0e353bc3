import { Injectable } from '@nestjs/common';
import { RawDocument } from '../../common/interfaces';

const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;
const ZERO_WIDTH = /[\u200B-\u200D\u2060\uFEFF]/g;
const SOFT_SPACES = /[\t\u00A0\u2000-\u200A\u202F\u205F\u3000]/g;
const BULLET_PREFIX = /^(?:[\u2022\u25CF\u25CB\u25AA\u25A0\u25E6\u2023\u2219\u00B7\u25C6\u25BA\u25B6\u2713\u2714]|[-*\u2013\u2014](?=\s))\s*/;

const REPLACEMENTS: Array<[RegExp, string]> = [
  [/[\u2018\u2019\u201A\u201B]/g, "'"],
  [/[\u201C\u201D\u201E\u201F]/g, '"'],
  [/\uFB00/g, 'ff'],
  [/\uFB01/g, 'fi'],
  [/\uFB02/g, 'fl'],
  [/\uFB03/g, 'ffi'],
  [/\uFB04/g, 'ffl'],
];

@Injectable()
export class TextNormalizerService {
  /**
   * Turn extracted text into trimmed, non-empty lines. Leading bullet
   * glyphs are removed and the affected line indexes are remembered so
   * later stages can still tell bullet points apart.
   */
  normalize(text: string, sourceByteSize?: number): RawDocument {
    const lines: string[] = [];
    const bulletLineIndexes: number[] = [];

    const cleaned = REPLACEMENTS.reduce(
      (value, [pattern, replacement]) => value.replace(pattern, replacement),
      text.replace(/\r\n?/g, '\n'),
    )
      .replace(ZERO_WIDTH, '')
      .replace(SOFT_SPACES, ' ')
      .replace(CONTROL_CHARS, '');

    for (const rawLine of cleaned.split('\n')) {
      let line = rawLine.trim();
      const bullet = BULLET_PREFIX.test(line);
      if (bullet) {
        line = line.replace(BULLET_PREFIX, '');
      }
      line = line.replace(/\s+/g, ' ').trim();
      if (line.length === 0) continue;

      if (bullet) bulletLineIndexes.push(lines.length);
      lines.push(line);
    }

    return Object.freeze({
      lines: Object.freeze(lines),
      bulletLineIndexes: Object.freeze(bulletLineIndexes),
      sourceByteSize: sourceByteSize ?? Buffer.byteLength(text, 'utf8'),
    });
  }
}
