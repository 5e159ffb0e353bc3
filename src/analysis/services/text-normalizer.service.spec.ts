import { TextNormalizerService } from './text-normalizer.service';

const char = (code: number): string => String.fromCharCode(code);

describe('TextNormalizerService', () => {
  const normalizer = new TextNormalizerService();

  it('splits on any line ending and drops blank lines', () => {
    const document = normalizer.normalize('Jane Doe\r\n\r\nSUMMARY\rBuilt things  fast\n\n');

    expect(document.lines).toEqual(['Jane Doe', 'SUMMARY', 'Built things fast']);
    expect(document.bulletLineIndexes).toEqual([]);
  });

  it('strips bullet glyphs and records the bullet lines', () => {
    const document = normalizer.normalize('• Led team\n- Built API\n-5% churn\n* Shipped');

    expect(document.lines).toEqual(['Led team', 'Built API', '-5% churn', 'Shipped']);
    expect(document.bulletLineIndexes).toEqual([0, 1, 3]);
  });

  it('indexes bullets against the kept lines', () => {
    const document = normalizer.normalize('•\n\nIntro\n\n▪ Second point');

    expect(document.lines).toEqual(['Intro', 'Second point']);
    expect(document.bulletLineIndexes).toEqual([1]);
  });

  it('collapses tabs and typographic spaces', () => {
    const document = normalizer.normalize(`Python\t${char(0x00a0)}SQL${char(0x2003)}${char(0x2003)}Git`);

    expect(document.lines).toEqual(['Python SQL Git']);
  });

  it('removes zero-width and control characters', () => {
    const document = normalizer.normalize(`Kuber${char(0x200b)}netes${char(0x0007)}`);

    expect(document.lines).toEqual(['Kubernetes']);
  });

  it('replaces smart quotes and ligatures', () => {
    const document = normalizer.normalize(
      `${char(0x201c)}Team player${char(0x201d)} at the O${char(0xfb03)}ce${char(0x2019)}s help desk`,
    );

    expect(document.lines).toEqual([`"Team player" at the Office's help desk`]);
  });

  it('defaults the byte size to the UTF-8 length of the input', () => {
    expect(normalizer.normalize('é').sourceByteSize).toBe(2);
    expect(normalizer.normalize('é', 999).sourceByteSize).toBe(999);
  });

  it('returns a frozen document', () => {
    const document = normalizer.normalize('SKILLS\nPython');

    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.lines)).toBe(true);
    expect(Object.isFrozen(document.bulletLineIndexes)).toBe(true);
  });
});
