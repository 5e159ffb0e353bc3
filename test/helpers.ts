import * as path from 'path';
import {
  ResumeProfile,
  ScoringConfig,
  SectionCoverage,
  SectionKind,
} from '../src/common/interfaces';
import { loadScoringConfig } from '../src/config/scoring-config.loader';
import { TextNormalizerService } from '../src/analysis/services/text-normalizer.service';
import { SectionSegmenterService } from '../src/analysis/services/section-segmenter.service';
import { QuantificationDetectorService } from '../src/analysis/services/quantification-detector.service';
import { EntityExtractorService } from '../src/analysis/services/entity-extractor.service';

export const SCORING_CONFIG_DIR = path.join(__dirname, '..', 'config', 'scoring');

export const REFERENCE_DATE = new Date(Date.UTC(2024, 5, 1));

let cachedConfig: ScoringConfig | undefined;

export function loadTestConfig(): ScoringConfig {
  cachedConfig ??= loadScoringConfig(SCORING_CONFIG_DIR);
  return cachedConfig;
}

/**
 * Normalize, segment and extract a profile with the shipped tables
 */
export function profileFromText(text: string, config: ScoringConfig = loadTestConfig()): ResumeProfile {
  const normalizer = new TextNormalizerService();
  const segmenter = new SectionSegmenterService(config);
  const extractor = new EntityExtractorService(config, new QuantificationDetectorService(config));
  return extractor.extract(segmenter.segment(normalizer.normalize(text)), {
    referenceDate: REFERENCE_DATE,
  });
}

const coverage = (
  entries: Partial<Record<SectionKind, SectionCoverage>>,
): Record<SectionKind, SectionCoverage> => ({
  CONTACT: { sections: 0, lines: 0 },
  SUMMARY: { sections: 0, lines: 0 },
  SKILLS: { sections: 0, lines: 0 },
  EXPERIENCE: { sections: 0, lines: 0 },
  PROJECTS: { sections: 0, lines: 0 },
  EDUCATION: { sections: 0, lines: 0 },
  CERTIFICATIONS: { sections: 0, lines: 0 },
  OTHER: { sections: 0, lines: 0 },
  ...entries,
});

export type ProfileOverrides = Partial<Omit<ResumeProfile, 'stats' | 'sectionCoverage'>> & {
  stats?: Partial<ResumeProfile['stats']>;
  sectionCoverage?: Partial<Record<SectionKind, SectionCoverage>>;
};

/**
 * Hand-built profile for scorer tests. Defaults describe an empty
 * document with no sections.
 */
export function buildProfile(overrides: ProfileOverrides = {}): ResumeProfile {
  return {
    contact: overrides.contact ?? { email: null, phone: null, location: null },
    skills: overrides.skills ?? [],
    quantifiedClaims: overrides.quantifiedClaims ?? [],
    experience: overrides.experience ?? [],
    sectionCoverage: coverage(overrides.sectionCoverage ?? {}),
    headingCount: overrides.headingCount ?? 0,
    stats: {
      wordCount: 0,
      lineCount: 0,
      bulletLineCount: 0,
      actionVerbLineCount: 0,
      projectCount: 0,
      experienceYears: 0,
      experienceLevel: 'entry',
      hasEducation: false,
      ...overrides.stats,
    },
  };
}

export const FULL_RESUME = [
  'Jane Doe',
  'jane.doe@example.com | +1 (555) 123-4567 | Austin, TX',
  'SUMMARY',
  'Backend engineer with six years of experience building reliable services.',
  'Comfortable owning services end to end, from design reviews to on-call rotations and postmortems.',
  'SKILLS',
  'Python, Java, TypeScript, SQL, React, Node.js',
  'Docker, Kubernetes, AWS, Git, PostgreSQL and Redis',
  'Leadership, Communication, Machine Learning, Microservices',
  'EXPERIENCE',
  'Senior Software Engineer, Acme Corp | Jan 2020 - Present',
  '- Led migration of 12 microservices to Kubernetes, cutting deploy time by 40%',
  '- Reduced AWS costs by $120k per year through rightsizing',
  '- Built a REST API serving 2 million requests per day',
  'Software Engineer, Beta Labs | Jun 2017 - Dec 2019',
  '- Developed data pipelines in Python processing 50k records per hour',
  '- Mentored 3 junior engineers on testing and code review',
  'PROJECTS',
  'Open Source Task Queue | 2021 - 2022',
  '- Designed a Redis-backed job queue used by 200 developers',
  'EDUCATION',
  'B.S. Computer Science, State University, 2017',
].join('\n');
