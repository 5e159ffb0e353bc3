import { ResumeProfile } from './resume.interfaces';
import {
  RoleMatchResult,
  RoleReadiness,
  ScoreReport,
  Strength,
  Weakness,
} from './scoring.interfaces';

// Structured input handed to the AI narrative collaborator
export interface NarrativeRequest {
  profile: ResumeProfile;
  report: ScoreReport;
  weaknesses: Weakness[];
  targetRole?: RoleMatchResult;
}

export type NarrativeCapability =
  | {
      kind: 'present';
      model: string;
      timeoutMs: number;
      generate: (request: NarrativeRequest) => Promise<string>;
    }
  | {
      kind: 'absent';
      reason: string;
    };

export type NarrativeOutcome =
  | { status: 'available'; text: string; model: string }
  | { status: 'unavailable'; reason: string };

export interface NarrativeUsageEstimate {
  promptCharacters: number;
  estimatedTokens: number;
}

// Output of the extraction collaborator
export interface ExtractedDocument {
  text: string;
  numPages: number;
  fileName: string;
  byteSize: number;
  readable: boolean;
}

export interface AnalysisInput {
  text: string;
  readable: boolean;
  sourceByteSize?: number;
  targetRoleId?: string;
  includeNarrative?: boolean;
  narrativeTimeoutMs?: number;
  // Open date ranges ("Present") end here
  referenceDate?: Date;
}

export interface ContentTooSparse {
  status: 'content_too_sparse';
  reason: string;
  characterCount: number;
  wordCount: number;
}

export interface ScoredAnalysis {
  status: 'scored';
  profile: ResumeProfile;
  report: ScoreReport;
  roleMatches: RoleMatchResult[];
  roleSuggestions: RoleMatchResult[];
  readiness: RoleReadiness;
  targetRole: RoleMatchResult | null;
  strengths: Strength[];
  weaknesses: Weakness[];
}

export type EvaluationResult = ScoredAnalysis | ContentTooSparse;

export type AnalysisOutcome =
  | (ScoredAnalysis & { narrative: NarrativeOutcome | null })
  | ContentTooSparse;
