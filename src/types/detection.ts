export const UNKNOWN_PROVIDER = 'unknown';

export type DetectionStatus = 'matched' | 'ambiguous' | 'unknown';

export interface DetectionMatch {
  providerId: string;
  /** Exact-fit score; 0 when a required column is missing. */
  score: number;
  /** Weighted score ignoring missing required columns. */
  partialScore: number;
  matchedRequired: string[];
  missingRequired: string[];
  matchedOptional: string[];
  totalOptional: number;
  /** Share of the file's header columns this plugin recognises. */
  headerCoverage: number;
}

export interface DetectionResult {
  status: DetectionStatus;
  providerId: string;
  confidence: number;
  explanation: string;
  ambiguousCandidates: string[];
  /** Every plugin with a non-zero partial score, best first. */
  matches: DetectionMatch[];
}
