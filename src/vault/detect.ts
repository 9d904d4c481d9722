import type { DetectionMatch, DetectionResult, ProviderPlugin } from '../types/index.js';
import { UNKNOWN_PROVIDER } from '../types/index.js';
import type { ProviderRegistry } from '../providers/registry.js';

export const DEFAULT_DETECTION_THRESHOLD = 0.5;

/** Weight of optional-column and header-coverage ratios relative to required columns. */
const SECONDARY_WEIGHT = 0.25;

export interface DetectOptions {
  threshold?: number;
}

/** Trim, unquote, lower-case, drop punctuation and collapse whitespace. */
export function normalizeHeader(header: string): string {
  return header
    .trim()
    .replace(/^["']+|["']+$/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Score one plugin against a header row. Required columns dominate; optional
 * columns and the share of header columns the plugin recognises each add a
 * smaller weight, so a format whose columns are a subset of another's does
 * not tie with it.
 */
export function scorePlugin(plugin: ProviderPlugin, headers: readonly string[]): DetectionMatch {
  const present = new Set(headers.map(normalizeHeader).filter(Boolean));
  const { required, optional } = plugin.headerFingerprint;
  const known = new Set([...required, ...optional].map(normalizeHeader));

  const matchedRequired = required.filter(c => present.has(normalizeHeader(c)));
  const missingRequired = required.filter(c => !present.has(normalizeHeader(c)));
  const matchedOptional = optional.filter(c => present.has(normalizeHeader(c)));

  const requiredRatio = required.length ? matchedRequired.length / required.length : 0;
  const optionalRatio = optional.length ? matchedOptional.length / optional.length : 0;
  const headerCoverage = present.size ? [...present].filter(h => known.has(h)).length / present.size : 0;

  const divisor = 1 + (optional.length ? SECONDARY_WEIGHT : 0) + SECONDARY_WEIGHT;
  const partialScore = (requiredRatio + SECONDARY_WEIGHT * (optionalRatio + headerCoverage)) / divisor;

  return {
    providerId: plugin.providerId,
    score: missingRequired.length === 0 ? partialScore : 0,
    partialScore,
    matchedRequired,
    missingRequired,
    matchedOptional,
    totalOptional: optional.length,
    headerCoverage,
  };
}

function unknown(explanation: string, matches: DetectionMatch[] = []): DetectionResult {
  return {
    status: 'unknown',
    providerId: UNKNOWN_PROVIDER,
    confidence: 0,
    explanation,
    ambiguousCandidates: [],
    matches,
  };
}

function describe(match: DetectionMatch): string {
  const required = match.matchedRequired.length + match.missingRequired.length;
  let text = `${match.providerId} (score ${match.score.toFixed(2)}, `
    + `required ${match.matchedRequired.length}/${required}, `
    + `optional ${match.matchedOptional.length}/${match.totalOptional})`;
  if (match.missingRequired.length > 0) {
    text += `; missing required: ${match.missingRequired.join(', ')}`;
  }
  return text;
}

/**
 * Identify which provider produced a CSV from its header row alone.
 * Ambiguity and no-match are results, not errors.
 */
export function detect(
  registry: ProviderRegistry,
  headers: readonly string[],
  options: DetectOptions = {},
): DetectionResult {
  const threshold = options.threshold ?? DEFAULT_DETECTION_THRESHOLD;

  if (headers.every(h => normalizeHeader(h) === '')) return unknown('No headers provided');
  const plugins = registry.plugins();
  if (plugins.length === 0) return unknown('No provider plugins registered');

  // Stable sort keeps registration order among equal scores.
  const matches = plugins
    .map(plugin => scorePlugin(plugin, headers))
    .filter(m => m.partialScore > 0)
    .sort((a, b) => b.score - a.score || b.partialScore - a.partialScore);

  const best = matches[0];
  if (!best) return unknown('No provider matched the header row');
  if (best.score === 0) {
    return unknown(`No provider has all required columns. Closest: ${describe(best)}`, matches);
  }
  if (best.score < threshold) {
    return unknown(
      `Best match ${describe(best)} is below the detection threshold ${threshold}`,
      matches,
    );
  }

  const tied = matches.filter(m => m.score === best.score).map(m => m.providerId);
  if (tied.length > 1) {
    return {
      status: 'ambiguous',
      providerId: UNKNOWN_PROVIDER,
      confidence: best.score,
      explanation: `Header row fits ${tied.join(', ')} equally well (score ${best.score.toFixed(2)}); choose one explicitly`,
      ambiguousCandidates: tied,
      matches,
    };
  }

  return {
    status: 'matched',
    providerId: best.providerId,
    confidence: best.score,
    explanation: `Best match: ${describe(best)}`,
    ambiguousCandidates: [],
    matches,
  };
}
