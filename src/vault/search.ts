import Fuse, { type IFuseOptions } from 'fuse.js';
import type { RecordSummary, VaultRecord } from '../types/index.js';
import { toSummary } from '../types/index.js';
import { DecisionError } from '../utils/index.js';
import { recordId } from './model.js';

// Secrets are never search keys.
const FUSE_OPTIONS: IFuseOptions<VaultRecord> = {
  keys: [
    { name: 'title', weight: 0.35 },
    { name: 'primaryUrl', weight: 0.25 },
    { name: 'username', weight: 0.15 },
    { name: 'email', weight: 0.15 },
    { name: 'secondaryUrls', weight: 0.05 },
    { name: 'folder', weight: 0.05 },
  ],
  threshold: 0.4,
  includeScore: true,
  ignoreLocation: true,
  minMatchCharLength: 2,
};

interface ScoredRecord {
  record: VaultRecord;
  score: number;
}

function rank(records: readonly VaultRecord[], query: string, limit: number): ScoredRecord[] {
  const fuse = new Fuse([...records], FUSE_OPTIONS);
  return fuse.search(query, { limit }).map(r => ({ record: r.item, score: r.score ?? 1 }));
}

export function searchRecords(
  records: VaultRecord[],
  query: string,
  limit: number = 20,
): RecordSummary[] {
  if (!query.trim()) {
    return records.slice(0, limit).map(toSummary);
  }
  return rank(records, query, limit).map(r => toSummary(r.record));
}

/**
 * Pick one record by its id, or by the best fuzzy match on title, URL,
 * username or email. Fails when nothing matches or the two best matches
 * score the same.
 */
export function pickRecord(records: readonly VaultRecord[], query: string): VaultRecord {
  const byId = records.find(r => recordId(r) === query);
  if (byId) return byId;

  const [best, next] = query.trim() ? rank(records, query, 2) : [];
  if (!best) {
    throw new DecisionError(`No member matches "${query}"`);
  }
  if (next && next.score === best.score) {
    throw new DecisionError(
      `"${query}" matches more than one member (${recordId(best.record)}, ${recordId(next.record)}); use a recordId`,
    );
  }
  return best.record;
}
