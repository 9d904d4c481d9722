import type {
  Decision,
  DecisionOutcome,
  DuplicateCluster,
  ExactDuplicateResolution,
  ReviewCluster,
  VaultRecord,
} from '../types/index.js';
import { DecisionError } from '../utils/index.js';
import { buildMergedNotes, choosePreferred, isExactDuplicate } from './merge.js';
import { cloneRecord, recordId } from './model.js';

export interface ResolvedClusters {
  /** Singletons and exact-duplicate survivors, in cluster order. */
  autoResolved: VaultRecord[];
  pending: ReviewCluster[];
  removed: ExactDuplicateResolution[];
}

export function toReviewCluster(cluster: DuplicateCluster): ReviewCluster {
  const preferred = choosePreferred(cluster.members);
  return {
    id: cluster.id,
    key: cluster.key,
    members: cluster.members,
    preferred,
    alternatives: cluster.members.filter(m => m !== preferred),
    proposedNotes: buildMergedNotes(cluster.members, preferred),
  };
}

export function resolveClusters(clusters: readonly DuplicateCluster[]): ResolvedClusters {
  const result: ResolvedClusters = { autoResolved: [], pending: [], removed: [] };

  for (const cluster of clusters) {
    const [first, ...rest] = cluster.members;
    if (!first) continue;
    if (rest.length === 0) {
      result.autoResolved.push(first);
      continue;
    }
    if (rest.every(member => isExactDuplicate(first, member))) {
      const kept = choosePreferred(cluster.members);
      result.autoResolved.push(cloneRecord(kept));
      result.removed.push({
        clusterId: cluster.id,
        kept,
        removed: cluster.members.filter(m => m !== kept),
      });
      continue;
    }
    result.pending.push(toReviewCluster(cluster));
  }

  return result;
}

/**
 * Apply a caller's decision to one cluster. Keeping one record folds every
 * other member's differing values into its notes; keep-all and skip leave the
 * members untouched.
 */
export function applyDecision(
  cluster: Pick<DuplicateCluster, 'id' | 'members'>,
  decision: Decision,
): DecisionOutcome {
  switch (decision.kind) {
    case 'keep-all':
    case 'skip':
      return { records: [...cluster.members], discarded: [] };
    case 'keep-best':
      return keep(cluster.members, choosePreferred(cluster.members));
    case 'keep-one': {
      const chosen = cluster.members.find(m => recordId(m) === decision.recordId);
      if (!chosen) {
        throw new DecisionError(`Record ${decision.recordId} is not a member of ${cluster.id}`);
      }
      return keep(cluster.members, chosen);
    }
  }
}

function keep(members: readonly VaultRecord[], chosen: VaultRecord): DecisionOutcome {
  return {
    records: [cloneRecord(chosen, buildMergedNotes(members, chosen))],
    discarded: members.filter(m => m !== chosen),
  };
}
