import type { ItemType, VaultRecord } from './record.js';

export interface GroupingOptions {
  /** Password is part of the grouping key. */
  strictPasswords?: boolean;
  /** Username and email are interchangeable login identifiers. */
  emailUsernameEquivalence?: boolean;
}

export interface GroupingKey {
  itemType: ItemType;
  domainOrName: string;
  loginId: string;
  password?: string;
}

export interface DuplicateCluster {
  id: string;
  key: GroupingKey;
  members: VaultRecord[];
  /** Record had no identity signal and was kept out of grouping. */
  riskyMergeAvoided: boolean;
}

export interface ReviewCluster {
  id: string;
  key: GroupingKey;
  members: VaultRecord[];
  preferred: VaultRecord;
  alternatives: VaultRecord[];
  proposedNotes: string;
}

export type Decision =
  | { kind: 'keep-one'; recordId: string }
  | { kind: 'keep-best' }
  | { kind: 'keep-all' }
  | { kind: 'skip' };

export type DecisionKind = Decision['kind'];

export interface DecisionOutcome {
  records: VaultRecord[];
  discarded: VaultRecord[];
}

export interface ExactDuplicateResolution {
  clusterId: string;
  kept: VaultRecord;
  removed: VaultRecord[];
}

export interface GroupNotice {
  kind: 'risky-merge-avoided';
  recordId: string;
  message: string;
}

export interface GroupStats {
  inputCount: number;
  clusterCount: number;
  exactDuplicatesRemoved: number;
  pendingClusters: number;
  ungrouped: number;
}

export interface GroupResult {
  autoResolved: VaultRecord[];
  pending: ReviewCluster[];
  removed: ExactDuplicateResolution[];
  notices: GroupNotice[];
  stats: GroupStats;
}
