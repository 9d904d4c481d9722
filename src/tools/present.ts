import type { ItemType, RecordSummary, ReviewCluster, VaultRecord } from '../types/index.js';
import { toSummary } from '../types/index.js';
import { recordId } from '../vault/model.js';
import { formatTimestamp } from '../vault/timestamp.js';

const SECRET_LINE_RE = /^- (passwords|TOTP secrets): .*$/gm;

export interface MemberView extends RecordSummary {
  preferred: boolean;
  samePasswordAsPreferred: boolean;
  updated: string;
}

export interface ClusterView {
  id: string;
  key: { itemType: ItemType; domainOrName: string; loginId: string };
  preferredId: string;
  members: MemberView[];
  proposedNotes: string;
}

/** Hide password and TOTP values listed in a merged-notes block. */
export function redactNotes(notes: string): string {
  return notes.replace(SECRET_LINE_RE, (_line, label: string) => `- ${label}: [redacted]`);
}

export function presentRecord(record: VaultRecord, preferred: VaultRecord): MemberView {
  return {
    ...toSummary(record),
    preferred: record === preferred,
    samePasswordAsPreferred: record.password === preferred.password,
    updated: formatTimestamp(record.updatedAt),
  };
}

export function presentCluster(cluster: ReviewCluster): ClusterView {
  return {
    id: cluster.id,
    key: {
      itemType: cluster.key.itemType,
      domainOrName: cluster.key.domainOrName,
      loginId: cluster.key.loginId,
    },
    preferredId: recordId(cluster.preferred),
    members: cluster.members.map(m => presentRecord(m, cluster.preferred)),
    proposedNotes: redactNotes(cluster.proposedNotes),
  };
}
