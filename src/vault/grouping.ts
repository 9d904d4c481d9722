import type { DuplicateCluster, GroupingKey, GroupingOptions, VaultRecord } from '../types/index.js';
import { domainOrName, loginId, loginIdentifiers } from './normalize.js';

export const DEFAULT_GROUPING_OPTIONS: Required<GroupingOptions> = {
  strictPasswords: true,
  emailUsernameEquivalence: true,
};

export function resolveGroupingOptions(options: GroupingOptions = {}): Required<GroupingOptions> {
  return {
    strictPasswords: options.strictPasswords ?? DEFAULT_GROUPING_OPTIONS.strictPasswords,
    emailUsernameEquivalence: options.emailUsernameEquivalence ?? DEFAULT_GROUPING_OPTIONS.emailUsernameEquivalence,
  };
}

export function groupingKey(record: VaultRecord, options: GroupingOptions = {}): GroupingKey {
  const opts = resolveGroupingOptions(options);
  const key: GroupingKey = {
    itemType: record.itemType,
    domainOrName: domainOrName(record),
    loginId: loginId(record, opts.emailUsernameEquivalence),
  };
  if (opts.strictPasswords) key.password = record.password;
  return key;
}

/**
 * Partition records into duplicate clusters, singletons included.
 *
 * Records are bucketed on item type, site identity and (when strict) the
 * password. Within a bucket, records sharing any login identifier are joined
 * transitively; records with no identifier join each other. Clusters come out
 * in order of their first member and members keep input order.
 */
export function groupRecords(records: readonly VaultRecord[], options: GroupingOptions = {}): DuplicateCluster[] {
  const opts = resolveGroupingOptions(options);
  const sets = new DisjointSet(records.length);
  const buckets = new Map<string, number[]>();
  const risky = new Set<number>();

  records.forEach((record, index) => {
    const key = groupingKey(record, opts);
    if (!key.domainOrName && !key.loginId) {
      risky.add(index);
      return;
    }
    const bucketKey = JSON.stringify([key.itemType, key.domainOrName, key.password ?? null]);
    const bucket = buckets.get(bucketKey);
    if (bucket) bucket.push(index);
    else buckets.set(bucketKey, [index]);
  });

  for (const bucket of buckets.values()) {
    const owner = new Map<string, number>();
    let anonymous: number | undefined;
    for (const index of bucket) {
      const ids = loginIdentifiers(records[index], opts.emailUsernameEquivalence);
      if (ids.length === 0) {
        if (anonymous === undefined) anonymous = index;
        else sets.union(anonymous, index);
        continue;
      }
      for (const id of ids) {
        const first = owner.get(id);
        if (first === undefined) owner.set(id, index);
        else sets.union(first, index);
      }
    }
  }

  const byRoot = new Map<number, number[]>();
  const order: number[][] = [];
  records.forEach((_record, index) => {
    if (risky.has(index)) {
      order.push([index]);
      return;
    }
    const root = sets.find(index);
    const members = byRoot.get(root);
    if (members) {
      members.push(index);
    } else {
      const fresh = [index];
      byRoot.set(root, fresh);
      order.push(fresh);
    }
  });

  return order.map((indices, n) => {
    const members = indices.map(i => records[i]);
    return {
      id: `cluster-${n + 1}`,
      key: groupingKey(members[0], opts),
      members,
      riskyMergeAvoided: indices.length === 1 && risky.has(indices[0]),
    };
  });
}

class DisjointSet {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) root = this.parent[root];
    while (this.parent[i] !== root) {
      const next = this.parent[i];
      this.parent[i] = root;
      i = next;
    }
    return root;
  }

  /** The smaller index becomes the root. */
  union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    if (ra < rb) this.parent[rb] = ra;
    else this.parent[ra] = rb;
  }
}
