import type { VaultRecord } from '../types/index.js';
import { timestampOrder } from './timestamp.js';

/** Fields that decide whether two records carry the same information. */
export const IMPORTANT_FIELDS = [
  'title',
  'primaryUrl',
  'secondaryUrls',
  'username',
  'email',
  'password',
  'notes',
  'totpUri',
  'totpSecret',
] as const satisfies readonly (keyof VaultRecord)[];

export type ImportantField = typeof IMPORTANT_FIELDS[number];

export const MERGED_HEADER = 'Merged from duplicates:';

function fieldValues(record: VaultRecord, field: ImportantField): string[] {
  const value = record[field];
  if (Array.isArray(value)) return value;
  return value ? [value] : [];
}

export function isExactDuplicate(a: VaultRecord, b: VaultRecord): boolean {
  return IMPORTANT_FIELDS.every(field => {
    const left = fieldValues(a, field);
    const right = fieldValues(b, field);
    return left.length === right.length && left.every((v, i) => v === right[i]);
  });
}

export function countImportantFields(record: VaultRecord): number {
  return IMPORTANT_FIELDS.filter(field => fieldValues(record, field).some(v => v.trim() !== '')).length;
}

/**
 * Most recently updated record wins; then the one with more important fields
 * filled; then the earliest in encounter order.
 */
export function choosePreferred(members: readonly VaultRecord[]): VaultRecord {
  if (members.length === 0) throw new RangeError('Cannot choose from an empty cluster');
  let best = members[0];
  for (const candidate of members.slice(1)) {
    const candidateTime = timestampOrder(candidate.updatedAt);
    const bestTime = timestampOrder(best.updatedAt);
    if (candidateTime > bestTime
      || (candidateTime === bestTime && countImportantFields(candidate) > countImportantFields(best))) {
      best = candidate;
    }
  }
  return best;
}

interface AlternativeCategory {
  label: string;
  values: (record: VaultRecord) => (string | undefined)[];
}

const ALTERNATIVE_CATEGORIES: readonly AlternativeCategory[] = [
  { label: 'Alternative titles', values: r => [r.title] },
  { label: 'URLs', values: r => [r.primaryUrl, ...r.secondaryUrls] },
  { label: 'usernames', values: r => [r.username] },
  { label: 'emails', values: r => [r.email] },
  { label: 'passwords', values: r => [r.password] },
  { label: 'TOTP secrets', values: r => [r.totpSecret || r.totpUri] },
  { label: 'Original folders', values: r => [r.folder] },
];

function cleaned(values: (string | undefined)[]): string[] {
  return values.map(v => (v ?? '').trim()).filter(Boolean);
}

/** Distinct trimmed values across `members`, first-seen order, minus `exclude`. */
function alternatives(
  members: readonly VaultRecord[],
  pick: (record: VaultRecord) => (string | undefined)[],
  exclude: readonly string[],
): string[] {
  const seen = new Set(exclude);
  const out: string[] = [];
  for (const member of members) {
    for (const value of cleaned(pick(member))) {
      if (seen.has(value)) continue;
      seen.add(value);
      out.push(value);
    }
  }
  return out;
}

/**
 * Notes for the record that survives a merge: its own notes, a labeled block
 * of every differing value the other members held, then their distinct notes.
 */
export function buildMergedNotes(members: readonly VaultRecord[], preferred: VaultRecord): string {
  const parts: string[] = [];
  const ownNotes = preferred.notes.trim();
  if (ownNotes) parts.push(ownNotes);

  const lines: string[] = [];
  for (const category of ALTERNATIVE_CATEGORIES) {
    const values = alternatives(members, category.values, cleaned(category.values(preferred)));
    if (values.length > 0) lines.push(`- ${category.label}: ${values.join(', ')}`);
  }
  if (lines.length > 0) parts.push([MERGED_HEADER, ...lines].join('\n'));

  parts.push(...alternatives(members, r => [r.notes], ownNotes ? [ownNotes] : []));
  return parts.join('\n\n');
}
