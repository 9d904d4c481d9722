import type { VaultRecord } from '../types/index.js';
import { generateId } from '../utils/index.js';

export function createRecord(fields: Partial<VaultRecord> & { source: string }): VaultRecord {
  return {
    itemType: fields.itemType ?? 'login',
    source: fields.source,
    sourceId: fields.sourceId,
    internalId: fields.internalId ?? generateId(),
    title: fields.title ?? '',
    username: fields.username ?? '',
    email: fields.email ?? '',
    password: fields.password ?? '',
    primaryUrl: fields.primaryUrl || undefined,
    secondaryUrls: uniqueStrings(fields.secondaryUrls ?? []),
    notes: fields.notes ?? '',
    folder: fields.folder || undefined,
    tags: uniqueStrings(fields.tags ?? []),
    favorite: fields.favorite ?? false,
    totpUri: fields.totpUri || undefined,
    totpSecret: fields.totpSecret || undefined,
    createdAt: fields.createdAt,
    updatedAt: fields.updatedAt,
    extra: { ...fields.extra },
  };
}

/** Copy a record, optionally replacing its notes. Identity fields are kept. */
export function cloneRecord(record: VaultRecord, notes?: string): VaultRecord {
  const copy = structuredClone(record);
  if (notes !== undefined) copy.notes = notes;
  return copy;
}

export function recordId(record: VaultRecord): string {
  return record.internalId ?? '';
}

function uniqueStrings(values: string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const value of values) {
    if (!value || seen.has(value)) continue;
    seen.add(value);
    out.push(value);
  }
  return out;
}
