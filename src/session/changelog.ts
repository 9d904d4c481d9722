import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';

export type ChangeAction = 'remove-exact' | 'merge' | 'keep-all' | 'skip';

/** Record ids only; secrets never enter the change log. */
export interface ChangeDetails {
  clusterId: string;
  keptId?: string;
  removedIds?: string[];
  mergedFromIds?: string[];
  recordIds?: string[];
}

export interface ChangeEntry {
  timestampMs: number;
  action: ChangeAction;
  details: ChangeDetails;
}

export interface ChangeLogDocument {
  inputFile: string;
  outputFile: string;
  inputSha256: string;
  outputSha256: string;
  entries: ChangeEntry[];
}

export class ChangeLog {
  private readonly list: ChangeEntry[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  get entries(): readonly ChangeEntry[] {
    return this.list;
  }

  recordExactRemoval(clusterId: string, keptId: string, removedIds: string[]): void {
    this.append('remove-exact', { clusterId, keptId, removedIds });
  }

  recordMerge(clusterId: string, keptId: string, mergedFromIds: string[]): void {
    this.append('merge', { clusterId, keptId, mergedFromIds });
  }

  recordKeepAll(clusterId: string, recordIds: string[]): void {
    this.append('keep-all', { clusterId, recordIds });
  }

  recordSkip(clusterId: string, recordIds: string[]): void {
    this.append('skip', { clusterId, recordIds });
  }

  clear(): void {
    this.list.length = 0;
  }

  toDocument(files: Omit<ChangeLogDocument, 'entries'>): ChangeLogDocument {
    return { ...files, entries: this.list.map(entry => ({ ...entry, details: { ...entry.details } })) };
  }

  private append(action: ChangeAction, details: ChangeDetails): void {
    this.list.push({ timestampMs: this.now(), action, details });
  }
}

export function sha256(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

export async function saveChangeLog(filePath: string, document: ChangeLogDocument): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(document, null, 2) + '\n', 'utf-8');
}
