import type { CsvRow, ImportContext, VaultRecord } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

/** Chrome, Edge, Brave and Opera password exports. */
export class ChromiumProvider extends BaseProvider {
  readonly providerId = 'chromium';
  readonly displayName = 'Chromium browsers';
  readonly headerFingerprint = {
    required: ['name', 'url', 'username', 'password'],
    optional: ['note'],
  };
  readonly exportColumns = ['name', 'url', 'username', 'password', 'note'] as const;

  protected fromRow(row: CsvRow, _context: ImportContext): VaultRecord {
    return createRecord({
      source: this.providerId,
      title: row.name,
      primaryUrl: row.url,
      username: row.username,
      password: row.password,
      notes: row.note,
      extra: this.collectExtra(row, this.exportColumns),
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    return {
      name: this.exportTitle(record),
      url: record.primaryUrl ?? '',
      username: record.username || record.email,
      password: record.password,
      note: record.notes,
    };
  }
}
