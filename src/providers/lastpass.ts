import type { CsvRow, ImportContext, VaultRecord } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

/** LastPass marks secure notes with this placeholder URL. */
const SECURE_NOTE_URL = 'http://sn';

const MAPPED = ['url', 'username', 'password', 'totp', 'extra', 'name', 'grouping', 'fav'];

export class LastPassProvider extends BaseProvider {
  readonly providerId = 'lastpass';
  readonly displayName = 'LastPass';
  readonly headerFingerprint = {
    required: ['url', 'username', 'password'],
    optional: ['totp', 'extra', 'name', 'grouping', 'fav'],
  };
  readonly exportColumns = ['url', 'username', 'password', 'totp', 'extra', 'name', 'grouping', 'fav'] as const;

  protected fromRow(row: CsvRow, _context: ImportContext): VaultRecord {
    const extra = this.collectExtra(row, MAPPED);
    if (row.fav !== undefined) extra[this.rawKey('fav')] = row.fav;

    return createRecord({
      source: this.providerId,
      itemType: row.url.trim() === SECURE_NOTE_URL ? 'note' : 'login',
      primaryUrl: row.url,
      username: row.username,
      password: row.password,
      ...this.splitTotp(row.totp),
      notes: row.extra,
      title: row.name,
      folder: row.grouping,
      favorite: this.flag(row.fav),
      extra,
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    const url = record.primaryUrl ?? (record.itemType === 'note' ? SECURE_NOTE_URL : '');
    return {
      url,
      username: record.username || record.email,
      password: record.password,
      totp: this.joinTotp(record),
      extra: record.notes,
      name: this.exportTitle(record),
      grouping: record.folder ?? '',
      fav: this.restoreRaw(record, 'fav', record.favorite, raw => this.flag(raw), record.favorite ? '1' : '0'),
    };
  }
}
