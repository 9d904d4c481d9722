import type { CsvRow, ImportContext, ItemType, VaultRecord } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

const MAPPED = ['Type', 'Name', 'Website URL', 'Username', 'Email', 'Password', 'Comment'];
const PASSTHROUGH = ['Secondary Login', 'collections'] as const;

function toItemType(raw: string): ItemType {
  return raw.trim().toLowerCase().startsWith('login') ? 'login' : 'other';
}

/** Dashlane CSV import template. */
export class DashlaneProvider extends BaseProvider {
  readonly providerId = 'dashlane';
  readonly displayName = 'Dashlane';
  readonly headerFingerprint = {
    required: ['Type', 'Name', 'Website URL', 'Password'],
    optional: ['Username', 'Email', 'Secondary Login', 'Comment', 'collections'],
  };
  readonly exportColumns = [
    'Type', 'Name', 'Website URL', 'Username', 'Email',
    'Secondary Login', 'Password', 'Comment', 'collections',
  ] as const;

  protected fromRow(row: CsvRow, _context: ImportContext): VaultRecord {
    const extra = this.collectExtra(row, MAPPED);
    extra[this.rawKey('Type')] = row.Type;

    return createRecord({
      source: this.providerId,
      itemType: toItemType(row.Type),
      title: row.Name,
      primaryUrl: row['Website URL'],
      username: row.Username,
      email: row.Email,
      password: row.Password,
      notes: row.Comment,
      extra,
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    return {
      ...this.extraColumns(record, PASSTHROUGH),
      Type: this.restoreRaw(record, 'Type', record.itemType, toItemType, 'Login'),
      Name: this.exportTitle(record),
      'Website URL': record.primaryUrl ?? '',
      Username: record.username,
      Email: record.email,
      Password: record.password,
      Comment: record.notes,
    };
  }
}
