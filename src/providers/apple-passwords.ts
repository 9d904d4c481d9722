import type { CsvRow, ImportContext, VaultRecord } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

/** Apple Passwords / Safari export. */
export class ApplePasswordsProvider extends BaseProvider {
  readonly providerId = 'apple-passwords';
  readonly displayName = 'Apple Passwords';
  readonly headerFingerprint = {
    required: ['Title', 'URL', 'Username', 'Password'],
    optional: ['Notes', 'OTPAuth'],
  };
  readonly exportColumns = ['Title', 'URL', 'Username', 'Password', 'Notes', 'OTPAuth'] as const;

  protected fromRow(row: CsvRow, _context: ImportContext): VaultRecord {
    return createRecord({
      source: this.providerId,
      title: row.Title,
      primaryUrl: row.URL,
      username: row.Username,
      password: row.Password,
      notes: row.Notes,
      ...this.splitTotp(row.OTPAuth),
      extra: this.collectExtra(row, this.exportColumns),
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    return {
      Title: this.exportTitle(record),
      URL: record.primaryUrl ?? '',
      Username: record.username || record.email,
      Password: record.password,
      Notes: record.notes,
      OTPAuth: this.joinTotp(record),
    };
  }
}
