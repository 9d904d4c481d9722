import type { CsvRow, ImportContext, VaultRecord } from '../types/index.js';
import { createRecord } from '../vault/model.js';
import { BaseProvider } from './base.js';

export class KasperskyProvider extends BaseProvider {
  readonly providerId = 'kaspersky';
  readonly displayName = 'Kaspersky Password Manager';
  readonly headerFingerprint = {
    required: ['Account', 'Login', 'Password', 'Url'],
    optional: [],
  };
  readonly exportColumns = ['Account', 'Login', 'Password', 'Url'] as const;

  protected fromRow(row: CsvRow, _context: ImportContext): VaultRecord {
    return createRecord({
      source: this.providerId,
      title: row.Account,
      username: row.Login,
      password: row.Password,
      primaryUrl: row.Url,
      extra: this.collectExtra(row, this.exportColumns),
    });
  }

  protected toRow(record: VaultRecord): Partial<CsvRow> {
    return {
      Account: this.exportTitle(record),
      Login: record.username || record.email,
      Password: record.password,
      Url: record.primaryUrl ?? '',
    };
  }
}
